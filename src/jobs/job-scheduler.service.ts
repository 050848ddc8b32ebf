import { Inject, Injectable, Logger, OnApplicationBootstrap, OnApplicationShutdown } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '../config/app-config';
import { PriceRefreshJob } from './price-refresh.job';
import { SnapshotJob } from './snapshot.job';

interface ScheduledJob {
  name: string;
  intervalMs: number;
  run: () => Promise<unknown>;
  running: boolean;
}

// Fixed-interval runner. A tick is skipped while the same job is still in flight.
@Injectable()
export class JobSchedulerService implements OnApplicationBootstrap, OnApplicationShutdown {
  private readonly logger = new Logger(JobSchedulerService.name);
  private readonly timers: NodeJS.Timeout[] = [];
  private readonly jobs: ScheduledJob[];

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    priceRefresh: PriceRefreshJob,
    snapshot: SnapshotJob,
  ) {
    this.jobs = [
      {
        name: 'price-refresh',
        intervalMs: config.priceRefreshIntervalSeconds * 1000,
        run: () => priceRefresh.run(),
        running: false,
      },
      {
        name: 'snapshot',
        intervalMs: config.snapshotIntervalSeconds * 1000,
        run: () => snapshot.run(),
        running: false,
      },
    ];
  }

  onApplicationBootstrap(): void {
    if (!this.config.jobsEnabled) {
      this.logger.log('Background jobs disabled');
      return;
    }
    this.start();
  }

  onApplicationShutdown(): void {
    this.stop();
  }

  start(): void {
    if (this.timers.length > 0) {
      return;
    }
    for (const job of this.jobs) {
      this.timers.push(setInterval(() => void this.execute(job), job.intervalMs));
      this.logger.log(`Scheduled ${job.name} every ${job.intervalMs / 1000}s`);
    }
  }

  stop(): void {
    this.timers.forEach((timer) => clearInterval(timer));
    this.timers.length = 0;
  }

  /**
   * Runs one job now unless it is already running.
   * @returns false when the tick was skipped
   */
  async tick(name: string): Promise<boolean> {
    const job = this.jobs.find((candidate) => candidate.name === name);
    if (!job) {
      throw new Error(`Unknown job: ${name}`);
    }
    return this.execute(job);
  }

  // Never rejects: failures are logged.
  private async execute(job: ScheduledJob): Promise<boolean> {
    if (job.running) {
      this.logger.warn(`Skipping ${job.name}: previous run still in progress`);
      return false;
    }

    job.running = true;
    try {
      this.logger.log(`Running ${job.name}`);
      await job.run();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error(`Job ${job.name} failed: ${reason}`);
    } finally {
      job.running = false;
    }
    return true;
  }
}
