import { Module } from '@nestjs/common';
import { AlertsModule } from '../alerts/alerts.module';
import { MarketDataModule } from '../market-data/market-data.module';
import { NotificationsModule } from '../notifications/notifications.module';
import { PortfolioModule } from '../portfolio/portfolio.module';
import { JobSchedulerService } from './job-scheduler.service';
import { PriceRefreshJob } from './price-refresh.job';
import { SnapshotJob } from './snapshot.job';

@Module({
  imports: [MarketDataModule, PortfolioModule, AlertsModule, NotificationsModule],
  providers: [PriceRefreshJob, SnapshotJob, JobSchedulerService],
  exports: [PriceRefreshJob, SnapshotJob],
})
export class JobsModule {}
