import { Injectable } from '@nestjs/common';
import { ValuationService } from '../portfolio/valuation.service';

@Injectable()
export class SnapshotJob {
  constructor(private readonly valuation: ValuationService) {}

  /** @returns number of snapshots written */
  async run(): Promise<number> {
    return this.valuation.snapshotAll();
  }
}
