import { Module } from '@nestjs/common';
import { MarketDataModule } from '../market-data/market-data.module';
import { PortfolioController } from './portfolio.controller';
import { PortfolioService } from './portfolio.service';
import { PortfolioRepository } from './portfolio.repository';
import { PortfolioStorageService } from './portfolio-storage.service';
import { PositionLedgerService } from './position-ledger.service';
import { ValuationService } from './valuation.service';

@Module({
  imports: [MarketDataModule], // PriceService for valuation
  controllers: [PortfolioController],
  providers: [
    { provide: PortfolioRepository, useClass: PortfolioStorageService },
    PositionLedgerService, // weighted-average merge
    ValuationService,      // value/PnL and daily snapshots
    PortfolioService,
  ],
  exports: [PortfolioRepository, ValuationService],
})
export class PortfolioModule {}
