import { Injectable, Logger } from '@nestjs/common';
import Decimal from 'decimal.js';
import { PriceService } from '../market-data/price.service';
import { add, multiply, percentChange, roundMoney } from '../common/utils/decimal.util';
import { todayIsoDate } from '../common/utils/date.util';
import { HoldingWithPositions } from './entities/holding.entity';
import { ValuatedHolding, ValuatedPosition } from './entities/valuation.entity';
import { PortfolioRepository } from './portfolio.repository';

/**
 * Values holdings against current prices and writes daily snapshots.
 */
@Injectable()
export class ValuationService {
  private readonly logger = new Logger(ValuationService.name);

  constructor(
    private readonly repository: PortfolioRepository,
    private readonly priceService: PriceService,
  ) {}

  /**
   * Prices every distinct ticker concurrently, then aggregates.
   * Positions without a price carry no value or PnL and are left out of the totals.
   */
  async valuate(holding: HoldingWithPositions): Promise<ValuatedHolding> {
    const prices = await this.resolvePrices(holding.positions.map((position) => position.ticker));

    let totalValue = new Decimal(0);
    let totalCost = new Decimal(0);

    const positions = holding.positions.map((position): ValuatedPosition => {
      const currentPrice = prices.get(position.ticker);
      if (!currentPrice) {
        return { ...position };
      }

      const currentValue = multiply(position.quantity, currentPrice);
      const costValue = multiply(position.quantity, position.averageCost);
      totalValue = add(totalValue, currentValue);
      totalCost = add(totalCost, costValue);

      return {
        ...position,
        currentPrice,
        currentValue,
        pnlPercent: percentChange(currentValue, costValue),
      };
    });

    return {
      ...holding,
      positions,
      totalValue,
      totalPnlPercent: percentChange(totalValue, totalCost),
    };
  }

  /**
   * Upserts one snapshot per holding for the given day.
   * A holding that fails to valuate or persist is logged and skipped;
   * the others are still written.
   *
   * @returns number of snapshots written
   */
  async snapshotAll(date: string = todayIsoDate()): Promise<number> {
    const holdings = await this.repository.findAllHoldingsWithPositions();

    const written = await Promise.all(
      holdings.map(async (holding) => {
        try {
          const valuated = await this.valuate(holding);
          await this.repository.upsertSnapshot({
            holdingId: holding.id,
            date,
            totalValue: roundMoney(valuated.totalValue),
            totalPnlPercent: roundMoney(valuated.totalPnlPercent ?? new Decimal(0)),
          });
          return true;
        } catch (error) {
          const reason = error instanceof Error ? error.message : String(error);
          this.logger.error(`Snapshot for holding ${holding.id} skipped: ${reason}`);
          return false;
        }
      }),
    );

    const count = written.filter(Boolean).length;
    this.logger.log(`Wrote ${count}/${holdings.length} snapshots for ${date}`);
    return count;
  }

  // One lookup per distinct ticker, issued together and joined.
  private async resolvePrices(tickers: string[]): Promise<Map<string, Decimal>> {
    const distinct = Array.from(new Set(tickers));
    const results = await Promise.all(
      distinct.map(async (ticker) => [ticker, await this.priceService.getPrice(ticker)] as const),
    );

    const prices = new Map<string, Decimal>();
    for (const [ticker, price] of results) {
      if (price) {
        prices.set(ticker, price);
      }
    }
    return prices;
  }
}
