import { ConflictException, Injectable, Logger } from '@nestjs/common';
import Decimal from 'decimal.js';
import { add, divide, multiply, roundMoney, roundQuantity } from '../common/utils/decimal.util';
import { AssetClass, Position } from './entities/position.entity';
import { DuplicateKeyError, PortfolioRepository } from './portfolio.repository';

export const MAX_CONTRIBUTION_ATTEMPTS = 5;

export interface Contribution {
  ticker: string;
  quantity: Decimal;
  unitCost: Decimal;
  assetClass: AssetClass;
}

export interface MergedCost {
  quantity: Decimal;
  averageCost: Decimal;
}

/**
 * Quantity-weighted average of an existing position and a new contribution.
 * Quantity keeps 8 places, cost is rounded half-up to 2.
 */
export function mergeWeightedAverage(
  existing: MergedCost,
  quantity: Decimal,
  unitCost: Decimal,
): MergedCost {
  const totalQuantity = add(existing.quantity, quantity);
  // unreachable while every contribution is > 0
  if (totalQuantity.isZero()) {
    return { quantity: totalQuantity, averageCost: new Decimal(0) };
  }

  const totalCost = add(multiply(existing.quantity, existing.averageCost), multiply(quantity, unitCost));
  return {
    quantity: roundQuantity(totalQuantity),
    averageCost: roundMoney(divide(totalCost, totalQuantity)),
  };
}

// Weighted-average cost aggregation for contributions to a holding.
// Read-modify-write is guarded by the position version; a lost race re-reads and retries.
@Injectable()
export class PositionLedgerService {
  private readonly logger = new Logger(PositionLedgerService.name);

  constructor(private readonly repository: PortfolioRepository) {}

  /**
   * Creates the position on first contribution, otherwise merges into it.
   * The incoming asset class is ignored on merge; the existing one is kept.
   * Holding ownership must be checked by the caller.
   *
   * @throws ConflictException when concurrent writers win every attempt
   */
  async contribute(holdingId: string, contribution: Contribution): Promise<Position> {
    const ticker = contribution.ticker.toUpperCase();

    for (let attempt = 1; attempt <= MAX_CONTRIBUTION_ATTEMPTS; attempt++) {
      const existing = await this.repository.findPosition(holdingId, ticker);

      if (!existing) {
        try {
          return await this.repository.insertPosition({
            holdingId,
            ticker,
            quantity: roundQuantity(contribution.quantity),
            averageCost: roundMoney(contribution.unitCost),
            assetClass: contribution.assetClass,
          });
        } catch (error) {
          if (error instanceof DuplicateKeyError) {
            this.logger.warn(`Concurrent insert of ${ticker} in holding ${holdingId}, merging instead`);
            continue;
          }
          throw error;
        }
      }

      const merged = mergeWeightedAverage(existing, contribution.quantity, contribution.unitCost);
      const updated = await this.repository.updatePosition({ ...existing, ...merged }, existing.version);
      if (updated) {
        return updated;
      }
      this.logger.warn(
        `Position ${ticker} in holding ${holdingId} changed during merge (attempt ${attempt}/${MAX_CONTRIBUTION_ATTEMPTS})`,
      );
    }

    throw new ConflictException(
      `Position ${ticker} is being updated concurrently. Please retry.`,
    );
  }
}
