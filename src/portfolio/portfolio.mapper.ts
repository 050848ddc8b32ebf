import Decimal from 'decimal.js';
import { toMoney, toNumber } from '../common/utils/decimal.util';
import { Holding } from './entities/holding.entity';
import { HistorySnapshot } from './entities/history-snapshot.entity';
import { ValuatedHolding, ValuatedPosition } from './entities/valuation.entity';
import { HistoryEntryDto, HoldingResponseDto, HoldingSummaryDto, PositionDto } from './dto/holding-response.dto';

const optional = (value: Decimal | undefined, convert: (value: Decimal) => number): number | null =>
  value === undefined ? null : convert(value);

export function toHoldingSummary(holding: Holding): HoldingSummaryDto {
  return {
    id: holding.id,
    ownerId: holding.ownerId,
    name: holding.name,
    description: holding.description ?? null,
    createdAt: holding.createdAt.toISOString(),
  };
}

// Accepts plain positions too: their valuation fields are simply unset.
export function toPositionDto(position: ValuatedPosition): PositionDto {
  return {
    id: position.id,
    holdingId: position.holdingId,
    ticker: position.ticker,
    quantity: toNumber(position.quantity),
    averageCost: toMoney(position.averageCost),
    assetClass: position.assetClass,
    currentPrice: optional(position.currentPrice, toNumber),
    currentValue: optional(position.currentValue, toNumber),
    pnlPercent: optional(position.pnlPercent, toMoney),
    createdAt: position.createdAt.toISOString(),
  };
}

export function toHoldingResponse(holding: ValuatedHolding): HoldingResponseDto {
  return {
    ...toHoldingSummary(holding),
    positions: holding.positions.map(toPositionDto),
    totalValue: toMoney(holding.totalValue),
    totalPnlPercent: optional(holding.totalPnlPercent, toMoney),
  };
}

export function toHistoryEntry(snapshot: HistorySnapshot): HistoryEntryDto {
  return {
    date: snapshot.date,
    totalValue: toMoney(snapshot.totalValue),
    totalPnlPercent: toMoney(snapshot.totalPnlPercent),
  };
}
