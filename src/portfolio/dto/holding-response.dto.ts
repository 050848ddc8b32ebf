import { AssetClass } from '../entities/position.entity';

// Lightweight holding for list views (no positions)
export interface HoldingSummaryDto {
  id: string;
  ownerId: string;
  name: string;
  description: string | null;
  createdAt: string;
}

// Position with current valuation; null when the price is unknown
export interface PositionDto {
  id: string;
  holdingId: string;
  ticker: string;
  quantity: number;
  averageCost: number;
  assetClass: AssetClass;
  currentPrice: number | null;
  currentValue: number | null;
  pnlPercent: number | null;
  createdAt: string;
}

export interface HoldingResponseDto extends HoldingSummaryDto {
  positions: PositionDto[];
  totalValue: number;                 // resolved positions only
  totalPnlPercent: number | null;
}

export interface HistoryEntryDto {
  date: string;                       // YYYY-MM-DD
  totalValue: number;
  totalPnlPercent: number;
}
