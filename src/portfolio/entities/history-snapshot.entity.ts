import Decimal from 'decimal.js';

// Daily valuation of a holding. At most one per (holdingId, date).
export interface HistorySnapshot {
  id: string;
  holdingId: string;
  date: string;                 // YYYY-MM-DD (UTC)
  totalValue: Decimal;
  totalPnlPercent: Decimal;
  createdAt: Date;
  updatedAt: Date;
}
