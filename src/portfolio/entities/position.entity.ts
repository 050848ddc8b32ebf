import Decimal from 'decimal.js';

export enum AssetClass {
  CRYPTO = 'CRYPTO',
  STOCK = 'STOCK',
  ETF = 'ETF',
  FOREX = 'FOREX',
  COMMODITY = 'COMMODITY',
}

// One ticker's quantity and weighted-average cost within a holding.
// (holdingId, ticker) is unique: further contributions merge into this row.
export interface Position {
  id: string;
  holdingId: string;
  ticker: string;               // uppercase alphanumeric
  quantity: Decimal;            // > 0, 8 decimal places
  averageCost: Decimal;         // > 0, 2 decimal places
  assetClass: AssetClass;
  version: number;              // bumped on every update, compare-and-swap guard
  createdAt: Date;
  updatedAt: Date;
}
