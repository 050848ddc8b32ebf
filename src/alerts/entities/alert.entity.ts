import Decimal from 'decimal.js';

export enum AlertDirection {
  ABOVE = 'ABOVE',
  BELOW = 'BELOW',
}

// Price threshold watch owned by a user.
// Created active; flips to inactive once when it fires and stays so until re-armed.
export interface Alert {
  id: string;
  ownerId: string;
  ticker: string;
  targetPrice: Decimal;         // > 0, 2 decimal places
  direction: AlertDirection;
  active: boolean;
  createdAt: Date;
  updatedAt: Date;
}
