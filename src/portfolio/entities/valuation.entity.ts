import Decimal from 'decimal.js';
import { Holding } from './holding.entity';
import { Position } from './position.entity';

// Unset fields mean the price could not be resolved, not zero.
export interface ValuatedPosition extends Position {
  currentPrice?: Decimal;
  currentValue?: Decimal;
  pnlPercent?: Decimal;
}

export interface ValuatedHolding extends Holding {
  positions: ValuatedPosition[];
  totalValue: Decimal;          // resolved positions only
  totalPnlPercent?: Decimal;    // unset when resolved cost is zero
}
