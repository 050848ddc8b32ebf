import Decimal from 'decimal.js';

// Global decimal configuration for money and quantity arithmetic.
Decimal.set({
  precision: 20,
  rounding: Decimal.ROUND_HALF_UP,
  toExpPos: 9e15,         // No exponential notation for large numbers
  toExpNeg: -9e15,        // No exponential notation for small numbers
});

/** Decimal places kept for position quantities. */
export const QUANTITY_SCALE = 8;

/** Decimal places kept for unit costs, alert targets and money totals. */
export const MONEY_SCALE = 2;

/**
 * Converts any number-like value to Decimal.
 * Handles JavaScript numbers, strings, and existing Decimal instances.
 */
export function toDecimal(value: number | string | Decimal): Decimal {
  return new Decimal(value);
}

/**
 * Converts Decimal back to JavaScript number for JSON serialization.
 * Rounds to 8 decimal places.
 */
export function toNumber(value: Decimal): number {
  return value.toDecimalPlaces(QUANTITY_SCALE).toNumber();
}

/** Rounds to 2 places and returns a JSON number (money totals, percentages). */
export function toMoney(value: Decimal): number {
  return roundMoney(value).toNumber();
}

export function roundMoney(value: Decimal): Decimal {
  return value.toDecimalPlaces(MONEY_SCALE, Decimal.ROUND_HALF_UP);
}

export function roundQuantity(value: Decimal): Decimal {
  return value.toDecimalPlaces(QUANTITY_SCALE, Decimal.ROUND_HALF_UP);
}

/**
 * Safe addition of Decimal values.
 */
export function add(...values: Decimal[]): Decimal {
  return values.reduce((sum, val) => sum.plus(val), new Decimal(0));
}

export function multiply(a: Decimal, b: Decimal): Decimal {
  return a.times(b);
}

export function subtract(a: Decimal, b: Decimal): Decimal {
  return a.minus(b);
}

/**
 * Safe division with zero check.
 */
export function divide(a: Decimal, b: Decimal): Decimal {
  if (b.isZero()) {
    throw new Error('Division by zero');
  }
  return a.dividedBy(b);
}

/**
 * (current - base) / base * 100.
 * Undefined when base is zero: the change is unknown, not zero.
 */
export function percentChange(current: Decimal, base: Decimal): Decimal | undefined {
  if (base.isZero()) {
    return undefined;
  }
  return divide(subtract(current, base), base).times(100);
}

/** Parses a stored decimal string, undefined when it is not a finite number. */
export function parseDecimal(raw: string): Decimal | undefined {
  try {
    const value = new Decimal(raw);
    return value.isFinite() ? value : undefined;
  } catch (error) {
    if (error instanceof Error && error.message.includes('DecimalError')) {
      return undefined;
    }
    throw error;
  }
}
