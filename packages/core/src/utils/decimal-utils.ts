import { Decimal } from 'decimal.js';

// Loan amounts and rates need far fewer digits than this; the headroom keeps
// sums over large pools exact.
Decimal.set({
  precision: 28,
  rounding: Decimal.ROUND_HALF_UP,
  toExpNeg: -9,
  toExpPos: 21,
});

export type DecimalInput = Decimal | number | string;

/**
 * Tolerance used for every numeric equality check.
 * Two values match when |actual - expected| <= max(absolute, relative * |expected|).
 */
export interface ToleranceConfig {
  absolute: Decimal;
  relative: Decimal;
}

export const DEFAULT_TOLERANCE: Readonly<ToleranceConfig> = Object.freeze({
  absolute: new Decimal('0.01'),
  relative: new Decimal(0),
});

/**
 * Parse a value to a finite Decimal, or undefined when it is not numeric
 */
export function tryParseDecimal(value: DecimalInput | null | undefined): Decimal | undefined {
  if (value === undefined || value === null || value === '') {
    return undefined;
  }

  try {
    const decimal = value instanceof Decimal ? value : new Decimal(value);
    return decimal.isFinite() ? decimal : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Parse a value to a Decimal with fallback to zero
 */
export function parseDecimal(value: DecimalInput | null | undefined): Decimal {
  return tryParseDecimal(value) ?? new Decimal(0);
}

export function toDecimal(value: Decimal | number): Decimal {
  return value instanceof Decimal ? value : new Decimal(value);
}

/**
 * Compare two amounts under the configured tolerance
 */
export function withinTolerance(
  actual: DecimalInput,
  expected: DecimalInput,
  tolerance: ToleranceConfig = DEFAULT_TOLERANCE
): boolean {
  const a = new Decimal(actual);
  const e = new Decimal(expected);
  const allowed = Decimal.max(tolerance.absolute, tolerance.relative.times(e.abs()));
  return a.minus(e).abs().lessThanOrEqualTo(allowed);
}

export function sumDecimals(values: Iterable<Decimal>): Decimal {
  let total = new Decimal(0);
  for (const value of values) {
    total = total.plus(value);
  }
  return total;
}

/**
 * Convert Decimal to string with appropriate precision for display
 */
export function formatDecimal(decimal: Decimal, maxDecimalPlaces = 4): string {
  const fixed = decimal.toFixed(maxDecimalPlaces);
  return fixed.includes('.') ? fixed.replace(/\.?0+$/, '') : fixed;
}
