import { Decimal } from 'decimal.js';

/**
 * Numeric primitives shared by every report.
 *
 * Every function is pure and works on `Decimal` so results do not depend on
 * binary floating-point accumulation. Nothing here rounds: rounding happens
 * once, when a value is serialized (see `formatFixed2`).
 */

const ZERO = new Decimal(0);
const HUNDRED = new Decimal(100);

/**
 * Sums values in the order given.
 */
export function sum(values: readonly Decimal[]): Decimal {
  let total = ZERO;
  for (const value of values) {
    total = total.plus(value);
  }
  return total;
}

/**
 * Arithmetic mean, or null for an empty sequence.
 */
export function mean(values: readonly Decimal[]): Decimal | null {
  if (values.length === 0) return null;
  return sum(values).div(values.length);
}

/**
 * Median of the values.
 *
 * Sorts a copy ascending. Odd length returns the middle element, even length
 * the average of the two middle elements. Returns null for an empty sequence.
 */
export function median(values: readonly Decimal[]): Decimal | null {
  const sorted = [...values].sort((a, b) => a.comparedTo(b));
  const n = sorted.length;
  const upper = sorted[Math.floor(n / 2)];
  if (upper === undefined) return null;

  if (n % 2 === 1) return upper;

  const lower = sorted[n / 2 - 1];
  if (lower === undefined) return upper;
  return lower.plus(upper).div(2);
}

/**
 * Share of values satisfying the predicate, as a percentage (0-100).
 * Returns 0 for an empty sequence.
 */
export function percentage<T>(predicate: (value: T) => boolean, values: readonly T[]): Decimal {
  if (values.length === 0) return ZERO;

  let matches = 0;
  for (const value of values) {
    if (predicate(value)) matches += 1;
  }
  return HUNDRED.times(matches).div(values.length);
}

/**
 * Clamps a value into [lo, hi]. Pass null for an open bound.
 */
export function cappedRatio(x: Decimal, lo: Decimal | null, hi: Decimal | null): Decimal {
  if (lo !== null && hi !== null && lo.greaterThan(hi)) {
    throw new RangeError(`Invalid bounds: lower ${lo.toString()} exceeds upper ${hi.toString()}`);
  }
  if (hi !== null && x.greaterThan(hi)) return hi;
  if (lo !== null && x.lessThan(lo)) return lo;
  return x;
}

/**
 * Percentage change from baseline to current.
 *
 * Returns null when the baseline is zero (never 0 or Infinity).
 */
export function percentChange(current: Decimal, baseline: Decimal): Decimal | null {
  if (baseline.isZero()) return null;
  return current.minus(baseline).div(baseline.abs()).times(100);
}
