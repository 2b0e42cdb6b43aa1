import { Decimal } from 'decimal.js';

/** Decimal places in every serialized figure */
export const OUTPUT_DECIMALS = 2;

/**
 * Rounds half away from zero to the given number of decimal places.
 *
 * decimal.js calls this mode ROUND_HALF_UP; it is not banker's rounding.
 */
export function roundHalfAwayFromZero(value: Decimal, places: number = OUTPUT_DECIMALS): Decimal {
  const rounded = value.toDecimalPlaces(places, Decimal.ROUND_HALF_UP);
  // -0.004 rounds to -0; print it as 0
  return rounded.isZero() ? new Decimal(0) : rounded;
}

/**
 * Canonical text of a figure: plain notation, exactly two decimals,
 * no thousands separators.
 */
export function formatFixed2(value: Decimal): string {
  return roundHalfAwayFromZero(value).toFixed(OUTPUT_DECIMALS);
}

/**
 * Canonical text of an optional figure; null becomes an empty string.
 */
export function formatOptionalFixed2(value: Decimal | null): string {
  return value === null ? '' : formatFixed2(value);
}

/**
 * Rounded figure as a JSON number.
 */
export function toRoundedNumber(value: Decimal): number {
  return roundHalfAwayFromZero(value).toNumber();
}
