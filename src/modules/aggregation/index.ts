/**
 * Aggregation Module - Public API
 *
 * Exact numeric primitives and group-by helpers used by the report builders.
 */

export {
  sum,
  mean,
  median,
  percentage,
  cappedRatio,
  percentChange,
} from './core/primitives.js';

export {
  groupBy,
  aggregate,
  minMaxNormalize,
  compareText,
  compareDecimalDesc,
  type Group,
  type GroupKeyPart,
  type AggregateRow,
} from './core/grouping.js';

export {
  OUTPUT_DECIMALS,
  roundHalfAwayFromZero,
  formatFixed2,
  formatOptionalFixed2,
  toRoundedNumber,
} from './core/rounding.js';
