import { Decimal } from 'decimal.js';

/**
 * Group-by building blocks for the report pipelines.
 *
 * Groups keep first-appearance order and members keep input order, so any
 * accumulation over a group happens in the same order as the source rows.
 */

export type GroupKeyPart = string | number;

export interface Group<T, K extends readonly GroupKeyPart[]> {
  readonly key: K;
  readonly members: readonly T[];
}

/**
 * One aggregated group: its key tuple, how many records were folded into it,
 * and the computed metrics.
 */
export interface AggregateRow<K extends readonly GroupKeyPart[], M> {
  readonly key: K;
  readonly count: number;
  readonly metrics: Readonly<M>;
}

/**
 * Partitions records by key, preserving first-appearance order of groups
 * and input order within each group.
 */
export function groupBy<T, K extends readonly GroupKeyPart[]>(
  records: readonly T[],
  keyOf: (record: T) => K
): Group<T, K>[] {
  const groups = new Map<string, { key: K; members: T[] }>();

  for (const record of records) {
    const key = keyOf(record);
    // JSON keeps tuple parts apart, e.g. ['a|b', 'c'] vs ['a', 'b|c']
    const id = JSON.stringify(key);
    let group = groups.get(id);
    if (group === undefined) {
      group = { key, members: [] };
      groups.set(id, group);
    }
    group.members.push(record);
  }

  return [...groups.values()];
}

/**
 * Folds each group into an AggregateRow.
 */
export function aggregate<T, K extends readonly GroupKeyPart[], M>(
  groups: readonly Group<T, K>[],
  reduce: (members: readonly T[], key: K) => M
): AggregateRow<K, M>[] {
  return groups.map((group) => ({
    key: group.key,
    count: group.members.length,
    metrics: reduce(group.members, group.key),
  }));
}

/**
 * Linearly rescales values so the minimum maps to `lo` and the maximum to `hi`.
 *
 * Pass 1 finds the range, pass 2 rescales. When every value is equal there is
 * no range to spread over and all values map to `lo`.
 */
export function minMaxNormalize(
  values: readonly Decimal[],
  lo: Decimal.Value = 0,
  hi: Decimal.Value = 100
): Decimal[] {
  const first = values[0];
  if (first === undefined) return [];

  let min = first;
  let max = first;
  for (const value of values) {
    if (value.lessThan(min)) min = value;
    if (value.greaterThan(max)) max = value;
  }

  const floor = new Decimal(lo);
  const span = new Decimal(hi).minus(floor);
  const range = max.minus(min);

  if (range.isZero()) {
    return values.map(() => floor);
  }

  return values.map((value) => value.minus(min).div(range).times(span).plus(floor));
}

/**
 * Locale-independent string ordering (UTF-16 code units).
 */
export function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Descending order for decimals; null sorts after every value.
 */
export function compareDecimalDesc(a: Decimal | null, b: Decimal | null): number {
  if (a === null && b === null) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return b.comparedTo(a);
}
