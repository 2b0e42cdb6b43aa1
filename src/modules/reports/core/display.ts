/**
 * Human-readable report tables for the terminal.
 *
 * Values come from the same canonical strings as the CSV files; this layer
 * only adds thousands separators, truncation and padding.
 */

import { formatFixed2, formatOptionalFixed2 } from '../../aggregation/index.js';

import type { Decimal } from 'decimal.js';

import type {
  CostOverrunTrendRow,
  RegionalEfficiencyRow,
  TopContractorRow,
} from './types.js';

export type ColumnAlign = 'left' | 'right';

export interface DisplayColumn<R> {
  readonly header: string;
  /** Fixed width; long values are truncated */
  readonly width?: number;
  readonly align?: ColumnAlign;
  readonly value: (row: R) => string;
}

const ELLIPSIS = '…';

/**
 * Inserts thousands separators into a plain decimal string ("1234567.50"
 * becomes "1,234,567.50"). Empty input stays empty.
 */
export function withThousandsSeparators(plain: string): string {
  const match = /^(-?)(\d+)(\.\d+)?$/.exec(plain);
  if (match === null) return plain;
  const [, sign = '', whole = '', fraction = ''] = match;
  return sign + whole.replace(/\B(?=(\d{3})+(?!\d))/g, ',') + fraction;
}

/**
 * Display width in code points, so astral characters count once.
 */
const displayLength = (value: string): number => [...value].length;

/**
 * Shortens a value to `maxLength` code points, ending in an ellipsis.
 */
export function truncate(value: string, maxLength: number): string {
  const codePoints = [...value];
  if (codePoints.length <= maxLength) return value;
  if (maxLength <= 1) return ELLIPSIS.slice(0, maxLength);
  return codePoints.slice(0, maxLength - 1).join('') + ELLIPSIS;
}

const padCell = (value: string, width: number, align: ColumnAlign): string => {
  const truncated = truncate(value, width);
  const padding = ' '.repeat(Math.max(0, width - displayLength(truncated)));
  return align === 'right' ? padding + truncated : truncated + padding;
};

/**
 * Renders rows as a padded table with a header and separator line.
 */
export function renderTable<R>(rows: readonly R[], columns: readonly DisplayColumn<R>[]): string {
  if (rows.length === 0) {
    return 'No rows.';
  }

  const widths = columns.map(
    (column) =>
      column.width ??
      Math.max(displayLength(column.header), ...rows.map((row) => displayLength(column.value(row))))
  );
  const widthAt = (index: number): number => widths[index] ?? 0;

  const header = columns
    .map((column, index) => padCell(column.header, widthAt(index), column.align ?? 'left'))
    .join(' | ');
  const separator = widths.map((width) => '-'.repeat(width)).join('-+-');
  const lines = rows.map((row) =>
    columns
      .map((column, index) => padCell(column.value(row), widthAt(index), column.align ?? 'left'))
      .join(' | ')
  );

  return [header, separator, ...lines].join('\n');
}

// ─────────────────────────────────────────────────────────────────────────────
// Report Layouts
// ─────────────────────────────────────────────────────────────────────────────

const money = (value: Decimal): string => withThousandsSeparators(formatFixed2(value));

export const REGIONAL_EFFICIENCY_DISPLAY: readonly DisplayColumn<RegionalEfficiencyRow>[] = [
  { header: 'Region', width: 24, value: (row) => row.region },
  { header: 'MainIsland', width: 12, value: (row) => row.mainIsland },
  { header: 'TotalBudget', align: 'right', value: (row) => money(row.totalBudget) },
  { header: 'MedianSavings', align: 'right', value: (row) => money(row.medianSavings) },
  { header: 'AvgDelay', align: 'right', value: (row) => formatFixed2(row.avgDelay) },
  { header: 'HighDelayPct', align: 'right', value: (row) => formatFixed2(row.highDelayPct) },
  {
    header: 'EfficiencyScore',
    align: 'right',
    value: (row) => formatFixed2(row.efficiencyScore),
  },
];

export const TOP_CONTRACTOR_DISPLAY: readonly DisplayColumn<TopContractorRow>[] = [
  { header: 'Rank', align: 'right', value: (row) => String(row.rank) },
  { header: 'Contractor', width: 40, value: (row) => row.contractor },
  { header: 'TotalCost', align: 'right', value: (row) => money(row.totalCost) },
  { header: 'NumProjects', align: 'right', value: (row) => String(row.numProjects) },
  { header: 'AvgDelay', align: 'right', value: (row) => formatFixed2(row.avgDelay) },
  { header: 'TotalSavings', align: 'right', value: (row) => money(row.totalSavings) },
  {
    header: 'ReliabilityIndex',
    align: 'right',
    value: (row) => formatOptionalFixed2(row.reliabilityIndex),
  },
  { header: 'RiskLabel', value: (row) => row.riskLabel },
];

export const COST_OVERRUN_TREND_DISPLAY: readonly DisplayColumn<CostOverrunTrendRow>[] = [
  { header: 'FundingYear', value: (row) => String(row.fundingYear) },
  { header: 'TypeOfWork', width: 32, value: (row) => row.typeOfWork },
  { header: 'TotalProjects', align: 'right', value: (row) => String(row.totalProjects) },
  { header: 'AvgSavings', align: 'right', value: (row) => money(row.avgSavings) },
  { header: 'OverrunRate', align: 'right', value: (row) => formatFixed2(row.overrunRate) },
  { header: 'YoYChange', align: 'right', value: (row) => formatOptionalFixed2(row.yoyChange) },
];
