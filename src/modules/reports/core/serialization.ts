/**
 * Canonical report serialization.
 *
 * CSV: comma-delimited, `\n` line endings with a trailing newline, fields
 * quoted only when needed, figures as plain two-decimal strings.
 * JSON: two-space indentation with a trailing newline.
 */

import {
  formatFixed2,
  formatOptionalFixed2,
  toRoundedNumber,
} from '../../aggregation/index.js';

import type { ReportArtifact } from './ports.js';
import type {
  CostOverrunTrendRow,
  RegionalEfficiencyRow,
  ReportBundle,
  SummaryDigest,
  TopContractorRow,
} from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// File Names
// ─────────────────────────────────────────────────────────────────────────────

export const REPORT_FILES = {
  regionalEfficiency: 'Report1.csv',
  topContractors: 'Report2.csv',
  costOverrunTrends: 'Report3.csv',
  summary: 'summary.json',
  runLog: 'run-log.json',
} as const;

// ─────────────────────────────────────────────────────────────────────────────
// CSV
// ─────────────────────────────────────────────────────────────────────────────

/**
 * One output column: its header and how a row renders into it.
 */
export interface CsvColumn<R> {
  readonly header: string;
  readonly value: (row: R) => string;
}

/**
 * Quotes a field when it contains a comma, quote, CR or LF.
 */
export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Renders rows as CSV text, header first.
 */
export function formatCsv<R>(rows: readonly R[], columns: readonly CsvColumn<R>[]): string {
  const header = columns.map((column) => escapeCsvField(column.header)).join(',');
  const lines = rows.map((row) =>
    columns.map((column) => escapeCsvField(column.value(row))).join(',')
  );
  return [header, ...lines].join('\n') + '\n';
}

export const REGIONAL_EFFICIENCY_COLUMNS: readonly CsvColumn<RegionalEfficiencyRow>[] = [
  { header: 'Region', value: (row) => row.region },
  { header: 'MainIsland', value: (row) => row.mainIsland },
  { header: 'TotalBudget', value: (row) => formatFixed2(row.totalBudget) },
  { header: 'MedianSavings', value: (row) => formatFixed2(row.medianSavings) },
  { header: 'AvgDelay', value: (row) => formatFixed2(row.avgDelay) },
  { header: 'HighDelayPct', value: (row) => formatFixed2(row.highDelayPct) },
  { header: 'EfficiencyScore', value: (row) => formatFixed2(row.efficiencyScore) },
];

export const TOP_CONTRACTOR_COLUMNS: readonly CsvColumn<TopContractorRow>[] = [
  { header: 'Rank', value: (row) => String(row.rank) },
  { header: 'Contractor', value: (row) => row.contractor },
  { header: 'TotalCost', value: (row) => formatFixed2(row.totalCost) },
  { header: 'NumProjects', value: (row) => String(row.numProjects) },
  { header: 'AvgDelay', value: (row) => formatFixed2(row.avgDelay) },
  { header: 'TotalSavings', value: (row) => formatFixed2(row.totalSavings) },
  { header: 'ReliabilityIndex', value: (row) => formatOptionalFixed2(row.reliabilityIndex) },
  { header: 'RiskLabel', value: (row) => row.riskLabel },
];

export const COST_OVERRUN_TREND_COLUMNS: readonly CsvColumn<CostOverrunTrendRow>[] = [
  { header: 'FundingYear', value: (row) => String(row.fundingYear) },
  { header: 'TypeOfWork', value: (row) => row.typeOfWork },
  { header: 'TotalProjects', value: (row) => String(row.totalProjects) },
  { header: 'AvgSavings', value: (row) => formatFixed2(row.avgSavings) },
  { header: 'OverrunRate', value: (row) => formatFixed2(row.overrunRate) },
  { header: 'YoYChange', value: (row) => formatOptionalFixed2(row.yoyChange) },
];

// ─────────────────────────────────────────────────────────────────────────────
// JSON
// ─────────────────────────────────────────────────────────────────────────────

export function formatJson(value: unknown): string {
  return JSON.stringify(value, null, 2) + '\n';
}

/**
 * summary.json payload. Key order is fixed.
 */
export interface SummaryJson {
  totalProjects: number;
  totalContractors: number;
  totalProvinces: number;
  globalAvgDelay: number | null;
  globalTotalSavings: number;
}

export function toSummaryJson(digest: SummaryDigest): SummaryJson {
  return {
    totalProjects: digest.totalProjects,
    totalContractors: digest.totalContractors,
    totalProvinces: digest.totalProvinces,
    globalAvgDelay: digest.globalAvgDelay === null ? null : toRoundedNumber(digest.globalAvgDelay),
    globalTotalSavings: toRoundedNumber(digest.globalTotalSavings),
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Artifacts
// ─────────────────────────────────────────────────────────────────────────────

/**
 * The three report files and summary.json, in write order.
 */
export function toReportArtifacts(bundle: ReportBundle): ReportArtifact[] {
  return [
    {
      fileName: REPORT_FILES.regionalEfficiency,
      contents: formatCsv(bundle.regionalEfficiency.rows, REGIONAL_EFFICIENCY_COLUMNS),
    },
    {
      fileName: REPORT_FILES.topContractors,
      contents: formatCsv(bundle.topContractors.rows, TOP_CONTRACTOR_COLUMNS),
    },
    {
      fileName: REPORT_FILES.costOverrunTrends,
      contents: formatCsv(bundle.costOverrunTrends.rows, COST_OVERRUN_TREND_COLUMNS),
    },
    {
      fileName: REPORT_FILES.summary,
      contents: formatJson(toSummaryJson(bundle.summary)),
    },
  ];
}
