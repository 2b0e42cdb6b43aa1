/**
 * Reports Module - Public API
 *
 * Report builders, summary digest, canonical serialization and terminal tables.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export type {
  CostOverrunTrendRow,
  RegionalEfficiencyRow,
  ReportBundle,
  ReportId,
  ReportNotice,
  ReportNoticeType,
  ReportResult,
  RiskLabel,
  SummaryDigest,
  TopContractorRow,
} from './core/types.js';

export {
  BASELINE_YEAR,
  HIGH_DELAY_THRESHOLD_DAYS,
  HIGH_RISK_THRESHOLD,
  MIN_CONTRACTOR_PROJECTS,
  RELIABILITY_DELAY_HORIZON_DAYS,
  RELIABILITY_INDEX_CAP,
  TOP_CONTRACTORS_LIMIT,
} from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Errors
// ─────────────────────────────────────────────────────────────────────────────

export type { ReportWriteError } from './core/errors.js';
export { createReportWriteError } from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Ports
// ─────────────────────────────────────────────────────────────────────────────

export type { ReportArtifact, ReportSink } from './core/ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Serialization
// ─────────────────────────────────────────────────────────────────────────────

export {
  REPORT_FILES,
  escapeCsvField,
  formatCsv,
  formatJson,
  toSummaryJson,
  toReportArtifacts,
  REGIONAL_EFFICIENCY_COLUMNS,
  TOP_CONTRACTOR_COLUMNS,
  COST_OVERRUN_TREND_COLUMNS,
  type CsvColumn,
  type SummaryJson,
} from './core/serialization.js';

export {
  withThousandsSeparators,
  truncate,
  renderTable,
  REGIONAL_EFFICIENCY_DISPLAY,
  TOP_CONTRACTOR_DISPLAY,
  COST_OVERRUN_TREND_DISPLAY,
  type ColumnAlign,
  type DisplayColumn,
} from './core/display.js';

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export {
  buildRegionalEfficiency,
  rawEfficiencyScore,
  resolveRawScores,
} from './core/usecases/build-regional-efficiency.js';

export {
  buildTopContractors,
  reliabilityIndex,
  riskLabelFor,
} from './core/usecases/build-top-contractors.js';

export { buildCostOverrunTrends } from './core/usecases/build-cost-overrun-trends.js';

export { buildSummary, isContractorPlaceholder } from './core/usecases/build-summary.js';

export { buildReports, collectNotices } from './core/usecases/build-reports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell - Repository Implementation
// ─────────────────────────────────────────────────────────────────────────────

export { createFsReportSink, type FsReportSinkOptions } from './shell/repo/fs-report-sink.js';
