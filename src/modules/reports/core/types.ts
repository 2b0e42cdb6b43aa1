import type { Decimal } from 'decimal.js';

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/** Completion delay (days) above which a project counts as highly delayed */
export const HIGH_DELAY_THRESHOLD_DAYS = 30;

/** Contractors with fewer projects are left out of the ranking */
export const MIN_CONTRACTOR_PROJECTS = 5;

/** Length of the contractor ranking */
export const TOP_CONTRACTORS_LIMIT = 15;

/** Average delay at which the delay factor of the reliability index reaches zero */
export const RELIABILITY_DELAY_HORIZON_DAYS = 90;

/** Upper cap of the reliability index */
export const RELIABILITY_INDEX_CAP = 100;

/** Reliability index below which a contractor is flagged */
export const HIGH_RISK_THRESHOLD = 50;

/** Reference year for year-over-year changes */
export const BASELINE_YEAR = 2021;

// ─────────────────────────────────────────────────────────────────────────────
// Report Rows
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Report 1: one (Region, MainIsland) group.
 */
export interface RegionalEfficiencyRow {
  readonly region: string;
  readonly mainIsland: string;
  readonly projectCount: number;
  readonly totalBudget: Decimal;
  readonly medianSavings: Decimal;
  readonly avgDelay: Decimal;
  readonly highDelayPct: Decimal;
  /** Score before normalization, after the zero-delay fallback */
  readonly rawScore: Decimal;
  /** Min-max normalized into [0, 100] */
  readonly efficiencyScore: Decimal;
}

export type RiskLabel = 'High Risk' | 'Normal';

/**
 * Report 2: one ranked contractor.
 */
export interface TopContractorRow {
  /** 1-based */
  readonly rank: number;
  readonly contractor: string;
  readonly totalCost: Decimal;
  readonly numProjects: number;
  readonly avgDelay: Decimal;
  readonly totalSavings: Decimal;
  /** null when the contractor's total cost is zero */
  readonly reliabilityIndex: Decimal | null;
  readonly riskLabel: RiskLabel;
}

/**
 * Report 3: one (FundingYear, TypeOfWork) group.
 */
export interface CostOverrunTrendRow {
  readonly fundingYear: number;
  readonly typeOfWork: string;
  readonly totalProjects: number;
  readonly avgSavings: Decimal;
  readonly overrunRate: Decimal;
  /** null for the baseline year and when no usable baseline exists */
  readonly yoyChange: Decimal | null;
}

/**
 * Cross-report rollup over the whole cleaned set.
 */
export interface SummaryDigest {
  readonly totalProjects: number;
  readonly totalContractors: number;
  readonly totalProvinces: number;
  /** null when there are no records */
  readonly globalAvgDelay: Decimal | null;
  readonly globalTotalSavings: Decimal;
}

// ─────────────────────────────────────────────────────────────────────────────
// Notices
// ─────────────────────────────────────────────────────────────────────────────

export type ReportNoticeType =
  | 'ZERO_DELAY_SCORE_FALLBACK'
  | 'ZERO_COST_RELIABILITY'
  | 'MISSING_BASELINE_YEAR'
  | 'ZERO_BASELINE_SAVINGS';

/**
 * A degenerate computation resolved by a fixed policy.
 */
export interface ReportNotice {
  readonly report: ReportId;
  readonly type: ReportNoticeType;
  /** Group key the notice applies to */
  readonly key: readonly (string | number)[];
  readonly message: string;
}

export type ReportId = 'regional-efficiency' | 'top-contractors' | 'cost-overrun-trends';

export interface ReportResult<R> {
  readonly rows: readonly R[];
  readonly notices: readonly ReportNotice[];
}

/**
 * Everything one run produces before serialization.
 */
export interface ReportBundle {
  readonly regionalEfficiency: ReportResult<RegionalEfficiencyRow>;
  readonly topContractors: ReportResult<TopContractorRow>;
  readonly costOverrunTrends: ReportResult<CostOverrunTrendRow>;
  readonly summary: SummaryDigest;
}
