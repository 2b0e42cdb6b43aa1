import type { Decimal } from 'decimal.js';

// ─────────────────────────────────────────────────────────────────────────────
// Columns
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Columns every input file must provide.
 */
export const REQUIRED_COLUMNS = [
  'Region',
  'MainIsland',
  'Province',
  'Contractor',
  'TypeOfWork',
  'FundingYear',
  'ApprovedBudgetForContract',
  'ContractCost',
  'StartDate',
  'ActualCompletionDate',
  'Latitude',
  'Longitude',
] as const;

/**
 * Columns carried through when present.
 */
export const OPTIONAL_COLUMNS = ['ProjectId', 'ContractId'] as const;

export type RequiredColumn = (typeof REQUIRED_COLUMNS)[number];
export type OptionalColumn = (typeof OPTIONAL_COLUMNS)[number];
export type ProjectColumn = RequiredColumn | OptionalColumn;

/**
 * Alternative header names used by the published dataset.
 * Keys are lowercase.
 */
export const COLUMN_ALIASES: Readonly<Record<string, ProjectColumn>> = {
  projectlatitude: 'Latitude',
  projectlongitude: 'Longitude',
};

/**
 * Required columns whose cells may be blank (filled in by imputation).
 */
export const NULLABLE_COLUMNS: readonly RequiredColumn[] = ['Latitude', 'Longitude'];

/** Funding years kept for analysis */
export const ANALYSIS_YEARS: readonly number[] = [2021, 2022, 2023];

// ─────────────────────────────────────────────────────────────────────────────
// Values
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A date on the proleptic Gregorian calendar, without time or zone.
 */
export interface CalendarDate {
  readonly year: number;
  /** 1-12 */
  readonly month: number;
  /** 1-31 */
  readonly day: number;
}

/**
 * One data row as read from the file: canonical column name to trimmed cell.
 * Optional columns absent from the file read as ''.
 */
export interface RawProjectRow {
  /** Line number in the source file (header is line 1) */
  readonly rowNumber: number;
  readonly fields: Readonly<Record<ProjectColumn, string>>;
}

/**
 * Values every usable row must parse.
 */
export interface ParsedRowValues {
  readonly approvedBudgetForContract: Decimal;
  readonly contractCost: Decimal;
  readonly startDate: CalendarDate;
  readonly actualCompletionDate: CalendarDate;
}

/**
 * A row that passed parse-time validation, with its parsed values.
 */
export interface LoadedProjectRow extends RawProjectRow {
  readonly values: ParsedRowValues;
}

/**
 * Which coordinates were filled in from the province mean.
 */
export interface CoordinateImputation {
  readonly latitude: boolean;
  readonly longitude: boolean;
}

/**
 * A cleaned project row with derived fields.
 */
export interface ProjectRecord {
  readonly rowNumber: number;
  readonly projectId: string | null;
  readonly contractId: string | null;
  readonly region: string;
  readonly mainIsland: string;
  readonly province: string;
  readonly contractor: string;
  readonly typeOfWork: string;
  readonly fundingYear: number;
  readonly approvedBudgetForContract: Decimal;
  readonly contractCost: Decimal;
  readonly startDate: CalendarDate;
  readonly actualCompletionDate: CalendarDate;
  readonly latitude: Decimal;
  readonly longitude: Decimal;
  readonly coordinatesImputed: CoordinateImputation;
  /** approvedBudgetForContract - contractCost; negative means overrun */
  readonly costSavings: Decimal;
  /** Calendar days from start to actual completion */
  readonly completionDelayDays: number;
}

/**
 * A row after type coercion, before imputation and derivation.
 */
export type CoercedProject = Omit<
  ProjectRecord,
  'latitude' | 'longitude' | 'coordinatesImputed' | 'costSavings' | 'completionDelayDays'
> & {
  readonly latitude: Decimal | null;
  readonly longitude: Decimal | null;
};

// ─────────────────────────────────────────────────────────────────────────────
// Row Issues
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Reasons the loader rejects a row.
 */
export type RejectReason = 'MALFORMED_DATE' | 'MISSING_REQUIRED_FIELD' | 'NON_NUMERIC_CURRENCY';

/**
 * Reasons the cleaner drops a row.
 */
export type DropReason =
  | 'INVALID_FUNDING_YEAR'
  | 'NEGATIVE_CURRENCY'
  | 'NO_COORDINATE_FALLBACK';

export type IssueReason = RejectReason | DropReason;

/**
 * A row excluded from processing.
 */
export interface RowIssue<R extends IssueReason = IssueReason> {
  readonly rowNumber: number;
  readonly reason: R;
  readonly column?: ProjectColumn;
  readonly value?: string;
  readonly message: string;
}

/**
 * A row kept despite a suspicious value.
 */
export interface RowWarning {
  readonly rowNumber: number;
  readonly type: 'COMPLETION_BEFORE_START';
  readonly message: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Stage Results
// ─────────────────────────────────────────────────────────────────────────────

export interface LoadResult {
  /** Rows that passed parse-time validation, in file order */
  readonly rows: readonly LoadedProjectRow[];
  /** Every data record seen, rejected ones included */
  readonly totalRows: number;
  readonly rejected: readonly RowIssue<RejectReason>[];
}

export interface CleanResult {
  /** Surviving records, in input order */
  readonly records: readonly ProjectRecord[];
  readonly dropped: readonly RowIssue[];
  /** Rows outside ANALYSIS_YEARS */
  readonly filteredByYear: number;
  readonly warnings: readonly RowWarning[];
  readonly imputed: {
    readonly latitude: number;
    readonly longitude: number;
  };
}
