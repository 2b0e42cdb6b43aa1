/**
 * Projects Module - Public API
 *
 * Loading and cleaning of flood-control project rows.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export type {
  CalendarDate,
  CleanResult,
  CoercedProject,
  CoordinateImputation,
  DropReason,
  IssueReason,
  LoadResult,
  LoadedProjectRow,
  OptionalColumn,
  ParsedRowValues,
  ProjectColumn,
  ProjectRecord,
  RawProjectRow,
  RejectReason,
  RequiredColumn,
  RowIssue,
  RowWarning,
} from './core/types.js';

export {
  ANALYSIS_YEARS,
  COLUMN_ALIASES,
  NULLABLE_COLUMNS,
  OPTIONAL_COLUMNS,
  REQUIRED_COLUMNS,
} from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Errors
// ─────────────────────────────────────────────────────────────────────────────

export type {
  ProjectLoadError,
  FileNotFoundError,
  FileReadError,
  MissingHeaderError,
  HeaderMismatchError,
  CsvParseError,
} from './core/errors.js';

export {
  createFileNotFoundError,
  createFileReadError,
  createMissingHeaderError,
  createHeaderMismatchError,
  createCsvParseError,
} from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Ports
// ─────────────────────────────────────────────────────────────────────────────

export type { ProjectSource } from './core/ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Logic
// ─────────────────────────────────────────────────────────────────────────────

export {
  normalizeText,
  nameKey,
  parseDecimal,
  parseFundingYear,
  parseCoordinate,
  parseCalendarDate,
  makeCalendarDate,
  toEpochDay,
  daysBetween,
  formatCalendarDate,
} from './core/parsing.js';

export {
  accumulateProvinceCoordinates,
  provinceMean,
  imputeCoordinates,
  type CoordinateAxis,
  type AxisTotals,
  type ProvinceCoordinateTotals,
  type LocatedProject,
  type ImputationResult,
} from './core/imputation.js';

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export { loadRecords, resolveHeader, parseRowValues } from './core/usecases/load-records.js';

export { cleanRecords, coerceRow, computeCostSavings } from './core/usecases/clean-records.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell - Repository Implementation
// ─────────────────────────────────────────────────────────────────────────────

export {
  createFsProjectSource,
  type FsProjectSourceOptions,
} from './shell/repo/fs-project-source.js';
