import type { ProjectLoadError, RowIssue, RowWarning } from '../../projects/index.js';
import type { ReportBundle, ReportNotice, ReportWriteError } from '../../reports/index.js';

/**
 * Row counts for one run.
 */
export interface RunCounts {
  /** Data rows in the file, rejected ones included */
  readonly totalRows: number;
  readonly rejectedRows: number;
  readonly droppedRows: number;
  /** Rows outside the analysis years */
  readonly filteredByYear: number;
  readonly cleanRecords: number;
  readonly imputedLatitude: number;
  readonly imputedLongitude: number;
}

/**
 * Everything a run resolved without aborting: row-level and
 * computation-level issues. Written next to the reports as run-log.json.
 */
export interface RunLog {
  readonly source: string;
  readonly counts: RunCounts;
  /** Rows the loader could not parse */
  readonly rejected: readonly RowIssue[];
  /** Rows the cleaner excluded */
  readonly dropped: readonly RowIssue[];
  readonly warnings: readonly RowWarning[];
  readonly notices: readonly ReportNotice[];
  /** Output file names, in write order */
  readonly files: readonly string[];
}

export type PipelineError = ProjectLoadError | ReportWriteError;

export interface PipelineOutcome {
  readonly reports: ReportBundle;
  readonly runLog: RunLog;
  /** Paths the sink wrote */
  readonly written: readonly string[];
}
