/**
 * Reports Module - Domain Errors
 */

export interface ReportWriteError {
  readonly type: 'ReportWriteError';
  readonly message: string;
  /** Output path that failed */
  readonly path: string;
  readonly cause?: unknown;
}

export const createReportWriteError = (path: string, cause?: unknown): ReportWriteError => ({
  type: 'ReportWriteError',
  message: `Failed to write report output at ${path}${
    cause instanceof Error ? `: ${cause.message}` : ''
  }`,
  path,
  cause,
});
