/**
 * Projects Module - Domain Errors
 *
 * Fatal errors only: any of these aborts the run before reports are built.
 * Row-level problems are not errors; they are reported as RowIssue values.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Infrastructure Errors
// ─────────────────────────────────────────────────────────────────────────────

export interface FileNotFoundError {
  readonly type: 'FileNotFoundError';
  readonly message: string;
  readonly path: string;
}

export interface FileReadError {
  readonly type: 'FileReadError';
  readonly message: string;
  readonly path: string;
  readonly cause?: unknown;
}

// ─────────────────────────────────────────────────────────────────────────────
// Format Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * The input has no header row.
 */
export interface MissingHeaderError {
  readonly type: 'MissingHeaderError';
  readonly message: string;
}

/**
 * The header row lacks required columns.
 */
export interface HeaderMismatchError {
  readonly type: 'HeaderMismatchError';
  readonly message: string;
  readonly missing: readonly string[];
}

/**
 * The CSV framing itself is broken (e.g. an unterminated quote).
 */
export interface CsvParseError {
  readonly type: 'CsvParseError';
  readonly message: string;
  readonly cause?: unknown;
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Union
// ─────────────────────────────────────────────────────────────────────────────

export type ProjectLoadError =
  | FileNotFoundError
  | FileReadError
  | MissingHeaderError
  | HeaderMismatchError
  | CsvParseError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createFileNotFoundError = (path: string): FileNotFoundError => ({
  type: 'FileNotFoundError',
  message: `Dataset file not found at ${path}`,
  path,
});

export const createFileReadError = (path: string, cause?: unknown): FileReadError => ({
  type: 'FileReadError',
  message: `Failed to read dataset file at ${path}${
    cause instanceof Error ? `: ${cause.message}` : ''
  }`,
  path,
  cause,
});

export const createMissingHeaderError = (): MissingHeaderError => ({
  type: 'MissingHeaderError',
  message: 'Dataset has no header row',
});

export const createHeaderMismatchError = (missing: readonly string[]): HeaderMismatchError => ({
  type: 'HeaderMismatchError',
  message: `Dataset header is missing required columns: ${missing.join(', ')}`,
  missing,
});

export const createCsvParseError = (cause: unknown): CsvParseError => ({
  type: 'CsvParseError',
  message: `Dataset is not valid CSV${cause instanceof Error ? `: ${cause.message}` : ''}`,
  cause,
});
