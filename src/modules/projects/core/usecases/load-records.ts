/**
 * Load Records Use Case
 *
 * Splits CSV text into raw field mappings and rejects rows that cannot be
 * parsed. A bad row never aborts the load; only a missing or incomplete
 * header (or broken CSV framing) does.
 */

import { parse } from 'csv-parse/sync';
import { err, ok, type Result } from 'neverthrow';

import {
  createCsvParseError,
  createHeaderMismatchError,
  createMissingHeaderError,
  type ProjectLoadError,
} from '../errors.js';
import { parseCalendarDate, parseDecimal } from '../parsing.js';
import {
  COLUMN_ALIASES,
  NULLABLE_COLUMNS,
  OPTIONAL_COLUMNS,
  REQUIRED_COLUMNS,
  type LoadResult,
  type LoadedProjectRow,
  type ParsedRowValues,
  type ProjectColumn,
  type RawProjectRow,
  type RejectReason,
  type RowIssue,
} from '../types.js';

// ─────────────────────────────────────────────────────────────────────────────
// CSV Framing
// ─────────────────────────────────────────────────────────────────────────────

interface ParsedLine {
  readonly cells: readonly string[];
  /** Source line the record ends on */
  readonly line: number;
}

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((cell) => typeof cell === 'string');

const lineOf = (entry: object, fallback: number): number => {
  if ('info' in entry && typeof entry.info === 'object' && entry.info !== null) {
    const info = entry.info;
    if ('lines' in info && typeof info.lines === 'number') {
      return info.lines;
    }
  }
  return fallback;
};

const unexpectedShape = (index: number): ProjectLoadError =>
  createCsvParseError(new Error(`Unexpected record shape at index ${String(index)}`));

const splitCsv = (csvText: string): Result<ParsedLine[], ProjectLoadError> => {
  let parsed: unknown;
  try {
    parsed = parse(csvText, {
      bom: true,
      info: true,
      relax_column_count: true,
      relax_quotes: true,
      skip_empty_lines: true,
    });
  } catch (error) {
    return err(createCsvParseError(error));
  }

  if (!Array.isArray(parsed)) {
    return err(createCsvParseError(new Error('Parser returned no records')));
  }

  const records: unknown[] = parsed;
  const lines: ParsedLine[] = [];
  for (const [index, entry] of records.entries()) {
    if (typeof entry !== 'object' || entry === null || !('record' in entry)) {
      return err(unexpectedShape(index));
    }
    const cells = entry.record;
    if (!isStringArray(cells)) {
      return err(unexpectedShape(index));
    }
    lines.push({ cells, line: lineOf(entry, index + 1) });
  }

  return ok(lines);
};

// ─────────────────────────────────────────────────────────────────────────────
// Header
// ─────────────────────────────────────────────────────────────────────────────

const ALL_COLUMNS: readonly ProjectColumn[] = [...REQUIRED_COLUMNS, ...OPTIONAL_COLUMNS];

const normalizeHeader = (cell: string): string => cell.replace(/^\uFEFF/, '').trim().toLowerCase();

/**
 * Maps each known column to its cell index.
 * Exact names win over aliases; the first occurrence of a name wins.
 */
export const resolveHeader = (
  headerCells: readonly string[]
): Result<ReadonlyMap<ProjectColumn, number>, ProjectLoadError> => {
  const names = headerCells.map(normalizeHeader);
  if (names.every((name) => name === '')) {
    return err(createMissingHeaderError());
  }

  const byName = new Map(ALL_COLUMNS.map((column) => [column.toLowerCase(), column]));
  const index = new Map<ProjectColumn, number>();

  names.forEach((name, position) => {
    const column = byName.get(name);
    if (column !== undefined && !index.has(column)) index.set(column, position);
  });

  names.forEach((name, position) => {
    const column = COLUMN_ALIASES[name];
    if (column !== undefined && !index.has(column)) index.set(column, position);
  });

  const missing = REQUIRED_COLUMNS.filter((column) => !index.has(column));
  if (missing.length > 0) {
    return err(createHeaderMismatchError(missing));
  }

  return ok(index);
};

// ─────────────────────────────────────────────────────────────────────────────
// Row Validation
// ─────────────────────────────────────────────────────────────────────────────

const MANDATORY_COLUMNS = REQUIRED_COLUMNS.filter((column) => !NULLABLE_COLUMNS.includes(column));

const missingField = (rowNumber: number, column: ProjectColumn): RowIssue<RejectReason> => ({
  rowNumber,
  reason: 'MISSING_REQUIRED_FIELD',
  column,
  message: `Missing required field ${column}`,
});

const nonNumeric = (row: RawProjectRow, column: ProjectColumn): RowIssue<RejectReason> => ({
  rowNumber: row.rowNumber,
  reason: 'NON_NUMERIC_CURRENCY',
  column,
  value: row.fields[column],
  message: `Non-numeric ${column} '${row.fields[column]}'`,
});

const malformedDate = (row: RawProjectRow, column: ProjectColumn): RowIssue<RejectReason> => ({
  rowNumber: row.rowNumber,
  reason: 'MALFORMED_DATE',
  column,
  value: row.fields[column],
  message: `Malformed ${column} '${row.fields[column]}'`,
});

/**
 * Parses the currency and date cells of a row, or reports its first problem.
 *
 * Checks run in a fixed order: blank required fields, then currency
 * fields, then dates.
 */
export const parseRowValues = (
  row: RawProjectRow
): Result<ParsedRowValues, RowIssue<RejectReason>> => {
  const { rowNumber, fields } = row;

  const blank = MANDATORY_COLUMNS.find((column) => fields[column] === '');
  if (blank !== undefined) {
    return err(missingField(rowNumber, blank));
  }

  const approvedBudgetForContract = parseDecimal(fields.ApprovedBudgetForContract);
  if (approvedBudgetForContract === null) {
    return err(nonNumeric(row, 'ApprovedBudgetForContract'));
  }
  const contractCost = parseDecimal(fields.ContractCost);
  if (contractCost === null) {
    return err(nonNumeric(row, 'ContractCost'));
  }

  const startDate = parseCalendarDate(fields.StartDate);
  if (startDate === null) {
    return err(malformedDate(row, 'StartDate'));
  }
  const actualCompletionDate = parseCalendarDate(fields.ActualCompletionDate);
  if (actualCompletionDate === null) {
    return err(malformedDate(row, 'ActualCompletionDate'));
  }

  return ok({ approvedBudgetForContract, contractCost, startDate, actualCompletionDate });
};

const toRawRow = (
  line: ParsedLine,
  header: ReadonlyMap<ProjectColumn, number>
): RawProjectRow => {
  const cell = (column: ProjectColumn): string => {
    const position = header.get(column);
    return position === undefined ? '' : (line.cells[position] ?? '').trim();
  };

  const fields: Record<ProjectColumn, string> = {
    Region: cell('Region'),
    MainIsland: cell('MainIsland'),
    Province: cell('Province'),
    Contractor: cell('Contractor'),
    TypeOfWork: cell('TypeOfWork'),
    FundingYear: cell('FundingYear'),
    ApprovedBudgetForContract: cell('ApprovedBudgetForContract'),
    ContractCost: cell('ContractCost'),
    StartDate: cell('StartDate'),
    ActualCompletionDate: cell('ActualCompletionDate'),
    Latitude: cell('Latitude'),
    Longitude: cell('Longitude'),
    ProjectId: cell('ProjectId'),
    ContractId: cell('ContractId'),
  };

  return { rowNumber: line.line, fields };
};

// ─────────────────────────────────────────────────────────────────────────────
// Use Case
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Parses CSV text into raw project rows.
 *
 * @param csvText - Whole file contents
 * @returns Usable rows, the count of every data row seen, and rejected rows
 */
export const loadRecords = (csvText: string): Result<LoadResult, ProjectLoadError> => {
  const splitResult = splitCsv(csvText);
  if (splitResult.isErr()) {
    return err(splitResult.error);
  }

  const [headerLine, ...dataLines] = splitResult.value;
  if (headerLine === undefined) {
    return err(createMissingHeaderError());
  }

  const headerResult = resolveHeader(headerLine.cells);
  if (headerResult.isErr()) {
    return err(headerResult.error);
  }

  const rows: LoadedProjectRow[] = [];
  const rejected: RowIssue<RejectReason>[] = [];

  for (const line of dataLines) {
    const row = toRawRow(line, headerResult.value);
    const parsed = parseRowValues(row);
    if (parsed.isOk()) {
      rows.push({ ...row, values: parsed.value });
    } else {
      rejected.push(parsed.error);
    }
  }

  return ok({ rows, totalRows: dataLines.length, rejected });
};
