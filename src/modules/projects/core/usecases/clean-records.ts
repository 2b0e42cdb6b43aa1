/**
 * Clean Records Use Case
 *
 * Turns raw rows into typed project records. Steps run in a fixed order:
 * 1. Type coercion (rows that fail are dropped)
 * 2. Funding year filter
 * 3. Geocoordinate imputation (two passes over the year-filtered rows)
 * 4. Derived fields (cost savings, completion delay)
 *
 * Surviving records keep input order.
 */

import { imputeCoordinates, type LocatedProject } from '../imputation.js';
import {
  daysBetween,
  formatCalendarDate,
  normalizeText,
  parseCoordinate,
  parseFundingYear,
} from '../parsing.js';
import {
  ANALYSIS_YEARS,
  type CleanResult,
  type CoercedProject,
  type LoadedProjectRow,
  type ProjectRecord,
  type RowIssue,
  type RowWarning,
} from '../types.js';

import type { Decimal } from 'decimal.js';

// ─────────────────────────────────────────────────────────────────────────────
// Step 1: Coercion
// ─────────────────────────────────────────────────────────────────────────────

type CoercionResult =
  | { readonly kind: 'ok'; readonly project: CoercedProject }
  | { readonly kind: 'dropped'; readonly issue: RowIssue };

const optionalText = (value: string): string | null => {
  const text = normalizeText(value);
  return text === '' ? null : text;
};

const negativeCurrency = (
  row: LoadedProjectRow,
  column: 'ApprovedBudgetForContract' | 'ContractCost'
): RowIssue => ({
  rowNumber: row.rowNumber,
  reason: 'NEGATIVE_CURRENCY',
  column,
  value: row.fields[column],
  message: `Negative ${column} '${row.fields[column]}'`,
});

/**
 * Coerces the remaining cells of a loaded row into typed values.
 */
export const coerceRow = (row: LoadedProjectRow): CoercionResult => {
  const { fields, rowNumber } = row;
  const { approvedBudgetForContract, contractCost, startDate, actualCompletionDate } = row.values;

  const fundingYear = parseFundingYear(fields.FundingYear);
  if (fundingYear === null) {
    return {
      kind: 'dropped',
      issue: {
        rowNumber,
        reason: 'INVALID_FUNDING_YEAR',
        column: 'FundingYear',
        value: fields.FundingYear,
        message: `Invalid FundingYear '${fields.FundingYear}'`,
      },
    };
  }

  if (approvedBudgetForContract.isNegative()) {
    return { kind: 'dropped', issue: negativeCurrency(row, 'ApprovedBudgetForContract') };
  }
  if (contractCost.isNegative()) {
    return { kind: 'dropped', issue: negativeCurrency(row, 'ContractCost') };
  }

  return {
    kind: 'ok',
    project: {
      rowNumber,
      projectId: optionalText(fields.ProjectId),
      contractId: optionalText(fields.ContractId),
      region: normalizeText(fields.Region),
      mainIsland: normalizeText(fields.MainIsland),
      province: normalizeText(fields.Province),
      contractor: normalizeText(fields.Contractor),
      typeOfWork: normalizeText(fields.TypeOfWork),
      fundingYear,
      approvedBudgetForContract,
      contractCost,
      startDate,
      actualCompletionDate,
      latitude: parseCoordinate(fields.Latitude, 90),
      longitude: parseCoordinate(fields.Longitude, 180),
    },
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Step 4: Derivation
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Cost savings: approved budget minus contract cost (signed).
 */
export const computeCostSavings = (approved: Decimal, cost: Decimal): Decimal =>
  approved.minus(cost);

const derive = (project: LocatedProject): ProjectRecord => ({
  ...project,
  costSavings: computeCostSavings(project.approvedBudgetForContract, project.contractCost),
  completionDelayDays: daysBetween(project.startDate, project.actualCompletionDate),
});

// ─────────────────────────────────────────────────────────────────────────────
// Use Case
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Cleans raw rows into project records.
 *
 * @param rows - Loaded rows in file order
 */
export const cleanRecords = (rows: readonly LoadedProjectRow[]): CleanResult => {
  const dropped: RowIssue[] = [];
  const coerced: CoercedProject[] = [];

  for (const row of rows) {
    const result = coerceRow(row);
    if (result.kind === 'ok') {
      coerced.push(result.project);
    } else {
      dropped.push(result.issue);
    }
  }

  const inYears = coerced.filter((project) => ANALYSIS_YEARS.includes(project.fundingYear));
  const filteredByYear = coerced.length - inYears.length;

  const imputation = imputeCoordinates(inYears);
  dropped.push(...imputation.dropped);
  dropped.sort((a, b) => a.rowNumber - b.rowNumber);

  const records = imputation.rows.map(derive);

  const warnings: RowWarning[] = records
    .filter((record) => record.completionDelayDays < 0)
    .map((record): RowWarning => ({
      rowNumber: record.rowNumber,
      type: 'COMPLETION_BEFORE_START',
      message: `ActualCompletionDate ${formatCalendarDate(
        record.actualCompletionDate
      )} precedes StartDate ${formatCalendarDate(record.startDate)}`,
    }));

  return {
    records,
    dropped,
    filteredByYear,
    warnings,
    imputed: imputation.imputed,
  };
};
