/**
 * Build Summary Use Case
 *
 * Rolls the whole cleaned set into one digest. Reads records directly, so
 * no report-level filter affects the counts.
 */

import { Decimal } from 'decimal.js';

import { mean, sum } from '../../../aggregation/index.js';
import { nameKey, type ProjectRecord } from '../../../projects/index.js';

import type { SummaryDigest } from '../types.js';

/**
 * Contractor cells that point at another contract instead of naming a firm.
 */
const CONTRACTOR_PLACEHOLDER_PATTERNS: readonly RegExp[] = [
  /clustered with contract id/i,
  /myca with project id/i,
];

export const isContractorPlaceholder = (contractor: string): boolean =>
  CONTRACTOR_PLACEHOLDER_PATTERNS.some((pattern) => pattern.test(contractor));

const countDistinct = (names: readonly string[]): number =>
  new Set(names.map(nameKey)).size;

/**
 * Builds the summary digest.
 *
 * @param records - Cleaned records in input order
 */
export const buildSummary = (records: readonly ProjectRecord[]): SummaryDigest => ({
  totalProjects: records.length,
  totalContractors: countDistinct(
    records
      .map((project) => project.contractor)
      .filter((contractor) => !isContractorPlaceholder(contractor))
  ),
  totalProvinces: countDistinct(records.map((project) => project.province)),
  globalAvgDelay: mean(records.map((project) => new Decimal(project.completionDelayDays))),
  globalTotalSavings: sum(records.map((project) => project.costSavings)),
});
