/**
 * Build Reports Use Case
 *
 * Runs every report builder and the summary over one cleaned record set.
 * The builders are independent and only read the records.
 */

import { buildCostOverrunTrends } from './build-cost-overrun-trends.js';
import { buildRegionalEfficiency } from './build-regional-efficiency.js';
import { buildSummary } from './build-summary.js';
import { buildTopContractors } from './build-top-contractors.js';

import type { ProjectRecord } from '../../../projects/index.js';
import type { ReportBundle, ReportNotice } from '../types.js';

export const buildReports = (records: readonly ProjectRecord[]): ReportBundle => ({
  regionalEfficiency: buildRegionalEfficiency(records),
  topContractors: buildTopContractors(records),
  costOverrunTrends: buildCostOverrunTrends(records),
  summary: buildSummary(records),
});

/**
 * Every notice of a bundle, in report order.
 */
export const collectNotices = (bundle: ReportBundle): ReportNotice[] => [
  ...bundle.regionalEfficiency.notices,
  ...bundle.topContractors.notices,
  ...bundle.costOverrunTrends.notices,
];
