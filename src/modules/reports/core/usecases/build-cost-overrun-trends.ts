/**
 * Build Cost Overrun Trends Use Case (Report 3)
 *
 * Per (FundingYear, TypeOfWork): average savings, overrun rate, and the
 * change in average savings against the type's baseline-year group.
 */

import { Decimal } from 'decimal.js';

import {
  aggregate,
  compareText,
  groupBy,
  mean,
  percentage,
  percentChange,
} from '../../../aggregation/index.js';
import {
  BASELINE_YEAR,
  type CostOverrunTrendRow,
  type ReportNotice,
  type ReportResult,
} from '../types.js';

import type { ProjectRecord } from '../../../projects/index.js';

const ZERO = new Decimal(0);

const compareTrendRows = (a: CostOverrunTrendRow, b: CostOverrunTrendRow): number =>
  a.fundingYear - b.fundingYear ||
  b.avgSavings.comparedTo(a.avgSavings) ||
  compareText(a.typeOfWork, b.typeOfWork);

/**
 * Builds Report 3.
 *
 * @param records - Cleaned records in input order
 */
export const buildCostOverrunTrends = (
  records: readonly ProjectRecord[]
): ReportResult<CostOverrunTrendRow> => {
  // Pass 1: every (year, type) aggregate
  const groups = aggregate(
    groupBy(records, (project) => [project.fundingYear, project.typeOfWork] as const),
    (members) => {
      const savings = members.map((project) => project.costSavings);
      return {
        // groups are never empty
        avgSavings: mean(savings) ?? ZERO,
        overrunRate: percentage((value) => value.lessThan(0), savings),
      };
    }
  );

  const baselines = new Map<string, Decimal>();
  for (const group of groups) {
    const [year, typeOfWork] = group.key;
    if (year === BASELINE_YEAR) baselines.set(typeOfWork, group.metrics.avgSavings);
  }

  // Pass 2: join each group to its type's baseline
  const notices: ReportNotice[] = [];

  const rows = groups.map((group): CostOverrunTrendRow => {
    const [fundingYear, typeOfWork] = group.key;
    const { avgSavings, overrunRate } = group.metrics;
    let yoyChange: Decimal | null = null;

    if (fundingYear !== BASELINE_YEAR) {
      const baseline = baselines.get(typeOfWork);
      if (baseline === undefined) {
        notices.push({
          report: 'cost-overrun-trends',
          type: 'MISSING_BASELINE_YEAR',
          key: [fundingYear, typeOfWork],
          message: `No ${String(BASELINE_YEAR)} projects for ${typeOfWork}; YoYChange for ${String(
            fundingYear
          )} left empty`,
        });
      } else {
        yoyChange = percentChange(avgSavings, baseline);
        if (yoyChange === null) {
          notices.push({
            report: 'cost-overrun-trends',
            type: 'ZERO_BASELINE_SAVINGS',
            key: [fundingYear, typeOfWork],
            message: `Average ${String(BASELINE_YEAR)} savings is 0 for ${typeOfWork}; YoYChange for ${String(
              fundingYear
            )} left empty`,
          });
        }
      }
    }

    return {
      fundingYear,
      typeOfWork,
      totalProjects: group.count,
      avgSavings,
      overrunRate,
      yoyChange,
    };
  });

  return { rows: rows.sort(compareTrendRows), notices };
};
