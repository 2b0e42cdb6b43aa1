/**
 * Build Regional Efficiency Use Case (Report 1)
 *
 * Groups projects by (Region, MainIsland) and scores each group by median
 * savings per day of average delay, normalized across the report.
 */

import { Decimal } from 'decimal.js';

import {
  aggregate,
  compareText,
  groupBy,
  mean,
  median,
  minMaxNormalize,
  percentage,
  sum,
} from '../../../aggregation/index.js';
import {
  HIGH_DELAY_THRESHOLD_DAYS,
  type RegionalEfficiencyRow,
  type ReportNotice,
  type ReportResult,
} from '../types.js';

import type { ProjectRecord } from '../../../projects/index.js';

const ZERO = new Decimal(0);

interface RegionalMetrics {
  readonly totalBudget: Decimal;
  readonly medianSavings: Decimal;
  readonly avgDelay: Decimal;
  readonly highDelayPct: Decimal;
}

const summarizeRegion = (members: readonly ProjectRecord[]): RegionalMetrics => {
  const delays = members.map((project) => new Decimal(project.completionDelayDays));
  return {
    totalBudget: sum(members.map((project) => project.approvedBudgetForContract)),
    // groups are never empty
    medianSavings: median(members.map((project) => project.costSavings)) ?? ZERO,
    avgDelay: mean(delays) ?? ZERO,
    highDelayPct: percentage((delay) => delay.greaterThan(HIGH_DELAY_THRESHOLD_DAYS), delays),
  };
};

/**
 * Raw score: median savings / average delay * 100, or null when the average
 * delay is zero.
 */
export const rawEfficiencyScore = (medianSavings: Decimal, avgDelay: Decimal): Decimal | null =>
  avgDelay.isZero() ? null : medianSavings.div(avgDelay).times(100);

/**
 * Replaces undefined raw scores with the highest defined one, or 0 when none
 * is defined.
 */
export const resolveRawScores = (scores: readonly (Decimal | null)[]): Decimal[] => {
  let highest: Decimal | null = null;
  for (const score of scores) {
    if (score !== null && (highest === null || score.greaterThan(highest))) {
      highest = score;
    }
  }
  const fallback = highest ?? ZERO;
  return scores.map((score) => score ?? fallback);
};

const compareRegionalRows = (a: RegionalEfficiencyRow, b: RegionalEfficiencyRow): number =>
  b.efficiencyScore.comparedTo(a.efficiencyScore) ||
  b.totalBudget.comparedTo(a.totalBudget) ||
  compareText(a.region, b.region) ||
  compareText(a.mainIsland, b.mainIsland);

/**
 * Builds Report 1.
 *
 * @param records - Cleaned records in input order
 */
export const buildRegionalEfficiency = (
  records: readonly ProjectRecord[]
): ReportResult<RegionalEfficiencyRow> => {
  const groups = aggregate(
    groupBy(records, (project) => [project.region, project.mainIsland] as const),
    summarizeRegion
  );

  // Pass 1: raw scores for every group
  const rawScores = groups.map((group) =>
    rawEfficiencyScore(group.metrics.medianSavings, group.metrics.avgDelay)
  );
  const resolved = resolveRawScores(rawScores);

  const notices: ReportNotice[] = [];
  groups.forEach((group, index) => {
    if (rawScores[index] !== null) return;
    const [region, mainIsland] = group.key;
    notices.push({
      report: 'regional-efficiency',
      type: 'ZERO_DELAY_SCORE_FALLBACK',
      key: [region, mainIsland],
      message: `Average delay is 0 for ${region} / ${mainIsland}; raw efficiency score set to ${
        resolved[index]?.toString() ?? '0'
      }`,
    });
  });

  // Pass 2: normalize over the whole report
  const normalized = minMaxNormalize(resolved);

  const rows = groups.map((group, index): RegionalEfficiencyRow => {
    const [region, mainIsland] = group.key;
    return {
      region,
      mainIsland,
      projectCount: group.count,
      ...group.metrics,
      rawScore: resolved[index] ?? ZERO,
      efficiencyScore: normalized[index] ?? ZERO,
    };
  });

  return { rows: rows.sort(compareRegionalRows), notices };
};
