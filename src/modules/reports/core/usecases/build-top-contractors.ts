/**
 * Build Top Contractors Use Case (Report 2)
 *
 * Ranks contractors with enough projects by total contract cost and scores
 * them with a reliability index that blends delay and savings.
 */

import { Decimal } from 'decimal.js';

import {
  aggregate,
  cappedRatio,
  compareDecimalDesc,
  compareText,
  groupBy,
  mean,
  sum,
} from '../../../aggregation/index.js';
import {
  HIGH_RISK_THRESHOLD,
  MIN_CONTRACTOR_PROJECTS,
  RELIABILITY_DELAY_HORIZON_DAYS,
  RELIABILITY_INDEX_CAP,
  TOP_CONTRACTORS_LIMIT,
  type ReportNotice,
  type ReportResult,
  type RiskLabel,
  type TopContractorRow,
} from '../types.js';

import type { ProjectRecord } from '../../../projects/index.js';

const ZERO = new Decimal(0);
const ONE = new Decimal(1);
const CAP = new Decimal(RELIABILITY_INDEX_CAP);

/**
 * (1 - avgDelay / 90) * (totalSavings / totalCost) * 100, capped at 100.
 * Not floored: a negative index is a valid result.
 * Returns null when the total cost is zero.
 */
export const reliabilityIndex = (
  avgDelay: Decimal,
  totalSavings: Decimal,
  totalCost: Decimal
): Decimal | null => {
  if (totalCost.isZero()) return null;
  const delayFactor = ONE.minus(avgDelay.div(RELIABILITY_DELAY_HORIZON_DAYS));
  const savingsRatio = totalSavings.div(totalCost);
  return cappedRatio(delayFactor.times(savingsRatio).times(100), null, CAP);
};

export const riskLabelFor = (index: Decimal | null): RiskLabel =>
  index === null || index.lessThan(HIGH_RISK_THRESHOLD) ? 'High Risk' : 'Normal';

type UnrankedRow = Omit<TopContractorRow, 'rank'>;

const compareContractors = (a: UnrankedRow, b: UnrankedRow): number =>
  b.totalCost.comparedTo(a.totalCost) ||
  compareDecimalDesc(a.reliabilityIndex, b.reliabilityIndex) ||
  compareText(a.contractor, b.contractor);

/**
 * Builds Report 2.
 *
 * @param records - Cleaned records in input order
 */
export const buildTopContractors = (
  records: readonly ProjectRecord[]
): ReportResult<TopContractorRow> => {
  const eligible = groupBy(records, (project) => [project.contractor] as const).filter(
    (group) => group.members.length >= MIN_CONTRACTOR_PROJECTS
  );

  const groups = aggregate(eligible, (members) => ({
    totalCost: sum(members.map((project) => project.contractCost)),
    // groups are never empty
    avgDelay: mean(members.map((project) => new Decimal(project.completionDelayDays))) ?? ZERO,
    totalSavings: sum(members.map((project) => project.costSavings)),
  }));

  const notices: ReportNotice[] = [];

  const unranked = groups.map((group): UnrankedRow => {
    const [contractor] = group.key;
    const { totalCost, avgDelay, totalSavings } = group.metrics;
    const index = reliabilityIndex(avgDelay, totalSavings, totalCost);

    if (index === null) {
      notices.push({
        report: 'top-contractors',
        type: 'ZERO_COST_RELIABILITY',
        key: [contractor],
        message: `Total contract cost is 0 for ${contractor}; reliability index left empty`,
      });
    }

    return {
      contractor,
      totalCost,
      numProjects: group.count,
      avgDelay,
      totalSavings,
      reliabilityIndex: index,
      riskLabel: riskLabelFor(index),
    };
  });

  const rows = unranked
    .sort(compareContractors)
    .slice(0, TOP_CONTRACTORS_LIMIT)
    .map((row, position): TopContractorRow => ({ rank: position + 1, ...row }));

  return { rows, notices };
};
