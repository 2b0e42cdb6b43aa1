/**
 * Unit tests for build-top-contractors use case (Report 2)
 */

import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import {
  buildTopContractors,
  reliabilityIndex,
  riskLabelFor,
} from '@/modules/reports/index.js';

import { makeContractorRecords } from '../../fixtures/builders.js';

describe('buildTopContractors use case', () => {
  it('leaves out contractors with fewer than 5 projects', () => {
    const { rows } = buildTopContractors([
      ...makeContractorRecords('Small Works', 4, { cost: 100_000 }),
      ...makeContractorRecords('Big Works', 5),
    ]);

    expect(rows.map((row) => row.contractor)).toEqual(['Big Works']);
    expect(rows[0]?.numProjects).toBe(5);
  });

  it('computes totals and the reliability index', () => {
    const { rows } = buildTopContractors(
      makeContractorRecords('Alpha Builders', 5, { approved: 1000, cost: 900, delayDays: 45 })
    );

    const row = rows[0];
    expect(row?.rank).toBe(1);
    expect(row?.totalCost.toString()).toBe('4500');
    expect(row?.totalSavings.toString()).toBe('500');
    expect(row?.avgDelay.toString()).toBe('45');
    expect(row?.reliabilityIndex?.toFixed(2)).toBe('5.56');
    expect(row?.riskLabel).toBe('High Risk');
  });

  it('caps the index at 100', () => {
    const { rows } = buildTopContractors(
      makeContractorRecords('Alpha Builders', 5, { approved: 1000, cost: 100, delayDays: 0 })
    );

    expect(rows[0]?.reliabilityIndex?.toString()).toBe('100');
    expect(rows[0]?.riskLabel).toBe('Normal');
  });

  it('allows a negative index', () => {
    const { rows } = buildTopContractors(
      makeContractorRecords('Slow Builders', 5, { approved: 1000, cost: 900, delayDays: 180 })
    );

    expect(rows[0]?.reliabilityIndex?.toFixed(2)).toBe('-11.11');
    expect(rows[0]?.riskLabel).toBe('High Risk');
  });

  it('leaves the index empty when total cost is zero', () => {
    const { rows, notices } = buildTopContractors(
      makeContractorRecords('Zero Cost Co', 5, { approved: 100, cost: 0 })
    );

    expect(rows[0]?.reliabilityIndex).toBeNull();
    expect(rows[0]?.riskLabel).toBe('High Risk');
    expect(notices).toEqual([
      {
        report: 'top-contractors',
        type: 'ZERO_COST_RELIABILITY',
        key: ['Zero Cost Co'],
        message: 'Total contract cost is 0 for Zero Cost Co; reliability index left empty',
      },
    ]);
  });

  it('keeps the 15 largest by total cost, ranked from 1', () => {
    const records = Array.from({ length: 17 }, (_, index) => {
      const n = index + 1;
      return makeContractorRecords(`C${String(n).padStart(2, '0')}`, 5, {
        approved: n * 200,
        cost: n * 100,
      });
    }).flat();

    const { rows } = buildTopContractors(records);

    expect(rows).toHaveLength(15);
    expect(rows[0]).toMatchObject({ rank: 1, contractor: 'C17' });
    expect(rows[14]).toMatchObject({ rank: 15, contractor: 'C03' });
    for (let i = 1; i < rows.length; i += 1) {
      const previous = rows[i - 1];
      const current = rows[i];
      if (previous === undefined || current === undefined) continue;
      expect(previous.totalCost.greaterThan(current.totalCost)).toBe(true);
    }
  });

  it('breaks cost ties by reliability, then by name', () => {
    const { rows } = buildTopContractors([
      ...makeContractorRecords('Alpha', 5, { delayDays: 45 }),
      ...makeContractorRecords('Gamma', 5, { delayDays: 0 }),
      ...makeContractorRecords('Beta', 5, { delayDays: 0 }),
    ]);

    expect(rows.map((row) => row.contractor)).toEqual(['Beta', 'Gamma', 'Alpha']);
    expect(rows.map((row) => row.rank)).toEqual([1, 2, 3]);
  });
});

describe('reliabilityIndex', () => {
  it('is null for zero total cost', () => {
    expect(reliabilityIndex(new Decimal(10), new Decimal(5), new Decimal(0))).toBeNull();
  });

  it('reaches zero at an average delay of 90 days', () => {
    expect(
      reliabilityIndex(new Decimal(90), new Decimal(500), new Decimal(1000))?.toString()
    ).toBe('0');
  });
});

describe('riskLabelFor', () => {
  it('flags indexes below 50 and missing indexes', () => {
    expect(riskLabelFor(new Decimal('49.99'))).toBe('High Risk');
    expect(riskLabelFor(null)).toBe('High Risk');
  });

  it('treats exactly 50 as normal', () => {
    expect(riskLabelFor(new Decimal(50))).toBe('Normal');
  });
});
