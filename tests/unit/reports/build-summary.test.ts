/**
 * Unit tests for build-summary use case
 */

import { describe, expect, it } from 'vitest';

import { buildSummary, isContractorPlaceholder } from '@/modules/reports/index.js';

import { makeProjectRecord } from '../../fixtures/builders.js';

describe('buildSummary use case', () => {
  it('rolls up the whole record set', () => {
    const summary = buildSummary([
      makeProjectRecord({ contractor: 'Alpha Builders', province: 'Cebu', cost: 900, delayDays: 10 }),
      makeProjectRecord({ contractor: 'ALPHA BUILDERS', province: 'cebu', cost: 950, delayDays: 20 }),
      makeProjectRecord({ contractor: 'Beta Corp', province: 'Bohol', cost: 1100, delayDays: 30 }),
      makeProjectRecord({
        contractor: 'Gamma (clustered with Contract ID 21A00001)',
        province: 'Bohol',
        cost: 1000,
        delayDays: 40,
      }),
    ]);

    expect(summary.totalProjects).toBe(4);
    expect(summary.totalContractors).toBe(2);
    expect(summary.totalProvinces).toBe(2);
    expect(summary.globalAvgDelay?.toString()).toBe('25');
    expect(summary.globalTotalSavings.toString()).toBe('50');
  });

  it('counts contractors regardless of how many projects they have', () => {
    const summary = buildSummary([
      makeProjectRecord({ contractor: 'One' }),
      makeProjectRecord({ contractor: 'Two' }),
      makeProjectRecord({ contractor: 'Three' }),
    ]);

    expect(summary.totalContractors).toBe(3);
  });

  it('handles an empty record set', () => {
    const summary = buildSummary([]);

    expect(summary.totalProjects).toBe(0);
    expect(summary.totalContractors).toBe(0);
    expect(summary.totalProvinces).toBe(0);
    expect(summary.globalAvgDelay).toBeNull();
    expect(summary.globalTotalSavings.toString()).toBe('0');
  });
});

describe('isContractorPlaceholder', () => {
  it.each([
    ['clustered with contract ID 22B00012', true],
    ['MYCA WITH PROJECT ID 1234', true],
    ['Alpha Builders', false],
  ])('%j -> %s', (name, expected) => {
    expect(isContractorPlaceholder(name)).toBe(expected);
  });
});
