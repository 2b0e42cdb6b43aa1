/**
 * Unit tests for province coordinate means
 */

import { describe, expect, it } from 'vitest';

import {
  accumulateProvinceCoordinates,
  coerceRow,
  provinceMean,
  type CoercedProject,
  type ProjectColumn,
} from '@/modules/projects/index.js';

import { makeLoadedRow } from '../../fixtures/builders.js';

const coerced = (overrides: Partial<Record<ProjectColumn, string>>): CoercedProject => {
  const result = coerceRow(makeLoadedRow(overrides));
  if (result.kind !== 'ok') {
    throw new Error(`Fixture row was dropped: ${result.issue.message}`);
  }
  return result.project;
};

describe('accumulateProvinceCoordinates', () => {
  it('totals known values per province and axis', () => {
    const totals = accumulateProvinceCoordinates([
      coerced({ Province: 'Cebu', Latitude: '10', Longitude: '' }),
      coerced({ Province: 'Cebu', Latitude: '12', Longitude: '121' }),
      coerced({ Province: 'Bohol', Latitude: '', Longitude: '' }),
    ]);

    expect(totals.get('Cebu')?.latitude.count).toBe(2);
    expect(totals.get('Cebu')?.latitude.sum.toString()).toBe('22');
    expect(totals.get('Cebu')?.longitude.count).toBe(1);
    expect(totals.get('Bohol')?.latitude.count).toBe(0);
  });
});

describe('provinceMean', () => {
  it('averages the known values to full precision', () => {
    const totals = accumulateProvinceCoordinates([
      coerced({ Province: 'Cebu', Latitude: '14.123456' }),
      coerced({ Province: 'Cebu', Latitude: '14.654321' }),
    ]);

    expect(provinceMean(totals, 'Cebu', 'latitude')?.toFixed(6)).toBe('14.388889');
  });

  it('is null for a province without known values', () => {
    const totals = accumulateProvinceCoordinates([
      coerced({ Province: 'Bohol', Latitude: '', Longitude: '' }),
    ]);

    expect(provinceMean(totals, 'Bohol', 'latitude')).toBeNull();
    expect(provinceMean(totals, 'Siquijor', 'longitude')).toBeNull();
  });
});
