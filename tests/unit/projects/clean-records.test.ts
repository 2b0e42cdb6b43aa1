/**
 * Unit tests for clean-records use case
 *
 * Tests cover:
 * - Derived cost savings and completion delay
 * - Coercion drops (funding year, negative currency)
 * - Funding year filter
 * - Coordinate imputation order and fallbacks
 * - Completion-before-start warnings
 */

import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import { cleanRecords, coerceRow } from '@/modules/projects/index.js';

import { makeLoadedRow } from '../../fixtures/builders.js';

describe('cleanRecords use case', () => {
  describe('derived fields', () => {
    it('computes savings and delay for a single row', () => {
      const result = cleanRecords([
        makeLoadedRow({
          Province: 'A',
          Region: 'R1',
          FundingYear: '2021',
          ApprovedBudgetForContract: '100',
          ContractCost: '80',
          StartDate: '2021-01-01',
          ActualCompletionDate: '2021-02-01',
        }),
      ]);

      expect(result.records).toHaveLength(1);
      expect(result.records[0]?.costSavings.toFixed(2)).toBe('20.00');
      expect(result.records[0]?.completionDelayDays).toBe(31);
    });

    it('keeps savings exact', () => {
      const result = cleanRecords([
        makeLoadedRow({ ApprovedBudgetForContract: '1,000,000.10', ContractCost: '999,999.90' }),
      ]);

      expect(result.records[0]?.costSavings.toString()).toBe('0.2');
    });

    it('yields negative savings for an overrun', () => {
      const result = cleanRecords([
        makeLoadedRow({ ApprovedBudgetForContract: '100', ContractCost: '125.5' }),
      ]);

      expect(result.records[0]?.costSavings.toString()).toBe('-25.5');
    });

    it('normalizes text fields', () => {
      const result = cleanRecords([makeLoadedRow({ Contractor: 'Alpha   Builders' })]);

      expect(result.records[0]?.contractor).toBe('Alpha Builders');
    });
  });

  describe('dropped rows', () => {
    it('drops rows with an unreadable funding year', () => {
      const result = cleanRecords([makeLoadedRow({ FundingYear: 'FY2021' }, 7)]);

      expect(result.records).toEqual([]);
      expect(result.dropped).toEqual([
        {
          rowNumber: 7,
          reason: 'INVALID_FUNDING_YEAR',
          column: 'FundingYear',
          value: 'FY2021',
          message: "Invalid FundingYear 'FY2021'",
        },
      ]);
    });

    it('drops rows with negative currency', () => {
      const result = cleanRecords([makeLoadedRow({ ContractCost: '-5' })]);

      expect(result.dropped[0]?.reason).toBe('NEGATIVE_CURRENCY');
      expect(result.dropped[0]?.message).toBe("Negative ContractCost '-5'");
    });

    it('lists dropped rows by row number', () => {
      const result = cleanRecords([
        makeLoadedRow({ Province: 'Nowhere', Latitude: '', Longitude: '' }, 2),
        makeLoadedRow({ FundingYear: 'x' }, 3),
      ]);

      expect(result.dropped.map((issue) => issue.rowNumber)).toEqual([2, 3]);
      expect(result.dropped.map((issue) => issue.reason)).toEqual([
        'NO_COORDINATE_FALLBACK',
        'INVALID_FUNDING_YEAR',
      ]);
    });
  });

  describe('year filter', () => {
    it('keeps only 2021 to 2023 and counts the rest', () => {
      const result = cleanRecords([
        makeLoadedRow({ FundingYear: '2020' }, 2),
        makeLoadedRow({ FundingYear: '2021' }, 3),
        makeLoadedRow({ FundingYear: '2023' }, 4),
        makeLoadedRow({ FundingYear: '2024' }, 5),
      ]);

      expect(result.records.map((record) => record.rowNumber)).toEqual([3, 4]);
      expect(result.filteredByYear).toBe(2);
      expect(result.dropped).toEqual([]);
    });

    it('filters before imputing', () => {
      const result = cleanRecords([
        makeLoadedRow({ Province: 'Benguet', FundingYear: '2024', Latitude: '16.4', Longitude: '120.6' }, 2),
        makeLoadedRow({ Province: 'Benguet', FundingYear: '2022', Latitude: '', Longitude: '' }, 3),
      ]);

      expect(result.records).toEqual([]);
      expect(result.dropped[0]?.reason).toBe('NO_COORDINATE_FALLBACK');
    });
  });

  describe('coordinate imputation', () => {
    it('fills missing coordinates from the province mean', () => {
      const result = cleanRecords([
        makeLoadedRow({ Province: 'Cebu', Latitude: '10', Longitude: '120' }, 2),
        makeLoadedRow({ Province: 'Cebu', Latitude: '', Longitude: '' }, 3),
        makeLoadedRow({ Province: 'Cebu', Latitude: '12', Longitude: '122' }, 4),
      ]);

      const imputed = result.records[1];
      expect(imputed?.rowNumber).toBe(3);
      expect(imputed?.latitude.toString()).toBe('11');
      expect(imputed?.longitude.toString()).toBe('121');
      expect(imputed?.coordinatesImputed).toEqual({ latitude: true, longitude: true });
      expect(result.imputed).toEqual({ latitude: 1, longitude: 1 });
    });

    it('never averages imputed values into other rows', () => {
      const result = cleanRecords([
        makeLoadedRow({ Province: 'Cebu', Latitude: '', Longitude: '' }, 2),
        makeLoadedRow({ Province: 'Cebu', Latitude: '10', Longitude: '120' }, 3),
        makeLoadedRow({ Province: 'Cebu', Latitude: '', Longitude: '' }, 4),
      ]);

      expect(result.records.map((record) => record.latitude.toString())).toEqual(['10', '10', '10']);
      expect(result.imputed).toEqual({ latitude: 2, longitude: 2 });
    });

    it('imputes each axis independently', () => {
      const result = cleanRecords([
        makeLoadedRow({ Province: 'Cebu', Latitude: '10', Longitude: '120' }, 2),
        makeLoadedRow({ Province: 'Cebu', Latitude: '', Longitude: '124' }, 3),
      ]);

      expect(result.records[1]?.latitude.toString()).toBe('10');
      expect(result.records[1]?.longitude.toString()).toBe('124');
      expect(result.records[1]?.coordinatesImputed).toEqual({ latitude: true, longitude: false });
      expect(result.imputed).toEqual({ latitude: 1, longitude: 0 });
    });

    it('drops rows whose province has no known coordinates', () => {
      const result = cleanRecords([
        makeLoadedRow({ Province: 'Cebu', Latitude: '10', Longitude: '120' }, 2),
        makeLoadedRow({ Province: 'Bohol', Latitude: '', Longitude: '' }, 3),
      ]);

      expect(result.records.map((record) => record.rowNumber)).toEqual([2]);
      expect(result.dropped).toEqual([
        {
          rowNumber: 3,
          reason: 'NO_COORDINATE_FALLBACK',
          column: 'Latitude',
          value: 'Bohol',
          message: "No known latitude or longitude in province 'Bohol' to impute from",
        },
      ]);
    });

    it('treats out-of-range coordinates as missing', () => {
      const result = cleanRecords([
        makeLoadedRow({ Province: 'Cebu', Latitude: '10', Longitude: '120' }, 2),
        makeLoadedRow({ Province: 'Cebu', Latitude: '95', Longitude: '120' }, 3),
      ]);

      expect(result.records[1]?.latitude.toString()).toBe('10');
      expect(result.records[1]?.coordinatesImputed.latitude).toBe(true);
    });
  });

  describe('warnings', () => {
    it('keeps rows completed before they started and warns', () => {
      const result = cleanRecords([
        makeLoadedRow({ StartDate: '2022-03-01', ActualCompletionDate: '2022-02-01' }, 9),
      ]);

      expect(result.records[0]?.completionDelayDays).toBe(-28);
      expect(result.warnings).toEqual([
        {
          rowNumber: 9,
          type: 'COMPLETION_BEFORE_START',
          message: 'ActualCompletionDate 2022-02-01 precedes StartDate 2022-03-01',
        },
      ]);
    });
  });

  it('preserves input order', () => {
    const result = cleanRecords([
      makeLoadedRow({ Contractor: 'C' }, 2),
      makeLoadedRow({ Contractor: 'A' }, 3),
      makeLoadedRow({ Contractor: 'B' }, 4),
    ]);

    expect(result.records.map((record) => record.contractor)).toEqual(['C', 'A', 'B']);
  });
});

describe('coerceRow', () => {
  it('uses the values parsed by the loader', () => {
    const loaded = makeLoadedRow();
    const result = coerceRow({
      ...loaded,
      values: { ...loaded.values, contractCost: new Decimal(400) },
    });

    expect(result.kind).toBe('ok');
    if (result.kind === 'ok') {
      expect(result.project.contractCost.toString()).toBe('400');
    }
  });

  it('maps blank optional ids to null', () => {
    const result = coerceRow(makeLoadedRow({ ProjectId: '', ContractId: ' 21A00001 ' }));

    expect(result.kind).toBe('ok');
    if (result.kind === 'ok') {
      expect(result.project.projectId).toBeNull();
      expect(result.project.contractId).toBe('21A00001');
    }
  });
});
