import { Decimal } from 'decimal.js';

import type { CoercedProject, CoordinateImputation, RowIssue } from './types.js';

/**
 * Geocoordinate imputation from province means.
 *
 * Pass 1 (`accumulateProvinceCoordinates`) totals the known coordinates of
 * every province. Pass 2 (`imputeCoordinates`) fills gaps from those totals.
 * The totals are frozen before any gap is filled, so an imputed value never
 * feeds another row's mean and the result does not depend on row order.
 */

export type CoordinateAxis = 'latitude' | 'longitude';

const AXES: readonly CoordinateAxis[] = ['latitude', 'longitude'];

export interface AxisTotals {
  readonly sum: Decimal;
  readonly count: number;
}

export type ProvinceCoordinateTotals = Readonly<Record<CoordinateAxis, AxisTotals>>;

export interface LocatedProject extends Omit<CoercedProject, 'latitude' | 'longitude'> {
  readonly latitude: Decimal;
  readonly longitude: Decimal;
  readonly coordinatesImputed: CoordinateImputation;
}

export interface ImputationResult {
  readonly rows: readonly LocatedProject[];
  readonly dropped: readonly RowIssue<'NO_COORDINATE_FALLBACK'>[];
  readonly imputed: Readonly<Record<CoordinateAxis, number>>;
}

const EMPTY_TOTALS: AxisTotals = { sum: new Decimal(0), count: 0 };

/**
 * Pass 1: per-province sum and count of known values, per axis.
 * Rows are folded in input order.
 */
export function accumulateProvinceCoordinates(
  rows: readonly CoercedProject[]
): ReadonlyMap<string, ProvinceCoordinateTotals> {
  const totals = new Map<string, ProvinceCoordinateTotals>();

  for (const row of rows) {
    const current = totals.get(row.province) ?? {
      latitude: EMPTY_TOTALS,
      longitude: EMPTY_TOTALS,
    };

    const add = (axis: CoordinateAxis): AxisTotals => {
      const value = row[axis];
      const axisTotals = current[axis];
      return value === null
        ? axisTotals
        : { sum: axisTotals.sum.plus(value), count: axisTotals.count + 1 };
    };

    totals.set(row.province, { latitude: add('latitude'), longitude: add('longitude') });
  }

  return totals;
}

/**
 * Mean of a province's known values on one axis, or null when it has none.
 */
export function provinceMean(
  totals: ReadonlyMap<string, ProvinceCoordinateTotals>,
  province: string,
  axis: CoordinateAxis
): Decimal | null {
  const axisTotals = totals.get(province)?.[axis];
  if (axisTotals === undefined || axisTotals.count === 0) return null;
  return axisTotals.sum.div(axisTotals.count);
}

/**
 * Pass 2: fills each missing coordinate with its province mean.
 * A row whose province has no known value for a missing axis is dropped.
 */
export function imputeCoordinates(rows: readonly CoercedProject[]): ImputationResult {
  const totals = accumulateProvinceCoordinates(rows);

  const located: LocatedProject[] = [];
  const dropped: RowIssue<'NO_COORDINATE_FALLBACK'>[] = [];
  const imputed: Record<CoordinateAxis, number> = { latitude: 0, longitude: 0 };

  for (const row of rows) {
    const unresolved = AXES.filter(
      (axis) => row[axis] === null && provinceMean(totals, row.province, axis) === null
    );

    if (unresolved.length > 0) {
      dropped.push({
        rowNumber: row.rowNumber,
        reason: 'NO_COORDINATE_FALLBACK',
        column: unresolved[0] === 'latitude' ? 'Latitude' : 'Longitude',
        value: row.province,
        message: `No known ${unresolved.join(' or ')} in province '${row.province}' to impute from`,
      });
      continue;
    }

    const latitude = row.latitude ?? provinceMean(totals, row.province, 'latitude');
    const longitude = row.longitude ?? provinceMean(totals, row.province, 'longitude');
    if (latitude === null || longitude === null) continue;

    if (row.latitude === null) imputed.latitude += 1;
    if (row.longitude === null) imputed.longitude += 1;

    located.push({
      ...row,
      latitude,
      longitude,
      coordinatesImputed: {
        latitude: row.latitude === null,
        longitude: row.longitude === null,
      },
    });
  }

  return { rows: located, dropped, imputed };
}
