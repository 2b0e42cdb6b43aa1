/**
 * Unit tests for output rounding
 */

import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import {
  formatFixed2,
  formatOptionalFixed2,
  roundHalfAwayFromZero,
  toRoundedNumber,
} from '@/modules/aggregation/index.js';

describe('formatFixed2', () => {
  it.each([
    ['2.345', '2.35'],
    ['-2.345', '-2.35'],
    ['2.344', '2.34'],
    ['0.125', '0.13'],
    ['20', '20.00'],
    ['1234567.5', '1234567.50'],
  ])('formats %s as %s', (input, expected) => {
    expect(formatFixed2(new Decimal(input))).toBe(expected);
  });

  it('never prints negative zero', () => {
    expect(formatFixed2(new Decimal('-0.004'))).toBe('0.00');
  });

  it('never uses exponent notation', () => {
    expect(formatFixed2(new Decimal('1e21'))).toBe('1000000000000000000000.00');
  });
});

describe('formatOptionalFixed2', () => {
  it('renders null as an empty string', () => {
    expect(formatOptionalFixed2(null)).toBe('');
  });

  it('renders a value like formatFixed2', () => {
    expect(formatOptionalFixed2(new Decimal('1.005'))).toBe('1.01');
  });
});

describe('roundHalfAwayFromZero', () => {
  it('rounds to the requested number of places', () => {
    expect(roundHalfAwayFromZero(new Decimal('2.5'), 0).toString()).toBe('3');
    expect(roundHalfAwayFromZero(new Decimal('-2.5'), 0).toString()).toBe('-3');
  });
});

describe('toRoundedNumber', () => {
  it('rounds the exact decimal before converting', () => {
    expect(toRoundedNumber(new Decimal('2.005'))).toBe(2.01);
  });
});
