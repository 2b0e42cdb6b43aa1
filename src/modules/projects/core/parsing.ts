import { Decimal } from 'decimal.js';

import type { CalendarDate } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Text
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Trims and collapses runs of whitespace to a single space.
 */
export const normalizeText = (value: string): string => value.trim().replace(/\s+/g, ' ');

/**
 * Case-insensitive identity of a name, used for distinct counts.
 */
export const nameKey = (value: string): string => normalizeText(value).toUpperCase();

// ─────────────────────────────────────────────────────────────────────────────
// Numbers
// ─────────────────────────────────────────────────────────────────────────────

const DECIMAL_RE = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const YEAR_RE = /^\d{4}$/;

/**
 * Parses a decimal cell. Thousands separators (commas) are ignored.
 * Returns null for blank or non-numeric text, and for exponents too large
 * to represent.
 */
export const parseDecimal = (raw: string): Decimal | null => {
  const text = raw.trim().replace(/,/g, '');
  if (!DECIMAL_RE.test(text)) return null;
  const value = new Decimal(text);
  return value.isFinite() ? value : null;
};

/**
 * Parses a four-digit year.
 */
export const parseFundingYear = (raw: string): number | null => {
  const text = raw.trim();
  if (!YEAR_RE.test(text)) return null;
  return Number.parseInt(text, 10);
};

/**
 * Parses a coordinate in decimal degrees; values outside [-limit, limit]
 * count as missing.
 */
export const parseCoordinate = (raw: string, limit: 90 | 180): Decimal | null => {
  const value = parseDecimal(raw);
  if (value === null || value.abs().greaterThan(limit)) return null;
  return value;
};

// ─────────────────────────────────────────────────────────────────────────────
// Dates
// ─────────────────────────────────────────────────────────────────────────────

const MONTHS = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
];

const DAYS_PER_ERA = 146_097;
// Days from 0000-03-01 to 1970-01-01
const UNIX_EPOCH_OFFSET = 719_468;

const SLASHED_RE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;
const ISO_RE = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T ].*)?$/;
const DAY_MON_YY_RE = /^(\d{1,2})-([A-Za-z]{3})-(\d{2})$/;
const MONTH_NAME_RE = /^([A-Za-z]+)\.? (\d{1,2}), (\d{4})$/;

const isLeapYear = (year: number): boolean =>
  (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;

const daysInMonth = (year: number, month: number): number => {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
};

/**
 * Builds a date if it exists on the calendar.
 */
export const makeCalendarDate = (year: number, month: number, day: number): CalendarDate | null => {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) return null;
  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  return { year, month, day };
};

/**
 * Month number for a full name ("March") or three-letter abbreviation ("Mar").
 */
const monthFromName = (name: string): number | null => {
  const lower = name.toLowerCase();
  const index = MONTHS.findIndex((month) =>
    lower.length === 3 ? month.startsWith(lower) : month === lower
  );
  return index === -1 ? null : index + 1;
};

const toInt = (digits: string | undefined): number =>
  digits === undefined ? Number.NaN : Number.parseInt(digits, 10);

/**
 * Parses a calendar date.
 *
 * Formats, tried in order:
 * - DD/MM/YYYY, falling back to MM/DD/YYYY when the day-first reading is invalid
 * - YYYY-MM-DD (a trailing time part is ignored)
 * - DD-Mon-YY (years 2000-2099)
 * - Mon DD, YYYY and Month DD, YYYY
 */
export const parseCalendarDate = (raw: string): CalendarDate | null => {
  const text = raw.trim();
  if (text === '') return null;

  const slashed = SLASHED_RE.exec(text);
  if (slashed !== null) {
    const [, first, second, year] = slashed;
    return (
      makeCalendarDate(toInt(year), toInt(second), toInt(first)) ??
      makeCalendarDate(toInt(year), toInt(first), toInt(second))
    );
  }

  const iso = ISO_RE.exec(text);
  if (iso !== null) {
    const [, year, month, day] = iso;
    return makeCalendarDate(toInt(year), toInt(month), toInt(day));
  }

  const dayMonYy = DAY_MON_YY_RE.exec(text);
  if (dayMonYy !== null) {
    const [, day, monthName, yy] = dayMonYy;
    const month = monthName === undefined ? null : monthFromName(monthName);
    if (month === null) return null;
    return makeCalendarDate(2000 + toInt(yy), month, toInt(day));
  }

  const named = MONTH_NAME_RE.exec(text);
  if (named !== null) {
    const [, monthName, day, year] = named;
    const month = monthName === undefined ? null : monthFromName(monthName);
    if (month === null) return null;
    return makeCalendarDate(toInt(year), month, toInt(day));
  }

  return null;
};

/**
 * Days since 1970-01-01 (civil-from-days inverse, valid for any year).
 */
export const toEpochDay = (date: CalendarDate): number => {
  const year = date.month <= 2 ? date.year - 1 : date.year;
  const era = Math.floor(year / 400);
  const yearOfEra = year - era * 400;
  const monthIndex = (date.month + 9) % 12; // March = 0
  const dayOfYear = Math.floor((153 * monthIndex + 2) / 5) + date.day - 1;
  const dayOfEra =
    yearOfEra * 365 + Math.floor(yearOfEra / 4) - Math.floor(yearOfEra / 100) + dayOfYear;
  return era * DAYS_PER_ERA + dayOfEra - UNIX_EPOCH_OFFSET;
};

/**
 * Calendar days from start to end; negative when end precedes start.
 */
export const daysBetween = (start: CalendarDate, end: CalendarDate): number =>
  toEpochDay(end) - toEpochDay(start);

/**
 * ISO 8601 text (YYYY-MM-DD).
 */
export const formatCalendarDate = (date: CalendarDate): string =>
  `${String(date.year).padStart(4, '0')}-${String(date.month).padStart(2, '0')}-${String(
    date.day
  ).padStart(2, '0')}`;
