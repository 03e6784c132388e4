/**
 * Per-cell conversions applied while cleaning the source records.
 * Every converter returns null for a value it cannot convert; callers decide
 * whether that is worth a CoercionWarning.
 */

import type { SourceValue } from './types.js';

const ISO_DATE_RE =
  /^(\d{4})(?:-(\d{2})(?:-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?)?)?\s*(Z|[+-]\d{2}(?::?\d{2})?)?$/i;

const DECIMAL_NUMBER_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;

const parseOffsetMinutes = (zone: string | undefined): number => {
  if (zone === undefined || zone.toUpperCase() === 'Z') {
    return 0;
  }

  const sign = zone.startsWith('-') ? -1 : 1;
  const digits = zone.slice(1).replace(':', '');
  const hours = Number.parseInt(digits.slice(0, 2), 10);
  const minutes = digits.length > 2 ? Number.parseInt(digits.slice(2), 10) : 0;
  return sign * (hours * 60 + minutes);
};

/**
 * Parses an ISO 8601 calendar date or date-time ("2023", "2023-01",
 * "2023-01-15", "2023-01-15 10:30:00", "2023-01-15T10:30:00.123+02:00").
 * Values without an offset are read as UTC.
 */
export const parseDateString = (raw: string): Date | null => {
  const match = ISO_DATE_RE.exec(raw.trim());
  if (match === null) {
    return null;
  }

  const [, year, month, day, hour, minute, second, fraction, zone] = match;
  const y = Number(year);
  const mo = month !== undefined ? Number(month) : 1;
  const d = day !== undefined ? Number(day) : 1;
  const h = hour !== undefined ? Number(hour) : 0;
  const mi = minute !== undefined ? Number(minute) : 0;
  const s = second !== undefined ? Number(second) : 0;
  const ms = fraction !== undefined ? Number(fraction.slice(0, 3).padEnd(3, '0')) : 0;

  if (mo < 1 || mo > 12 || h > 23 || mi > 59 || s > 59) {
    return null;
  }

  const date = new Date(Date.UTC(2000, mo - 1, d, h, mi, s, ms));
  // Date.UTC reads years 0-99 as 1900-1999
  date.setUTCFullYear(y);
  const utc = date.getTime();

  // Rejects days past the end of the month (Date.UTC would roll them over)
  if (date.getUTCDate() !== d) {
    return null;
  }

  return new Date(utc - parseOffsetMinutes(zone) * 60_000);
};

const fromEpochMillis = (value: number): Date | null => {
  if (!Number.isFinite(value)) {
    return null;
  }

  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
};

/**
 * Converts a pledge date cell. Strings are parsed as ISO 8601, numbers are
 * epoch milliseconds, anything else is missing.
 */
export const toTimestamp = (value: SourceValue | undefined): Date | null => {
  if (typeof value === 'string') {
    return parseDateString(value);
  }

  if (typeof value === 'number') {
    return fromEpochMillis(value);
  }

  return null;
};

/**
 * Renders a raw payment date as the string it is parsed from.
 * Numbers are epoch milliseconds and render as ISO strings; every other
 * value renders with String(), so null and booleans become unparsable text.
 */
export const normalizeDateString = (value: SourceValue | undefined): string => {
  if (typeof value === 'number') {
    return fromEpochMillis(value)?.toISOString() ?? String(value);
  }

  return String(value);
};

/**
 * Converts a payment date cell: the raw value is normalized to a string first,
 * then parsed.
 */
export const toPaymentTimestamp = (value: SourceValue | undefined): Date | null =>
  parseDateString(normalizeDateString(value));

/**
 * Converts an amount cell to a finite number. Booleans count as 1 and 0;
 * blank or non-numeric strings are missing.
 */
export const toNumeric = (value: SourceValue | undefined): number | null => {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }

  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }

  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed === '') {
      return null;
    }

    if (!DECIMAL_NUMBER_RE.test(trimmed)) {
      return null;
    }

    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
  }

  return null;
};

/**
 * Normalizes a join key to a string. Missing keys stay missing.
 */
export const normalizeId = (value: SourceValue | undefined): string | null => {
  if (value === null || value === undefined) {
    return null;
  }

  return String(value);
};

/**
 * Whether a raw cell holds a value at all (missing cells are not coercion failures).
 */
export const isPresent = (value: SourceValue | undefined): boolean =>
  value !== null && value !== undefined && !(typeof value === 'string' && value.trim() === '');
