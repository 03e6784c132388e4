import type { MetricRecord } from './types.js';

/**
 * Distinct pledge years present in the table, ascending.
 */
export const listYears = (records: readonly Pick<MetricRecord, 'year'>[]): number[] =>
  [...new Set(records.flatMap((r) => (r.year === null ? [] : [r.year])))].sort((a, b) => a - b);

/**
 * Rows whose pledge year is one of `years`. Rows without a year never match.
 */
export const filterByYears = <T extends Pick<MetricRecord, 'year'>>(
  records: readonly T[],
  years: readonly number[]
): T[] => {
  const selected = new Set(years);
  return records.filter((r) => r.year !== null && selected.has(r.year));
};
