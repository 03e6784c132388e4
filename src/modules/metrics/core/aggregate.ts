import { Decimal } from 'decimal.js';

import type {
  Aggregates,
  FulfillmentPoint,
  MetricRecord,
  PledgePaymentPair,
  TrendPoint,
  YearlySummaryRow,
} from './types.js';

/**
 * First day of the record's pledge month, 'YYYY-MM-01' (UTC).
 */
export const monthBucket = (date: Date): string => {
  const year = String(date.getUTCFullYear()).padStart(4, '0');
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');
  return `${year}-${month}-01`;
};

/**
 * Paid share of the pledged amount in percent. Zero when nothing was pledged.
 */
export const fulfillmentRate = (paid: Decimal, pledged: Decimal): Decimal =>
  pledged.isZero() ? new Decimal(0) : paid.times(100).dividedBy(pledged);

/**
 * Sum that treats missing values as zero.
 */
const sumOf = (values: readonly (number | null)[]): Decimal =>
  values.reduce<Decimal>((acc, value) => (value === null ? acc : acc.plus(value)), new Decimal(0));

const groupBy = <K, T>(items: readonly T[], keyOf: (item: T) => K | null): Map<K, T[]> => {
  const groups = new Map<K, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    if (key === null) continue;

    const group = groups.get(key);
    if (group === undefined) {
      groups.set(key, [item]);
    } else {
      group.push(item);
    }
  }
  return groups;
};

const sortedEntries = <K, T>(groups: Map<K, T[]>, compare: (a: K, b: K) => number): [K, T[]][] =>
  [...groups.entries()].sort(([a], [b]) => compare(a, b));

const compareStrings = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

const byMonth = (records: readonly MetricRecord[]): [string, MetricRecord[]][] =>
  sortedEntries(
    groupBy(records, (r) => (r.pledgeDate === null ? null : monthBucket(r.pledgeDate))),
    compareStrings
  );

export const computeTrend = (records: readonly MetricRecord[]): TrendPoint[] =>
  byMonth(records).map(([month, rows]) => ({
    month,
    contributionAmount: sumOf(rows.map((r) => r.contributionAmount)).toNumber(),
  }));

export const computeDistribution = (records: readonly MetricRecord[]): number[] =>
  records.flatMap((r) => (r.contributionAmount === null ? [] : [r.contributionAmount]));

export const computeFulfillmentSeries = (records: readonly MetricRecord[]): FulfillmentPoint[] =>
  byMonth(records).map(([month, rows]) => {
    const pledged = sumOf(rows.map((r) => r.contributionAmount));
    const paid = sumOf(rows.map((r) => r.amount));
    return {
      month,
      contributionAmount: pledged.toNumber(),
      amount: paid.toNumber(),
      fulfillmentRate: fulfillmentRate(paid, pledged).toNumber(),
    };
  });

export const computeYearlySummary = (records: readonly MetricRecord[]): YearlySummaryRow[] =>
  sortedEntries(groupBy(records, (r) => r.year), (a, b) => a - b).map(([year, rows]) => {
    const contributions = rows.flatMap((r) =>
      r.contributionAmount === null ? [] : [r.contributionAmount]
    );
    const pledged = sumOf(contributions);
    const paid = sumOf(rows.map((r) => r.amount));

    return {
      year,
      pledgeCount: new Set(rows.map((r) => r.pledgeId)).size,
      totalContribution: pledged.toNumber(),
      averageContribution:
        contributions.length === 0 ? null : pledged.dividedBy(contributions.length).toNumber(),
      totalPayment: paid.toNumber(),
      fulfillmentRate: fulfillmentRate(paid, pledged)
        .toDecimalPlaces(2, Decimal.ROUND_HALF_UP)
        .toNumber(),
    };
  });

export const computePledgePaymentPairs = (records: readonly MetricRecord[]): PledgePaymentPair[] =>
  records.flatMap((r) =>
    r.contributionAmount === null || r.amount === null
      ? []
      : [{ pledgeId: r.pledgeId, contributionAmount: r.contributionAmount, amount: r.amount }]
  );

/**
 * Derive every dashboard aggregate from the joined rows.
 *
 * Pure and deterministic. Rows without a pledge date are left out of the
 * monthly series and the yearly summary; missing amounts count as zero in sums.
 */
export const aggregate = (records: readonly MetricRecord[]): Aggregates => ({
  trend: computeTrend(records),
  distribution: computeDistribution(records),
  fulfillmentSeries: computeFulfillmentSeries(records),
  yearlySummary: computeYearlySummary(records),
  pledgePaymentPairs: computePledgePaymentPairs(records),
});
