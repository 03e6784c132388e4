import type { JoinedRecord } from '../../pledges/index.js';

/**
 * The joined-table fields the metrics read.
 */
export type MetricRecord = Pick<
  JoinedRecord,
  'pledgeId' | 'pledgeDate' | 'year' | 'contributionAmount' | 'amount'
>;

/**
 * Monthly pledge total. `month` is the first day of the month, 'YYYY-MM-01' (UTC).
 */
export interface TrendPoint {
  month: string;
  contributionAmount: number;
}

/**
 * Monthly pledged and paid totals with the paid share in percent.
 */
export interface FulfillmentPoint {
  month: string;
  contributionAmount: number;
  amount: number;
  fulfillmentRate: number;
}

export interface YearlySummaryRow {
  year: number;
  /** Distinct pledges with a pledge date in this year */
  pledgeCount: number;
  totalContribution: number;
  /** Mean over rows with a contribution amount; null when there are none */
  averageContribution: number | null;
  totalPayment: number;
  /** Percent, rounded to 2 decimal places */
  fulfillmentRate: number;
}

/**
 * One joined row with both amounts present, for the pledge vs payment scatter.
 */
export interface PledgePaymentPair {
  pledgeId: string;
  contributionAmount: number;
  amount: number;
}

export interface Aggregates {
  trend: TrendPoint[];
  distribution: number[];
  fulfillmentSeries: FulfillmentPoint[];
  yearlySummary: YearlySummaryRow[];
  pledgePaymentPairs: PledgePaymentPair[];
}
