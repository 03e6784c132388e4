/**
 * Metrics Module - Public API
 *
 * Pure aggregations over the joined pledge/payment table.
 */

export {
  aggregate,
  computeTrend,
  computeDistribution,
  computeFulfillmentSeries,
  computeYearlySummary,
  computePledgePaymentPairs,
  fulfillmentRate,
  monthBucket,
} from './core/aggregate.js';
export { listYears, filterByYears } from './core/filter.js';

export type {
  Aggregates,
  MetricRecord,
  TrendPoint,
  FulfillmentPoint,
  YearlySummaryRow,
  PledgePaymentPair,
} from './core/types.js';
