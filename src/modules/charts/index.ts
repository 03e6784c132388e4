/**
 * Charts Module - Public API
 *
 * Turns metric aggregates into Plotly figure specifications.
 */

export {
  bindCharts,
  bindPledgeTrend,
  bindPledgeDistribution,
  bindFulfillmentRate,
  bindPledgePaymentScatter,
  bindPledgesByYear,
  combineCharts,
  CHART_TITLES,
  SUBPLOT_TITLES,
  SCATTER_HOVER_TEMPLATE,
} from './core/bind-charts.js';

export {
  CHART_KEYS,
  type ChartKey,
  type ChartSpec,
  type ChartSpecs,
  type ChartLayout,
  type AxisLayout,
  type Annotation,
  type Trace,
  type LineTrace,
  type HistogramTrace,
  type MarkerTrace,
  type BarTrace,
} from './core/types.js';
