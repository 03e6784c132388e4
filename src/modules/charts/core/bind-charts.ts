import type {
  Annotation,
  AxisLayout,
  BarTrace,
  ChartSpec,
  ChartSpecs,
  HistogramTrace,
  LineTrace,
  MarkerTrace,
  Trace,
  XAxisId,
  YAxisId,
} from './types.js';
import type { Aggregates } from '../../metrics/index.js';

export const CHART_TITLES = {
  pledgeTrend: 'Pledge Amount Trend Over Time',
  pledgeDistribution: 'Pledge Amount Distribution',
  fulfillmentRate: 'Pledge Fulfillment Rate Over Time',
  pledgePaymentScatter: 'Pledge Amount vs. Payment Amount',
  pledgesByYear: 'Pledges by Year',
  combinedMetrics: 'Combined Metrics',
} as const;

export const SUBPLOT_TITLES = [
  'Pledge Trend',
  'Pledge Amount Distribution',
  'Fulfillment Rate',
  'Pledge vs Payment',
] as const;

export const SCATTER_HOVER_TEMPLATE =
  'pledge_id=%{customdata[0]}<br>contribution_amount=%{x}<br>amount=%{y}<extra></extra>';

const axis = (title: string, type?: AxisLayout['type']): AxisLayout => ({
  title: { text: title },
  ...(type !== undefined && { type }),
});

const chart = (title: string, trace: Trace, xaxis: AxisLayout, yaxis: AxisLayout): ChartSpec => ({
  data: [trace],
  layout: { title: { text: title }, xaxis, yaxis },
});

export const bindPledgeTrend = (aggregates: Aggregates): ChartSpec => {
  const trace: LineTrace = {
    type: 'scatter',
    mode: 'lines',
    name: 'contribution_amount',
    x: aggregates.trend.map((p) => p.month),
    y: aggregates.trend.map((p) => p.contributionAmount),
  };
  return chart(
    CHART_TITLES.pledgeTrend,
    trace,
    axis('pledge_date', 'date'),
    axis('contribution_amount')
  );
};

export const bindPledgeDistribution = (aggregates: Aggregates): ChartSpec => {
  const trace: HistogramTrace = {
    type: 'histogram',
    name: 'contribution_amount',
    x: [...aggregates.distribution],
  };
  return chart(
    CHART_TITLES.pledgeDistribution,
    trace,
    axis('contribution_amount'),
    axis('count')
  );
};

export const bindFulfillmentRate = (aggregates: Aggregates): ChartSpec => {
  const trace: LineTrace = {
    type: 'scatter',
    mode: 'lines',
    name: 'fulfillment_rate',
    x: aggregates.fulfillmentSeries.map((p) => p.month),
    y: aggregates.fulfillmentSeries.map((p) => p.fulfillmentRate),
  };
  return chart(
    CHART_TITLES.fulfillmentRate,
    trace,
    axis('pledge_date', 'date'),
    axis('fulfillment_rate')
  );
};

export const bindPledgePaymentScatter = (aggregates: Aggregates): ChartSpec => {
  const pairs = aggregates.pledgePaymentPairs;
  const trace: MarkerTrace = {
    type: 'scatter',
    mode: 'markers',
    name: 'pledge vs payment',
    x: pairs.map((p) => p.contributionAmount),
    y: pairs.map((p) => p.amount),
    customdata: pairs.map((p) => [p.pledgeId]),
    hovertemplate: SCATTER_HOVER_TEMPLATE,
  };
  return chart(
    CHART_TITLES.pledgePaymentScatter,
    trace,
    axis('contribution_amount'),
    axis('amount')
  );
};

export const bindPledgesByYear = (aggregates: Aggregates): ChartSpec => {
  const trace: BarTrace = {
    type: 'bar',
    name: 'contribution_amount',
    x: aggregates.yearlySummary.map((row) => row.year),
    y: aggregates.yearlySummary.map((row) => row.totalContribution),
  };
  return chart(
    CHART_TITLES.pledgesByYear,
    trace,
    axis('year', 'category'),
    axis('contribution_amount')
  );
};

interface GridCell {
  xaxis: XAxisId;
  yaxis: YAxisId;
  xDomain: [number, number];
  yDomain: [number, number];
}

// 2×2 grid, row-major from the top left; 0.1 horizontal and 0.15 vertical spacing
const GRID: readonly [GridCell, GridCell, GridCell, GridCell] = [
  { xaxis: 'x', yaxis: 'y', xDomain: [0, 0.45], yDomain: [0.575, 1] },
  { xaxis: 'x2', yaxis: 'y2', xDomain: [0.55, 1], yDomain: [0.575, 1] },
  { xaxis: 'x3', yaxis: 'y3', xDomain: [0, 0.45], yDomain: [0, 0.425] },
  { xaxis: 'x4', yaxis: 'y4', xDomain: [0.55, 1], yDomain: [0, 0.425] },
];

const placeAxis = (
  source: AxisLayout | undefined,
  domain: [number, number],
  anchor: XAxisId | YAxisId
): AxisLayout => ({ ...source, domain, anchor });

const placeAxes = (source: ChartSpec, cell: GridCell): { x: AxisLayout; y: AxisLayout } => ({
  x: placeAxis(source.layout.xaxis, cell.xDomain, cell.yaxis),
  y: placeAxis(source.layout.yaxis, cell.yDomain, cell.xaxis),
});

const subplotTitle = (text: string, cell: GridCell): Annotation => ({
  text,
  x: (cell.xDomain[0] + cell.xDomain[1]) / 2,
  y: cell.yDomain[1],
  xref: 'paper',
  yref: 'paper',
  xanchor: 'center',
  yanchor: 'bottom',
  showarrow: false,
});

/**
 * Composite 2×2 grid holding the first trace of each of the four charts,
 * each on its own pair of subplot axes.
 */
export const combineCharts = (
  charts: readonly [ChartSpec, ChartSpec, ChartSpec, ChartSpec]
): ChartSpec => {
  const data = charts.flatMap((source, i) => {
    const cell = GRID[i];
    const trace = source.data[0];
    return cell === undefined || trace === undefined
      ? []
      : [{ ...trace, xaxis: cell.xaxis, yaxis: cell.yaxis }];
  });

  const [a, b, c, d] = charts;
  const [cellA, cellB, cellC, cellD] = GRID;
  const axesA = placeAxes(a, cellA);
  const axesB = placeAxes(b, cellB);
  const axesC = placeAxes(c, cellC);
  const axesD = placeAxes(d, cellD);

  return {
    data,
    layout: {
      title: { text: CHART_TITLES.combinedMetrics },
      showlegend: false,
      xaxis: axesA.x,
      yaxis: axesA.y,
      xaxis2: axesB.x,
      yaxis2: axesB.y,
      xaxis3: axesC.x,
      yaxis3: axesC.y,
      xaxis4: axesD.x,
      yaxis4: axesD.y,
      annotations: SUBPLOT_TITLES.map((text, i) => subplotTitle(text, GRID[i] ?? cellA)),
    },
  };
};

/**
 * Map the aggregates to the dashboard's chart specifications.
 *
 * Shape and encoding only: every value shown comes from the aggregates as is.
 */
export const bindCharts = (aggregates: Aggregates): ChartSpecs => {
  const pledgeTrend = bindPledgeTrend(aggregates);
  const pledgeDistribution = bindPledgeDistribution(aggregates);
  const fulfillmentRate = bindFulfillmentRate(aggregates);
  const pledgePaymentScatter = bindPledgePaymentScatter(aggregates);

  return {
    pledgeTrend,
    pledgeDistribution,
    fulfillmentRate,
    pledgePaymentScatter,
    pledgesByYear: bindPledgesByYear(aggregates),
    combinedMetrics: combineCharts([
      pledgeTrend,
      pledgeDistribution,
      fulfillmentRate,
      pledgePaymentScatter,
    ]),
  };
};
