/**
 * Chart specifications in Plotly figure JSON form (`data` traces + `layout`),
 * so the page can hand them to Plotly.newPlot unchanged.
 */

export type XAxisId = 'x' | 'x2' | 'x3' | 'x4';
export type YAxisId = 'y' | 'y2' | 'y3' | 'y4';

interface TraceBase {
  name?: string;
  xaxis?: XAxisId;
  yaxis?: YAxisId;
}

export interface LineTrace extends TraceBase {
  type: 'scatter';
  mode: 'lines';
  x: string[];
  y: number[];
}

/**
 * Bin edges are left to the renderer's default binning.
 */
export interface HistogramTrace extends TraceBase {
  type: 'histogram';
  x: number[];
}

export interface MarkerTrace extends TraceBase {
  type: 'scatter';
  mode: 'markers';
  x: number[];
  y: number[];
  /** One entry per point, read by the hover template */
  customdata: string[][];
  hovertemplate: string;
}

export interface BarTrace extends TraceBase {
  type: 'bar';
  x: number[];
  y: number[];
}

export type Trace = LineTrace | HistogramTrace | MarkerTrace | BarTrace;

export interface AxisLayout {
  title?: { text: string };
  type?: 'date' | 'linear' | 'category';
  domain?: [number, number];
  anchor?: XAxisId | YAxisId;
}

export interface Annotation {
  text: string;
  x: number;
  y: number;
  xref: 'paper';
  yref: 'paper';
  xanchor: 'center';
  yanchor: 'bottom';
  showarrow: false;
}

export interface ChartLayout {
  title: { text: string };
  xaxis?: AxisLayout;
  yaxis?: AxisLayout;
  xaxis2?: AxisLayout;
  yaxis2?: AxisLayout;
  xaxis3?: AxisLayout;
  yaxis3?: AxisLayout;
  xaxis4?: AxisLayout;
  yaxis4?: AxisLayout;
  annotations?: Annotation[];
  showlegend?: boolean;
}

export interface ChartSpec {
  data: Trace[];
  layout: ChartLayout;
}

export interface ChartSpecs {
  pledgeTrend: ChartSpec;
  pledgeDistribution: ChartSpec;
  fulfillmentRate: ChartSpec;
  pledgePaymentScatter: ChartSpec;
  pledgesByYear: ChartSpec;
  combinedMetrics: ChartSpec;
}

export type ChartKey = keyof ChartSpecs;

/**
 * Display order of the charts on the dashboard.
 */
export const CHART_KEYS: readonly ChartKey[] = [
  'pledgeTrend',
  'pledgeDistribution',
  'fulfillmentRate',
  'pledgePaymentScatter',
  'pledgesByYear',
  'combinedMetrics',
];
