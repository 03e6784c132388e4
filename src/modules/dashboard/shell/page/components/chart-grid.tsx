// eslint-disable-next-line @typescript-eslint/naming-convention -- React is a third-party naming standard
import * as React from 'react';

import { serializeForScript } from '../format.js';

import type { ChartKey, ChartSpecs } from '../../../../charts/index.js';

export const FIGURES_ELEMENT_ID = 'dashboard-figures';

export const chartElementId = (key: ChartKey): string => `chart-${key}`;

export interface ChartGridProps {
  charts: ChartSpecs;
  keys: readonly ChartKey[];
}

const styles = {
  grid: {
    display: 'grid',
    gridTemplateColumns: 'repeat(auto-fit, minmax(420px, 1fr))',
    gap: '16px',
  },
  chart: {
    minHeight: '360px',
    border: '1px solid #e5e7eb',
    borderRadius: '8px',
  },
};

/**
 * Empty chart containers plus the figure JSON they are drawn from in the browser.
 */
export const ChartGrid = ({ charts, keys }: ChartGridProps): React.ReactElement => (
  <section style={styles.grid}>
    {keys.map((key) => (
      <div key={key} id={chartElementId(key)} className="chart" style={styles.chart} />
    ))}
    <script
      type="application/json"
      id={FIGURES_ELEMENT_ID}
      dangerouslySetInnerHTML={{ __html: serializeForScript(charts) }}
    />
  </section>
);
