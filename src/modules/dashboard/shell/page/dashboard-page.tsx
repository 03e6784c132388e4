/**
 * Dashboard Page
 *
 * Full HTML document for one year selection. Charts are drawn in the browser
 * by the client script from the embedded figure JSON.
 */

// eslint-disable-next-line @typescript-eslint/naming-convention -- React is a third-party naming standard
import * as React from 'react';

import { CLIENT_SCRIPT_PATH, PLOTLY_SCRIPT_URL } from './client-script.js';
import { ChartGrid } from './components/chart-grid.js';
import { QuestionBox } from './components/question-box.js';
import { SummaryTable } from './components/summary-table.js';
import { YearFilter } from './components/year-filter.js';
import { CHART_KEYS } from '../../../charts/index.js';

import type { DashboardView } from '../../core/types.js';

export const PAGE_TITLE = 'Pledge Insights';

export interface DashboardPageProps {
  view: DashboardView;
  question: string;
  answer: string;
}

const styles = {
  body: {
    backgroundColor: '#f6f9fc',
    fontFamily:
      '-apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, "Helvetica Neue", Ubuntu, sans-serif',
    margin: '0',
    padding: '24px',
  },
  container: {
    backgroundColor: '#ffffff',
    borderRadius: '8px',
    margin: '0 auto',
    padding: '24px 32px',
    maxWidth: '1280px',
  },
  heading: {
    fontSize: '24px',
    fontWeight: '700',
    color: '#1a1a2e',
    margin: '0 0 20px',
  },
};

export const DashboardPage = ({ view, question, answer }: DashboardPageProps): React.ReactElement => (
  <html lang="en">
    <head>
      <meta charSet="utf-8" />
      <meta name="viewport" content="width=device-width, initial-scale=1" />
      <title>{PAGE_TITLE}</title>
      <script src={PLOTLY_SCRIPT_URL} defer />
      <script src={CLIENT_SCRIPT_PATH} defer />
    </head>
    <body style={styles.body}>
      <main style={styles.container}>
        <h1 style={styles.heading}>{PAGE_TITLE}</h1>
        <YearFilter yearOptions={view.yearOptions} selectedYears={view.selectedYears} />
        <ChartGrid charts={view.charts} keys={CHART_KEYS} />
        <SummaryTable rows={view.summary} />
        <QuestionBox question={question} answer={answer} selectedYears={view.selectedYears} />
      </main>
    </body>
  </html>
);
