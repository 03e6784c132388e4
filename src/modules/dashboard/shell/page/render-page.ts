// eslint-disable-next-line @typescript-eslint/naming-convention -- React is a third-party naming standard
import * as React from 'react';
import { renderToStaticMarkup } from 'react-dom/server';

import { DashboardPage, type DashboardPageProps } from './dashboard-page.js';

export const renderDashboardPage = (props: DashboardPageProps): string =>
  `<!DOCTYPE html>${renderToStaticMarkup(React.createElement(DashboardPage, props))}`;
