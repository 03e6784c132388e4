/**
 * Dashboard Module - Public API
 *
 * Year-filtered view of the joined table: charts, yearly summary and the
 * question box, served as an HTML page and as JSON.
 */

export { buildDashboardView } from './core/usecases/build-dashboard-view.js';
export { answerQuestion, PENDING_ANSWER_NOTE } from './core/usecases/answer-question.js';
export type { DashboardFilter, DashboardView, SummaryTableRow } from './core/types.js';

export { makeDashboardRoutes, toDashboardFilter, type DashboardRoutesDeps } from './shell/rest/routes.js';
export { renderDashboardPage } from './shell/page/render-page.js';
export {
  DASHBOARD_CLIENT_SCRIPT,
  CLIENT_SCRIPT_PATH,
  PLOTLY_SCRIPT_URL,
} from './shell/page/client-script.js';
export { FIGURES_ELEMENT_ID, chartElementId } from './shell/page/components/chart-grid.js';
