import { PLOTLY_CDN_ORIGIN } from '../../../../infra/plugins/security-headers.js';

import { FIGURES_ELEMENT_ID } from './components/chart-grid.js';

export const PLOTLY_SCRIPT_URL = `${PLOTLY_CDN_ORIGIN}/plotly-2.35.2.min.js`;

export const CLIENT_SCRIPT_PATH = '/assets/dashboard.js';

/**
 * Browser bootstrap served at CLIENT_SCRIPT_PATH. Draws every embedded figure
 * into the element named `chart-<key>`.
 */
export const DASHBOARD_CLIENT_SCRIPT = `(function () {
  'use strict';
  var payload = document.getElementById('${FIGURES_ELEMENT_ID}');
  if (!payload || !window.Plotly) {
    return;
  }
  var figures = JSON.parse(payload.textContent || '{}');
  Object.keys(figures).forEach(function (key) {
    var target = document.getElementById('chart-' + key);
    if (target) {
      window.Plotly.newPlot(target, figures[key].data, figures[key].layout, { responsive: true });
    }
  });
})();
`;
