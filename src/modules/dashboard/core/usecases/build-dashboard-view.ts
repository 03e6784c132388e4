import { bindCharts } from '../../../charts/index.js';
import { aggregate, filterByYears, listYears } from '../../../metrics/index.js';

import type { MetricRecord, YearlySummaryRow } from '../../../metrics/index.js';
import type { DashboardFilter, DashboardView, SummaryTableRow } from '../types.js';

const toSummaryRow = (row: YearlySummaryRow): SummaryTableRow => ({
  year: row.year,
  pledgeCount: row.pledgeCount,
  totalContribution: row.totalContribution,
  averageContribution: row.averageContribution,
  fulfillmentRate: row.fulfillmentRate,
});

const normalizeSelection = (years: readonly number[]): number[] =>
  [...new Set(years)].sort((a, b) => a - b);

/**
 * Recompute the whole dashboard for one year selection.
 *
 * The table is never mutated; every call filters, aggregates and binds from scratch.
 * Selected years absent from the table are kept and simply match no rows.
 */
export const buildDashboardView = (
  records: readonly MetricRecord[],
  filter: DashboardFilter = {}
): DashboardView => {
  const yearOptions = listYears(records);
  const selectedYears =
    filter.years === undefined ? yearOptions : normalizeSelection(filter.years);

  const aggregates = aggregate(filterByYears(records, selectedYears));

  return {
    yearOptions,
    selectedYears,
    charts: bindCharts(aggregates),
    summary: aggregates.yearlySummary.map(toSummaryRow),
  };
};
