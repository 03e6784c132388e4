import type { ChartSpecs } from '../../charts/index.js';

/**
 * Year selection carried by a dashboard request.
 * `years` undefined selects every year in the table; an empty array selects none.
 */
export interface DashboardFilter {
  years?: readonly number[] | undefined;
}

export interface SummaryTableRow {
  year: number;
  pledgeCount: number;
  totalContribution: number;
  averageContribution: number | null;
  fulfillmentRate: number;
}

export interface DashboardView {
  /** Every year present in the full table, ascending */
  yearOptions: number[];
  selectedYears: number[];
  charts: ChartSpecs;
  summary: SummaryTableRow[];
}
