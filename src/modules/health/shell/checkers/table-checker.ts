/**
 * Joined table health checker
 *
 * The table is loaded once at startup, so readiness only reports what was
 * loaded. An empty table is unhealthy: every chart would be blank.
 */

import type { HealthChecker } from '../../core/ports.js';
import type { LoadedTable } from '../../../pledges/index.js';

export interface TableHealthCheckerOptions {
  /** Name in health check results (default: 'joined-table') */
  name?: string;
}

export const makeTableHealthChecker = (
  table: LoadedTable,
  options: TableHealthCheckerOptions = {}
): HealthChecker => {
  const { name = 'joined-table' } = options;
  const details = {
    records: table.records.length,
    columns: table.columns.length,
    warnings: table.warnings.length,
  };

  return {
    name,
    check: async () =>
      table.records.length === 0
        ? { name, status: 'unhealthy', message: 'Joined table has no records', details }
        : { name, status: 'healthy', details },
  };
};
