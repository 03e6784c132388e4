// eslint-disable-next-line @typescript-eslint/naming-convention -- React is a third-party naming standard
import * as React from 'react';

import { formatAmount, formatRate } from '../format.js';

import type { SummaryTableRow } from '../../../core/types.js';

export interface SummaryTableProps {
  rows: SummaryTableRow[];
}

const styles = {
  table: {
    borderCollapse: 'collapse' as const,
    width: '100%',
    margin: '24px 0',
    fontSize: '14px',
  },
  cell: {
    padding: '6px 12px',
    borderBottom: '1px solid #e5e7eb',
    textAlign: 'right' as const,
  },
};

const COLUMNS = ['Year', 'Pledges', 'Total pledged', 'Average pledge', 'Fulfillment rate'];

export const SummaryTable = ({ rows }: SummaryTableProps): React.ReactElement => (
  <table id="yearly-summary" style={styles.table}>
    <thead>
      <tr>
        {COLUMNS.map((column) => (
          <th key={column} style={styles.cell}>
            {column}
          </th>
        ))}
      </tr>
    </thead>
    <tbody>
      {rows.length === 0 ? (
        <tr>
          <td colSpan={COLUMNS.length} style={styles.cell}>
            No pledges for the selected years
          </td>
        </tr>
      ) : (
        rows.map((row) => (
          <tr key={row.year}>
            <td style={styles.cell}>{row.year}</td>
            <td style={styles.cell}>{row.pledgeCount}</td>
            <td style={styles.cell}>{formatAmount(row.totalContribution)}</td>
            <td style={styles.cell}>{formatAmount(row.averageContribution)}</td>
            <td style={styles.cell}>{formatRate(row.fulfillmentRate)}</td>
          </tr>
        ))
      )}
    </tbody>
  </table>
);
