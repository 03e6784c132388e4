/**
 * Year Filter Component
 *
 * Multi-select of every year in the table. Submitting the form reloads the
 * page with the selection in the query string.
 */

// eslint-disable-next-line @typescript-eslint/naming-convention -- React is a third-party naming standard
import * as React from 'react';

export interface YearFilterProps {
  yearOptions: number[];
  selectedYears: number[];
}

const styles = {
  form: {
    display: 'flex',
    alignItems: 'flex-end',
    gap: '12px',
    margin: '0 0 24px',
  },
  label: {
    fontSize: '13px',
    fontWeight: '600',
    color: '#525f7f',
    textTransform: 'uppercase' as const,
  },
  select: {
    minWidth: '160px',
    padding: '4px',
  },
};

export const YearFilter = ({ yearOptions, selectedYears }: YearFilterProps): React.ReactElement => (
  <form method="get" action="/" style={styles.form}>
    <input type="hidden" name="applied" value="true" />
    <label htmlFor="year-filter" style={styles.label}>
      Year
    </label>
    <select
      id="year-filter"
      name="year"
      multiple
      size={Math.min(Math.max(yearOptions.length, 2), 8)}
      defaultValue={selectedYears.map(String)}
      style={styles.select}
    >
      {yearOptions.map((year) => (
        <option key={year} value={String(year)}>
          {year}
        </option>
      ))}
    </select>
    <button type="submit">Apply</button>
  </form>
);
