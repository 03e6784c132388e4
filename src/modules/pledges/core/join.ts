import type { Cell, Row, Table } from './types.js';

/**
 * Left outer join on a single key column.
 *
 * Left row order is kept; a left row with several matches is repeated once per
 * match, in right-table order. Left rows without a match get null for every
 * right column. Right rows without a match are dropped. Non-key columns present
 * on both sides are renamed with the given suffixes.
 */
export const leftJoin = (
  left: Table,
  right: Table,
  key: string,
  suffixes: { left: string; right: string }
): Table => {
  const rightColumns = new Set(right.columns);
  const leftColumns = new Set(left.columns);
  const collides = (column: string): boolean =>
    column !== key && leftColumns.has(column) && rightColumns.has(column);

  const leftNames = left.columns.map((c) => (collides(c) ? `${c}${suffixes.left}` : c));
  const rightSource = right.columns.filter((c) => c !== key);
  const rightNames = rightSource.map((c) => (collides(c) ? `${c}${suffixes.right}` : c));

  const index = new Map<Cell, Row[]>();
  for (const row of right.rows) {
    const value = row[key] ?? null;
    const bucket = index.get(value);
    if (bucket === undefined) {
      index.set(value, [row]);
    } else {
      bucket.push(row);
    }
  }

  const rows: Row[] = [];
  for (const leftRow of left.rows) {
    const base: Record<string, Cell> = {};
    left.columns.forEach((column, i) => {
      base[leftNames[i] ?? column] = leftRow[column] ?? null;
    });

    const matches = index.get(leftRow[key] ?? null) ?? [];
    if (matches.length === 0) {
      rows.push({ ...base, ...Object.fromEntries(rightNames.map((name) => [name, null])) });
      continue;
    }

    for (const match of matches) {
      const merged: Record<string, Cell> = { ...base };
      rightSource.forEach((column, i) => {
        merged[rightNames[i] ?? column] = match[column] ?? null;
      });
      rows.push(merged);
    }
  }

  return { columns: [...leftNames, ...rightNames], rows };
};
