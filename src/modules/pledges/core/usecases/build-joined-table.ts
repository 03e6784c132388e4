import { err, ok, type Result } from 'neverthrow';

import { cleanPayments, cleanPledges } from '../cleaning.js';
import { createJoinIntegrityError, type JoinIntegrityError, type SchemaError } from '../errors.js';
import { leftJoin } from '../join.js';
import {
  CONTRIBUTION_AMOUNT_FIELD,
  JOIN_SUFFIXES,
  PAYMENT_AMOUNT_FIELD,
  PAYMENT_DATE_FIELD,
  PLEDGE_DATE_FIELD,
  PLEDGE_ID_FIELD,
  YEAR_FIELD,
  type Cell,
  type JoinedRecord,
  type LoadedTable,
  type Row,
  type SourceRecord,
} from '../types.js';

const asDate = (cell: Cell | undefined): Date | null => (cell instanceof Date ? cell : null);

const asNumber = (cell: Cell | undefined): number | null =>
  typeof cell === 'number' ? cell : null;

/**
 * Name a side's field ended up with after the join (suffixed on collision).
 */
const resolveColumn = (columns: readonly string[], field: string, suffix: string): string =>
  columns.includes(field) ? field : `${field}${suffix}`;

const makeRecordMapper = (columns: readonly string[]) => {
  const pledgeDate = resolveColumn(columns, PLEDGE_DATE_FIELD, JOIN_SUFFIXES.pledge);
  const year = resolveColumn(columns, YEAR_FIELD, JOIN_SUFFIXES.pledge);
  const contribution = resolveColumn(columns, CONTRIBUTION_AMOUNT_FIELD, JOIN_SUFFIXES.pledge);
  const paymentDate = resolveColumn(columns, PAYMENT_DATE_FIELD, JOIN_SUFFIXES.payment);

  return (row: Row): JoinedRecord => ({
    pledgeId: String(row[PLEDGE_ID_FIELD]),
    pledgeDate: asDate(row[pledgeDate]),
    year: asNumber(row[year]),
    contributionAmount: asNumber(row[contribution]),
    paymentDate: asDate(row[paymentDate]),
    amount: asNumber(row[PAYMENT_AMOUNT_FIELD]),
    fields: row,
  });
};

/**
 * Cleans both sources and left-joins pledges with payments on `pledge_id`.
 *
 * Pure: the same records always produce the same table.
 */
export const buildJoinedTable = (
  pledgeRecords: readonly SourceRecord[],
  paymentRecords: readonly SourceRecord[]
): Result<LoadedTable, SchemaError | JoinIntegrityError> => {
  const pledges = cleanPledges(pledgeRecords);
  if (pledges.isErr()) {
    return err(pledges.error);
  }

  const payments = cleanPayments(paymentRecords);
  if (payments.isErr()) {
    return err(payments.error);
  }

  const joined = leftJoin(pledges.value.table, payments.value.table, PLEDGE_ID_FIELD, {
    left: JOIN_SUFFIXES.pledge,
    right: JOIN_SUFFIXES.payment,
  });

  if (!joined.columns.includes(PAYMENT_AMOUNT_FIELD)) {
    return err(createJoinIntegrityError(PAYMENT_AMOUNT_FIELD, joined.columns));
  }

  const toRecord = makeRecordMapper(joined.columns);

  return ok({
    records: joined.rows.map(toRecord),
    columns: joined.columns,
    warnings: [...pledges.value.warnings, ...payments.value.warnings],
  });
};
