/**
 * Source record cleaning: date field selection, required field checks,
 * type coercion and key normalization, one source at a time.
 */

import { err, ok, type Result } from 'neverthrow';

import {
  isPresent,
  normalizeId,
  toNumeric,
  toPaymentTimestamp,
  toTimestamp,
} from './coercion.js';
import { createSchemaError, type SchemaError } from './errors.js';
import {
  CONTRIBUTION_AMOUNT_FIELD,
  PAYMENT_AMOUNT_FIELD,
  PAYMENT_DATE_FIELD,
  PLEDGE_DATE_FIELD,
  PLEDGE_DATE_SOURCE_FIELDS,
  PLEDGE_ID_FIELD,
  YEAR_FIELD,
  type Cell,
  type CoercionWarning,
  type Row,
  type SourceName,
  type SourceRecord,
  type SourceValue,
  type Table,
} from './types.js';

export interface CleanedSource {
  table: Table;
  warnings: CoercionWarning[];
}

const PLEDGE_DATE_ALTERNATIVES = PLEDGE_DATE_SOURCE_FIELDS.join('|');

/**
 * Field names across all records, in first-seen order.
 */
export const collectFields = (records: readonly SourceRecord[]): string[] => {
  const seen = new Set<string>();
  for (const record of records) {
    for (const field of Object.keys(record)) {
      seen.add(field);
    }
  }
  return [...seen];
};

const coercionWarning = (
  source: SourceName,
  field: string,
  recordIndex: number,
  value: SourceValue | undefined,
  target: 'date' | 'number'
): CoercionWarning => ({
  type: 'CoercionWarning',
  message: `Could not convert ${field} value '${String(value)}' to a ${target}`,
  source,
  field,
  recordIndex,
  value: String(value),
});

/**
 * First of the pledge date source fields that holds a value in this record.
 * When every date field the record carries is blank, the first of them is
 * returned so the row is kept with a missing date; null means the record has
 * no date field at all.
 */
export const selectPledgeDateField = (record: SourceRecord): string | null => {
  const carried = PLEDGE_DATE_SOURCE_FIELDS.filter((field) => Object.hasOwn(record, field));
  return carried.find((field) => isPresent(record[field])) ?? carried[0] ?? null;
};

/**
 * Cleans pledge records into a table with `pledge_date` and `year` columns.
 *
 * Fails when there are no records, when a record has none of the pledge date
 * source fields, or when `pledge_id` or `contribution_amount` appear in no record.
 */
export const cleanPledges = (
  records: readonly SourceRecord[]
): Result<CleanedSource, SchemaError> => {
  if (records.length === 0) {
    return err(
      createSchemaError(
        'pledges',
        PLEDGE_DATE_ALTERNATIVES,
        `No suitable pledge date column found (${PLEDGE_DATE_SOURCE_FIELDS.join(', ')})`
      )
    );
  }

  const dateFields: string[] = [];
  for (const [index, record] of records.entries()) {
    const field = selectPledgeDateField(record);
    if (field === null) {
      return err(
        createSchemaError(
          'pledges',
          PLEDGE_DATE_ALTERNATIVES,
          `Pledge record ${String(index)} has none of ${PLEDGE_DATE_SOURCE_FIELDS.join(', ')}`,
          index
        )
      );
    }
    dateFields.push(field);
  }

  const fields = collectFields(records);
  for (const required of [PLEDGE_ID_FIELD, CONTRIBUTION_AMOUNT_FIELD]) {
    if (!fields.includes(required)) {
      return err(
        createSchemaError('pledges', required, `Missing column in pledges dataset: ${required}`)
      );
    }
  }

  const dateSourceFields = new Set<string>(PLEDGE_DATE_SOURCE_FIELDS);
  const columns: string[] = [];
  for (const field of fields) {
    if (field === PLEDGE_DATE_FIELD || field === YEAR_FIELD) {
      continue;
    }
    if (dateSourceFields.has(field)) {
      if (!columns.includes(PLEDGE_DATE_FIELD)) {
        columns.push(PLEDGE_DATE_FIELD);
      }
      continue;
    }
    columns.push(field);
  }
  columns.push(YEAR_FIELD);

  const warnings: CoercionWarning[] = [];
  const rows: Row[] = [];

  records.forEach((record, index) => {
    const pledgeId = normalizeId(record[PLEDGE_ID_FIELD]);
    const dateField = dateFields[index] ?? PLEDGE_DATE_FIELD;
    const rawDate = record[dateField];
    const rawAmount = record[CONTRIBUTION_AMOUNT_FIELD];

    const pledgeDate = toTimestamp(rawDate);
    if (pledgeDate === null && isPresent(rawDate)) {
      warnings.push(coercionWarning('pledges', dateField, index, rawDate, 'date'));
    }

    const amount = toNumeric(rawAmount);
    if (amount === null && isPresent(rawAmount)) {
      warnings.push(
        coercionWarning('pledges', CONTRIBUTION_AMOUNT_FIELD, index, rawAmount, 'number')
      );
    }

    if (pledgeId === null) {
      return;
    }

    const row: Record<string, Cell> = {};
    for (const column of columns) {
      row[column] = record[column] ?? null;
    }
    row[PLEDGE_ID_FIELD] = pledgeId;
    row[PLEDGE_DATE_FIELD] = pledgeDate;
    row[CONTRIBUTION_AMOUNT_FIELD] = amount;
    row[YEAR_FIELD] = pledgeDate?.getUTCFullYear() ?? null;
    rows.push(row);
  });

  return ok({ table: { columns, rows }, warnings });
};

/**
 * Cleans payment records. An empty document yields an empty table with the
 * canonical payment columns. `amount` is not required here: its absence is
 * reported once the tables are joined.
 */
export const cleanPayments = (
  records: readonly SourceRecord[]
): Result<CleanedSource, SchemaError> => {
  if (records.length === 0) {
    return ok({
      table: { columns: [PLEDGE_ID_FIELD, PAYMENT_DATE_FIELD, PAYMENT_AMOUNT_FIELD], rows: [] },
      warnings: [],
    });
  }

  const columns = collectFields(records);
  for (const required of [PLEDGE_ID_FIELD, PAYMENT_DATE_FIELD]) {
    if (!columns.includes(required)) {
      return err(
        createSchemaError('payments', required, `Missing column in payments dataset: ${required}`)
      );
    }
  }

  const hasAmount = columns.includes(PAYMENT_AMOUNT_FIELD);
  const warnings: CoercionWarning[] = [];
  const rows: Row[] = [];

  records.forEach((record, index) => {
    const pledgeId = normalizeId(record[PLEDGE_ID_FIELD]);
    const rawDate = record[PAYMENT_DATE_FIELD];

    const date = toPaymentTimestamp(rawDate);
    if (date === null && isPresent(rawDate)) {
      warnings.push(coercionWarning('payments', PAYMENT_DATE_FIELD, index, rawDate, 'date'));
    }

    const row: Record<string, Cell> = {};
    for (const column of columns) {
      row[column] = record[column] ?? null;
    }
    row[PAYMENT_DATE_FIELD] = date;

    if (hasAmount) {
      const rawAmount = record[PAYMENT_AMOUNT_FIELD];
      const amount = toNumeric(rawAmount);
      if (amount === null && isPresent(rawAmount)) {
        warnings.push(
          coercionWarning('payments', PAYMENT_AMOUNT_FIELD, index, rawAmount, 'number')
        );
      }
      row[PAYMENT_AMOUNT_FIELD] = amount;
    }

    if (pledgeId === null) {
      return;
    }

    row[PLEDGE_ID_FIELD] = pledgeId;
    rows.push(row);
  });

  return ok({ table: { columns, rows }, warnings });
};
