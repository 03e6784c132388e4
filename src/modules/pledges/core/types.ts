import { Type, type Static } from '@sinclair/typebox';

// ─────────────────────────────────────────────────────────────────────────────
// Source documents
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A scalar JSON value as it appears in a source record.
 */
export const SourceValueSchema = Type.Union([
  Type.String(),
  Type.Number(),
  Type.Boolean(),
  Type.Null(),
]);

/**
 * One flat record of a source document (no nested objects or arrays).
 */
export const SourceRecordSchema = Type.Record(Type.String(), SourceValueSchema);

/**
 * A source document is a JSON array of flat records.
 */
export const SourceDocumentSchema = Type.Array(SourceRecordSchema);

export type SourceValue = Static<typeof SourceValueSchema>;
export type SourceRecord = Static<typeof SourceRecordSchema>;

export type SourceName = 'pledges' | 'payments';

// ─────────────────────────────────────────────────────────────────────────────
// Field names
// ─────────────────────────────────────────────────────────────────────────────

export const PLEDGE_ID_FIELD = 'pledge_id';
export const PLEDGE_DATE_FIELD = 'pledge_date';
export const CONTRIBUTION_AMOUNT_FIELD = 'contribution_amount';
export const YEAR_FIELD = 'year';
export const PAYMENT_DATE_FIELD = 'date';
export const PAYMENT_AMOUNT_FIELD = 'amount';

/**
 * Source date fields a pledge date may come from, in order of preference.
 */
export const PLEDGE_DATE_SOURCE_FIELDS = [
  'pledge_created_at',
  'pledge_starts_at',
  'pledge_ended_at',
] as const;

/**
 * Suffixes given to non-key fields present on both sides of the join.
 */
export const JOIN_SUFFIXES = { pledge: '_pledge', payment: '_payment' } as const;

// ─────────────────────────────────────────────────────────────────────────────
// Tables
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A cell after coercion. `null` marks a missing value.
 */
export type Cell = string | number | boolean | Date | null;

export type Row = Readonly<Record<string, Cell>>;

/**
 * Column-ordered rows. Every row carries every column (missing cells are null).
 */
export interface Table {
  columns: string[];
  rows: Row[];
}

/**
 * One row of the pledge/payment left join, with the fields the metrics read.
 */
export interface JoinedRecord {
  readonly pledgeId: string;
  readonly pledgeDate: Date | null;
  /** Calendar year (UTC) of the pledge date */
  readonly year: number | null;
  readonly contributionAmount: number | null;
  /** Null when the pledge has no matching payment */
  readonly paymentDate: Date | null;
  readonly amount: number | null;
  /** Every joined field, after suffixing */
  readonly fields: Row;
}

/**
 * A cell that failed numeric or date conversion and became missing.
 */
export interface CoercionWarning {
  readonly type: 'CoercionWarning';
  readonly message: string;
  readonly source: SourceName;
  readonly field: string;
  /** Index of the record in its source document */
  readonly recordIndex: number;
  readonly value: string;
}

export interface LoadedTable {
  records: JoinedRecord[];
  columns: string[];
  warnings: CoercionWarning[];
}

export interface LoadJoinedTableInput {
  /** URL or file path of the pledges JSON document */
  pledgesSource: string;
  /** URL or file path of the payments JSON document */
  paymentsSource: string;
}
