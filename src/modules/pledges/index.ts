/**
 * Pledges Module - Public API
 *
 * Loads the pledge and payment documents and joins them into one table.
 */

// Use cases
export { loadJoinedTable, type LoadJoinedTableDeps } from './core/usecases/load-joined-table.js';
export { buildJoinedTable } from './core/usecases/build-joined-table.js';

// Pure helpers
export { cleanPledges, cleanPayments, collectFields, selectPledgeDateField } from './core/cleaning.js';
export {
  parseDateString,
  toTimestamp,
  toPaymentTimestamp,
  normalizeDateString,
  toNumeric,
  normalizeId,
} from './core/coercion.js';
export { leftJoin } from './core/join.js';

// Ports and adapters
export type { SourceReader } from './core/ports.js';
export { createSourceReader, type SourceReaderOptions } from './shell/source/source-reader.js';

// Types
export {
  SourceDocumentSchema,
  PLEDGE_DATE_SOURCE_FIELDS,
  JOIN_SUFFIXES,
  type Cell,
  type Row,
  type Table,
  type SourceName,
  type SourceRecord,
  type SourceValue,
  type JoinedRecord,
  type LoadedTable,
  type LoadJoinedTableInput,
  type CoercionWarning,
} from './core/types.js';

// Errors
export {
  createSchemaError,
  createJoinIntegrityError,
  createSourceError,
  type LoadError,
  type SchemaError,
  type JoinIntegrityError,
  type SourceError,
  type SourceReadError,
} from './core/errors.js';
