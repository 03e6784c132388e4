import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';

import { buildJoinedTable } from './build-joined-table.js';
import { createSourceError, createSourceSchemaError, type LoadError } from '../errors.js';
import {
  SourceDocumentSchema,
  type LoadedTable,
  type LoadJoinedTableInput,
  type SourceName,
  type SourceRecord,
} from '../types.js';

import type { SourceReader } from '../ports.js';
import type { Logger } from 'pino';

const validator = TypeCompiler.Compile(SourceDocumentSchema);

export interface LoadJoinedTableDeps {
  sourceReader: SourceReader;
  logger: Logger;
}

const readSource = async (
  reader: SourceReader,
  source: SourceName,
  location: string
): Promise<Result<SourceRecord[], LoadError>> => {
  const result = await reader.read(location);
  if (result.isErr()) {
    return err(createSourceError(source, location, result.error));
  }

  const document = result.value;
  if (!validator.Check(document)) {
    return err(createSourceSchemaError(source, location, validator.Errors(document)));
  }

  return ok(document);
};

/**
 * Load the pledge and payment documents and join them.
 *
 * Processing:
 * 1. Read pledges, then payments (sequentially, fail on the first error)
 * 2. Validate each as an array of flat records
 * 3. Clean, coerce and left-join (see buildJoinedTable)
 *
 * Coercion warnings do not fail the load; they are returned with the table.
 */
export const loadJoinedTable = async (
  deps: LoadJoinedTableDeps,
  input: LoadJoinedTableInput
): Promise<Result<LoadedTable, LoadError>> => {
  const log = deps.logger.child({ component: 'loadJoinedTable' });

  const pledges = await readSource(deps.sourceReader, 'pledges', input.pledgesSource);
  if (pledges.isErr()) {
    return err(pledges.error);
  }

  const payments = await readSource(deps.sourceReader, 'payments', input.paymentsSource);
  if (payments.isErr()) {
    return err(payments.error);
  }

  log.debug(
    { pledgeRecords: pledges.value.length, paymentRecords: payments.value.length },
    'Source documents read'
  );

  const table = buildJoinedTable(pledges.value, payments.value);
  if (table.isErr()) {
    return err(table.error);
  }

  const { records, columns, warnings } = table.value;
  log.debug({ columns }, 'Joined table columns');

  if (warnings.length > 0) {
    log.warn(
      { count: warnings.length, sample: warnings.slice(0, 5).map((w) => w.message) },
      'Some values could not be converted and were treated as missing'
    );
  }

  log.info({ records: records.length }, 'Pledges joined with payments');

  return ok(table.value);
};
