/**
 * Pledge data loading errors.
 *
 * All errors are discriminated unions with a 'type' field for easy matching.
 */

import type { ValueError } from '@sinclair/typebox/errors';

import type { SourceName } from './types.js';

/**
 * Why a source document could not be read.
 */
export type SourceReadError =
  | { type: 'NotFound'; message: string }
  | { type: 'ReadError'; message: string }
  | { type: 'HttpError'; message: string; status: number }
  | { type: 'ParseError'; message: string };

/**
 * Source document could not be read, parsed or validated.
 */
export interface SourceError {
  readonly type: 'SourceError';
  readonly message: string;
  readonly source: SourceName;
  readonly location: string;
  readonly reason: SourceReadError['type'] | 'SchemaValidationError';
  readonly details: string[];
}

/**
 * A source document lacks a field the pipeline requires.
 */
export interface SchemaError {
  readonly type: 'SchemaError';
  readonly message: string;
  readonly source: SourceName;
  /** Required field, or the accepted alternatives joined with '|' */
  readonly field: string;
  /** Offending record, when a single record is at fault */
  readonly recordIndex: number | null;
}

/**
 * A field the metrics need did not survive the join.
 */
export interface JoinIntegrityError {
  readonly type: 'JoinIntegrityError';
  readonly message: string;
  readonly field: string;
  readonly columns: string[];
}

export type LoadError = SourceError | SchemaError | JoinIntegrityError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createSourceError = (
  source: SourceName,
  location: string,
  cause: SourceReadError
): SourceError => ({
  type: 'SourceError',
  message: `Failed to load ${source} from ${location}: ${cause.message}`,
  source,
  location,
  reason: cause.type,
  details: [],
});

export const createSourceSchemaError = (
  source: SourceName,
  location: string,
  errors: Iterable<ValueError>
): SourceError => ({
  type: 'SourceError',
  message: `${source} document at ${location} is not an array of flat records`,
  source,
  location,
  reason: 'SchemaValidationError',
  details: formatSchemaErrors(errors),
});

export const createSchemaError = (
  source: SourceName,
  field: string,
  message: string,
  recordIndex: number | null = null
): SchemaError => ({
  type: 'SchemaError',
  message,
  source,
  field,
  recordIndex,
});

export const createJoinIntegrityError = (field: string, columns: string[]): JoinIntegrityError => ({
  type: 'JoinIntegrityError',
  message: `Could not find '${field}' column after merging pledges with payments`,
  field,
  columns,
});

export const formatSchemaErrors = (errors: Iterable<ValueError>): string[] =>
  Array.from(errors).map((error) => `${error.path}: ${error.message}`);
