import fs from 'node:fs/promises';
import { fileURLToPath } from 'node:url';

import { err, ok, type Result } from 'neverthrow';

import type { SourceReadError } from '../../core/errors.js';
import type { SourceReader } from '../../core/ports.js';
import type { Logger } from 'pino';

export interface SourceReaderOptions {
  /** Abort HTTP reads after this many milliseconds */
  timeoutMs?: number;
  /** Injected for tests; defaults to the global fetch */
  fetch?: typeof fetch;
  logger?: Logger;
}

const HTTP_URL_RE = /^https?:\/\//i;

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const parseJson = (contents: string, location: string): Result<unknown, SourceReadError> => {
  try {
    const parsed: unknown = JSON.parse(contents);
    return ok(parsed);
  } catch (error) {
    return err({
      type: 'ParseError',
      message: `Failed to parse JSON at ${location}: ${errorMessage(error)}`,
    });
  }
};

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && 'code' in error;

/**
 * Reads JSON documents over HTTP(S) or from the local filesystem
 * (plain paths and file:// URLs).
 */
export const createSourceReader = (options: SourceReaderOptions = {}): SourceReader => {
  const timeoutMs = options.timeoutMs ?? 30_000;
  const fetchFn = options.fetch ?? fetch;
  const log = options.logger?.child({ component: 'SourceReader' });

  const readHttp = async (url: string): Promise<Result<unknown, SourceReadError>> => {
    let response: Response;
    try {
      response = await fetchFn(url, {
        headers: { accept: 'application/json' },
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (error) {
      return err({
        type: 'ReadError',
        message: `Request to ${url} failed: ${errorMessage(error)}`,
      });
    }

    if (!response.ok) {
      return err({
        type: 'HttpError',
        message: `Request to ${url} returned HTTP ${String(response.status)}`,
        status: response.status,
      });
    }

    let body: string;
    try {
      body = await response.text();
    } catch (error) {
      return err({
        type: 'ReadError',
        message: `Failed to read response body from ${url}: ${errorMessage(error)}`,
      });
    }

    return parseJson(body, url);
  };

  const readFile = async (location: string): Promise<Result<unknown, SourceReadError>> => {
    const filePath = location.startsWith('file:') ? fileURLToPath(location) : location;

    let contents: string;
    try {
      contents = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return err({
          type: 'NotFound',
          message: `Source file not found at ${filePath}`,
        });
      }

      return err({
        type: 'ReadError',
        message: `Failed to read source file at ${filePath}: ${errorMessage(error)}`,
      });
    }

    return parseJson(contents, filePath);
  };

  return {
    async read(location: string): Promise<Result<unknown, SourceReadError>> {
      const isHttp = HTTP_URL_RE.test(location);
      log?.debug({ location, transport: isHttp ? 'http' : 'file' }, 'Reading source document');

      return isHttp ? readHttp(location) : readFile(location);
    },
  };
};
