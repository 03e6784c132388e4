import type { Result } from 'neverthrow';

import type { SourceReadError } from './errors.js';

export interface SourceReader {
  /**
   * Read and parse the JSON document at a URL or file path.
   * The parsed value is not validated.
   */
  read(location: string): Promise<Result<unknown, SourceReadError>>;
}
