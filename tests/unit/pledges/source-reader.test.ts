import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { pathToFileURL } from 'node:url';

import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest';

import { createSourceReader } from '@/modules/pledges/index.js';

describe('createSourceReader', () => {
  describe('files', () => {
    let dir: string;

    beforeAll(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'pledge-sources-'));
      await fs.writeFile(path.join(dir, 'pledges.json'), '[{"pledge_id":"p1"}]', 'utf8');
      await fs.writeFile(path.join(dir, 'broken.json'), '[{"pledge_id":', 'utf8');
    });

    afterAll(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it('reads and parses a JSON file by path', async () => {
      const result = await createSourceReader().read(path.join(dir, 'pledges.json'));
      expect(result.isOk() && result.value).toEqual([{ pledge_id: 'p1' }]);
    });

    it('reads file URLs', async () => {
      const url = pathToFileURL(path.join(dir, 'pledges.json')).href;
      const result = await createSourceReader().read(url);
      expect(result.isOk() && result.value).toEqual([{ pledge_id: 'p1' }]);
    });

    it('reports a missing file as NotFound', async () => {
      const missing = path.join(dir, 'missing.json');
      const result = await createSourceReader().read(missing);

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error).toEqual({
          type: 'NotFound',
          message: `Source file not found at ${missing}`,
        });
      }
    });

    it('reports invalid JSON as ParseError', async () => {
      const broken = path.join(dir, 'broken.json');
      const result = await createSourceReader().read(broken);

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.type).toBe('ParseError');
        expect(result.error.message.startsWith(`Failed to parse JSON at ${broken}: `)).toBe(true);
      }
    });
  });

  describe('HTTP', () => {
    const url = 'https://data.example.test/pledges.json';

    it('fetches and parses the document', async () => {
      const fetchFn = vi.fn(async () => new Response('[{"pledge_id":"p1"}]', { status: 200 }));

      const result = await createSourceReader({ fetch: fetchFn }).read(url);

      expect(result.isOk() && result.value).toEqual([{ pledge_id: 'p1' }]);
      expect(fetchFn).toHaveBeenCalledWith(
        url,
        expect.objectContaining({ headers: { accept: 'application/json' } })
      );
    });

    it('reports non-2xx responses as HttpError', async () => {
      const fetchFn = vi.fn(async () => new Response('gone', { status: 404 }));

      const result = await createSourceReader({ fetch: fetchFn }).read(url);

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error).toEqual({
          type: 'HttpError',
          message: `Request to ${url} returned HTTP 404`,
          status: 404,
        });
      }
    });

    it('reports network failures as ReadError', async () => {
      const fetchFn = vi.fn(async (): Promise<Response> => {
        throw new Error('connection refused');
      });

      const result = await createSourceReader({ fetch: fetchFn }).read(url);

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error).toEqual({
          type: 'ReadError',
          message: `Request to ${url} failed: connection refused`,
        });
      }
    });

    it('reports an unparsable body as ParseError', async () => {
      const fetchFn = vi.fn(async () => new Response('<html>', { status: 200 }));

      const result = await createSourceReader({ fetch: fetchFn }).read(url);

      expect(result.isErr() && result.error.type).toBe('ParseError');
    });
  });
});
