/**
 * Integration tests for health endpoints
 */

import { afterEach, describe, expect, it } from 'vitest';

import { createApp } from '@/app/build-app.js';

import {
  makeFailingHealthChecker,
  makeJoinedRecord,
  makeLoadedTable,
  makeTestConfig,
} from '../fixtures/builders.js';

import type { FastifyInstance } from 'fastify';

describe('Health Endpoints', () => {
  let app: FastifyInstance | undefined;

  afterEach(async () => {
    await app?.close();
    app = undefined;
  });

  it('GET /health/live returns ok', async () => {
    app = await createApp({
      fastifyOptions: { logger: false },
      deps: { config: makeTestConfig(), table: makeLoadedTable([]) },
    });

    const response = await app.inject({ method: 'GET', url: '/health/live' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: 'ok' });
  });

  it('GET /health/ready reports the loaded table', async () => {
    app = await createApp({
      fastifyOptions: { logger: false },
      deps: {
        config: makeTestConfig(),
        table: makeLoadedTable([makeJoinedRecord()]),
      },
      version: '0.3.0',
    });

    const response = await app.inject({ method: 'GET', url: '/health/ready' });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body.status).toBe('ok');
    expect(body.version).toBe('0.3.0');
    expect(typeof body.uptime).toBe('number');
    expect(body.checks).toEqual([
      {
        name: 'joined-table',
        status: 'healthy',
        details: { records: 1, columns: 6, warnings: 0 },
      },
    ]);
  });

  it('GET /health/ready returns 503 for an empty table', async () => {
    app = await createApp({
      fastifyOptions: { logger: false },
      deps: { config: makeTestConfig(), table: makeLoadedTable([]) },
    });

    const response = await app.inject({ method: 'GET', url: '/health/ready' });

    expect(response.statusCode).toBe(503);
    expect(response.json().status).toBe('unhealthy');
  });

  it('GET /health/ready includes extra checkers', async () => {
    app = await createApp({
      fastifyOptions: { logger: false },
      deps: {
        config: makeTestConfig(),
        table: makeLoadedTable([makeJoinedRecord()]),
        healthCheckers: [makeFailingHealthChecker('upstream', 'unreachable')],
      },
    });

    const response = await app.inject({ method: 'GET', url: '/health/ready' });

    expect(response.statusCode).toBe(503);
    expect(response.json().checks[1]).toEqual({
      name: 'upstream',
      status: 'unhealthy',
      message: 'unreachable',
    });
  });

  it('refuses to build without a table', async () => {
    await expect(
      createApp({ fastifyOptions: { logger: false }, deps: { config: makeTestConfig() } })
    ).rejects.toThrow('Missing required dependencies: config, table');
  });
});
