import { describe, expect, it } from 'vitest';

import {
  evaluateReadiness,
  getReadiness,
  makeTableHealthChecker,
  mapCheckResults,
  type HealthCheckResult,
} from '@/modules/health/index.js';

import {
  makeFailingHealthChecker,
  makeHealthChecker,
  makeJoinedRecord,
  makeLoadedTable,
} from '../../fixtures/builders.js';

describe('mapCheckResults', () => {
  it('returns values for fulfilled checks', () => {
    const results: PromiseSettledResult<HealthCheckResult>[] = [
      { status: 'fulfilled', value: { name: 'table', status: 'healthy' } },
    ];

    expect(mapCheckResults(['table'], results)).toEqual([{ name: 'table', status: 'healthy' }]);
  });

  it('reports a rejected check as unhealthy under its own name', () => {
    const results: PromiseSettledResult<HealthCheckResult>[] = [
      { status: 'rejected', reason: new Error('source gone') },
      { status: 'rejected', reason: 'no reason' },
    ];

    expect(mapCheckResults(['upstream'], results)).toEqual([
      { name: 'upstream', status: 'unhealthy', message: 'source gone' },
      { name: 'unknown', status: 'unhealthy', message: 'Check failed' },
    ]);
  });
});

describe('evaluateReadiness', () => {
  const timestamp = '2023-01-01T00:00:00.000Z';

  it('is ok when every check is healthy', () => {
    expect(
      evaluateReadiness({ checks: [{ name: 'a', status: 'healthy' }], uptime: 5, timestamp })
    ).toEqual({
      status: 'ok',
      timestamp,
      uptime: 5,
      checks: [{ name: 'a', status: 'healthy' }],
    });
  });

  it('is unhealthy when any check is unhealthy', () => {
    const result = evaluateReadiness({
      checks: [
        { name: 'a', status: 'healthy' },
        { name: 'b', status: 'unhealthy' },
      ],
      uptime: 5,
      timestamp,
    });
    expect(result.status).toBe('unhealthy');
  });

  it('includes the version when given', () => {
    expect(evaluateReadiness({ checks: [], uptime: 0, timestamp, version: '1.2.3' }).version).toBe(
      '1.2.3'
    );
  });
});

describe('getReadiness', () => {
  it('runs every checker', async () => {
    const response = await getReadiness(
      {
        checkers: [
          makeHealthChecker({ name: 'first' }),
          makeFailingHealthChecker('second', 'timed out'),
        ],
      },
      { uptime: 1, timestamp: '2023-01-01T00:00:00.000Z' }
    );

    expect(response.status).toBe('unhealthy');
    expect(response.checks).toEqual([
      { name: 'first', status: 'healthy' },
      { name: 'second', status: 'unhealthy', message: 'timed out' },
    ]);
  });
});

describe('makeTableHealthChecker', () => {
  it('reports the loaded table', async () => {
    const table = makeLoadedTable([makeJoinedRecord(), makeJoinedRecord({ pledgeId: 'p2' })]);

    expect(await makeTableHealthChecker(table).check()).toEqual({
      name: 'joined-table',
      status: 'healthy',
      details: { records: 2, columns: 6, warnings: 0 },
    });
  });

  it('is unhealthy for an empty table', async () => {
    const result = await makeTableHealthChecker(makeLoadedTable([]), { name: 'pledges' }).check();

    expect(result).toEqual({
      name: 'pledges',
      status: 'unhealthy',
      message: 'Joined table has no records',
      details: { records: 0, columns: 6, warnings: 0 },
    });
  });
});
