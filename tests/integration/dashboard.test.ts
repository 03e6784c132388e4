/**
 * Integration tests for the dashboard page and JSON API
 */

import { afterAll, beforeAll, describe, expect, it } from 'vitest';

import { createApp } from '@/app/build-app.js';

import { makeJoinedRecord, makeLoadedTable, makeTestConfig } from '../fixtures/builders.js';

import type { FastifyInstance } from 'fastify';

const table = makeLoadedTable([
  makeJoinedRecord({ pledgeId: 'p1', year: 2022, contributionAmount: 50, amount: 50 }),
  makeJoinedRecord({ pledgeId: 'p2', year: 2023, contributionAmount: 100, amount: 40 }),
  makeJoinedRecord({ pledgeId: 'p3', year: 2023, contributionAmount: 0, amount: null }),
  makeJoinedRecord({ pledgeId: 'p4', year: null, contributionAmount: 75 }),
]);

describe('Dashboard Endpoints', () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = await createApp({
      fastifyOptions: { logger: false },
      deps: { config: makeTestConfig(), table },
    });
  });

  afterAll(async () => {
    await app.close();
  });

  describe('GET /api/v1/dashboard', () => {
    it('returns every year by default', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/v1/dashboard' });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.ok).toBe(true);
      expect(body.data.yearOptions).toEqual([2022, 2023]);
      expect(body.data.selectedYears).toEqual([2022, 2023]);
      expect(body.data.summary).toEqual([
        {
          year: 2022,
          pledgeCount: 1,
          totalContribution: 50,
          averageContribution: 50,
          fulfillmentRate: 100,
        },
        {
          year: 2023,
          pledgeCount: 2,
          totalContribution: 100,
          averageContribution: 50,
          fulfillmentRate: 40,
        },
      ]);
      expect(body.data.charts.pledgesByYear.data[0].x).toEqual([2022, 2023]);
      expect(body.data.charts.combinedMetrics.layout.title).toEqual({ text: 'Combined Metrics' });
    });

    it('filters by a single year', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/v1/dashboard?year=2023' });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.data.selectedYears).toEqual([2023]);
      expect(body.data.summary.map((row: { year: number }) => row.year)).toEqual([2023]);
    });

    it('filters by several years', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/api/v1/dashboard?year=2023&year=2022',
      });

      expect(response.json().data.selectedYears).toEqual([2022, 2023]);
    });

    it('treats a submitted form without years as an empty selection', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/v1/dashboard?applied=true' });

      const body = response.json();
      expect(body.data.selectedYears).toEqual([]);
      expect(body.data.summary).toEqual([]);
      expect(body.data.yearOptions).toEqual([2022, 2023]);
    });

    it('rejects a year that is not a number', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/v1/dashboard?year=last' });

      expect(response.statusCode).toBe(400);
      const body = response.json();
      expect(body.ok).toBe(false);
      expect(body.error).toBe('ValidationError');
      expect(body.message.startsWith('Request validation failed: ')).toBe(true);
    });
  });

  describe('POST /api/v1/dashboard/questions', () => {
    it('echoes the question', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/v1/dashboard/questions',
        payload: { question: 'Who pledged most?' },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        ok: true,
        data: { answer: 'You asked: Who pledged most?.  (LLM integration pending)' },
      });
    });

    it('answers a blank question with nothing', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/v1/dashboard/questions',
        payload: { question: '' },
      });

      expect(response.json()).toEqual({ ok: true, data: { answer: '' } });
    });

    it('requires a question', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/v1/dashboard/questions',
        payload: {},
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error).toBe('ValidationError');
    });
  });

  describe('GET /', () => {
    it('renders the dashboard page', async () => {
      const response = await app.inject({ method: 'GET', url: '/?year=2022' });

      expect(response.statusCode).toBe(200);
      expect(response.headers['content-type']).toBe('text/html; charset=utf-8');
      expect(response.body).toContain('<title>Pledge Insights</title>');
      expect(response.body).toContain('<option value="2022" selected="">2022</option>');
      expect(response.body).toContain('<option value="2023">2023</option>');
    });

    it('shows the answer to a question', async () => {
      const response = await app.inject({
        method: 'GET',
        url: `/?question=${encodeURIComponent('Any news?')}`,
      });

      expect(response.body).toContain('You asked: Any news?.  (LLM integration pending)');
    });

    it('answers an invalid year with the error envelope', async () => {
      const response = await app.inject({ method: 'GET', url: '/?year=abc' });

      expect(response.statusCode).toBe(400);
      const body = response.json();
      expect(body.ok).toBe(false);
      expect(body.error).toBe('ValidationError');
    });
  });

  describe('GET /assets/dashboard.js', () => {
    it('serves the client script', async () => {
      const response = await app.inject({ method: 'GET', url: '/assets/dashboard.js' });

      expect(response.statusCode).toBe(200);
      expect(response.headers['content-type']).toBe('application/javascript; charset=utf-8');
      expect(response.body).toContain('Plotly.newPlot');
    });
  });

  describe('unknown routes', () => {
    it('returns 404', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/v1/pledges' });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toEqual({
        ok: false,
        error: 'NotFoundError',
        message: 'Route GET /api/v1/pledges not found',
      });
    });
  });
});
