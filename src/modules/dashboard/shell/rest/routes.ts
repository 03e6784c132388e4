/**
 * Dashboard routes
 *
 * - GET  /                            - server-rendered dashboard page
 * - GET  /api/v1/dashboard            - dashboard view as JSON
 * - POST /api/v1/dashboard/questions  - question box placeholder
 * - GET  /assets/dashboard.js         - browser bootstrap drawing the charts
 *
 * Every request carries its own year selection; the joined table is shared
 * and never modified.
 */

import {
  AnswerResponseSchema,
  AskQuestionBodySchema,
  DashboardPageQuerySchema,
  DashboardQuerySchema,
  DashboardResponseSchema,
  ErrorResponseSchema,
  type AnswerResponse,
  type AskQuestionBody,
  type DashboardPageQuery,
  type DashboardQuery,
  type DashboardResponse,
} from './schemas.js';
import { answerQuestion } from '../../core/usecases/answer-question.js';
import { buildDashboardView } from '../../core/usecases/build-dashboard-view.js';
import { CLIENT_SCRIPT_PATH, DASHBOARD_CLIENT_SCRIPT } from '../page/client-script.js';
import { renderDashboardPage } from '../page/render-page.js';

import type { MetricRecord } from '../../../metrics/index.js';
import type { DashboardFilter } from '../../core/types.js';
import type { FastifyPluginAsync } from 'fastify';

export interface DashboardRoutesDeps {
  records: readonly MetricRecord[];
}

/**
 * A submitted filter form with nothing selected sends `applied` and no `year`.
 */
export const toDashboardFilter = (query: DashboardQuery): DashboardFilter => {
  if (query.year !== undefined) {
    return { years: query.year };
  }
  return query.applied === true ? { years: [] } : {};
};

export const makeDashboardRoutes = (deps: DashboardRoutesDeps): FastifyPluginAsync => {
  const { records } = deps;

  return async (fastify) => {
    fastify.get<{ Querystring: DashboardPageQuery }>(
      '/',
      {
        schema: {
          querystring: DashboardPageQuerySchema,
        },
      },
      async (request, reply) => {
        const view = buildDashboardView(records, toDashboardFilter(request.query));
        const question = request.query.question ?? '';
        const html = renderDashboardPage({ view, question, answer: answerQuestion(question) });

        return reply.status(200).type('text/html; charset=utf-8').send(html);
      }
    );

    fastify.get<{ Querystring: DashboardQuery; Reply: DashboardResponse }>(
      '/api/v1/dashboard',
      {
        schema: {
          querystring: DashboardQuerySchema,
          response: {
            200: DashboardResponseSchema,
            400: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const view = buildDashboardView(records, toDashboardFilter(request.query));
        return reply.status(200).send({ ok: true, data: view });
      }
    );

    fastify.post<{ Body: AskQuestionBody; Reply: AnswerResponse }>(
      '/api/v1/dashboard/questions',
      {
        schema: {
          body: AskQuestionBodySchema,
          response: {
            200: AnswerResponseSchema,
            400: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const answer = answerQuestion(request.body.question);
        return reply.status(200).send({ ok: true, data: { answer } });
      }
    );

    fastify.get(CLIENT_SCRIPT_PATH, async (_request, reply) => {
      return reply
        .status(200)
        .type('application/javascript; charset=utf-8')
        .header('cache-control', 'no-cache')
        .send(DASHBOARD_CLIENT_SCRIPT);
    });
  };
};
