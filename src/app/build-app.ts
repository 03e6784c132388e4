/**
 * Fastify application factory
 * Creates and configures the Fastify instance with all plugins and routes
 */

import fastifyLib, {
  type FastifyInstance,
  type FastifyServerOptions,
  type FastifyError,
} from 'fastify';

import { registerCors, registerSecurityHeaders } from '../infra/plugins/index.js';
import { makeDashboardRoutes } from '../modules/dashboard/index.js';
import {
  makeHealthRoutes,
  makeTableHealthChecker,
  type HealthChecker,
} from '../modules/health/index.js';

import type { AppConfig } from '../infra/config/env.js';
import type { LoadedTable } from '../modules/pledges/index.js';

/**
 * Application dependencies that can be injected
 */
export interface AppDeps {
  config: AppConfig;
  /** Joined pledge/payment table, loaded once before the app is built */
  table: LoadedTable;
  /** Extra readiness checks; the joined table checker is always included */
  healthCheckers?: HealthChecker[];
}

/**
 * Application options combining Fastify options with our custom deps
 */
export interface AppOptions {
  fastifyOptions?: FastifyServerOptions;
  deps?: Partial<AppDeps>;
  version?: string | undefined;
}

/**
 * Creates and configures the Fastify application
 * This is the composition root where all modules are wired together
 */
export const buildApp = async (options: AppOptions = {}): Promise<FastifyInstance> => {
  const { fastifyOptions = {}, deps = {}, version } = options;

  if (deps.config === undefined || deps.table === undefined) {
    throw new Error('Missing required dependencies: config, table');
  }

  const { config, table, healthCheckers = [] } = deps;

  const app = fastifyLib({
    ...fastifyOptions,
  });

  await registerCors(app, config);
  await registerSecurityHeaders(app, config);

  // Handlers must exist before the route plugins load so their contexts inherit them
  app.setErrorHandler((error: FastifyError, request, reply) => {
    request.log.error({ err: error }, 'Request error');

    if (error.validation != null) {
      return reply.status(400).send({
        ok: false,
        error: 'ValidationError',
        message: `Request validation failed: ${error.message}`,
      });
    }

    // Errors that already carry an HTTP status (body too large, bad content type, ...)
    if (error.statusCode != null && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        ok: false,
        error: error.name,
        message: error.message,
      });
    }

    return reply.status(500).send({
      ok: false,
      error: 'InternalServerError',
      message: 'An unexpected error occurred',
    });
  });

  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      ok: false,
      error: 'NotFoundError',
      message: `Route ${request.method} ${request.url} not found`,
    });
  });

  await app.register(
    makeHealthRoutes({
      ...(version !== undefined && { version }),
      checkers: [makeTableHealthChecker(table), ...healthCheckers],
    })
  );

  await app.register(makeDashboardRoutes({ records: table.records }));

  return app;
};

/**
 * Build app and prepare it (await all plugins)
 */
export const createApp = async (options: AppOptions = {}): Promise<FastifyInstance> => {
  const app = await buildApp(options);
  await app.ready();
  return app;
};
