/**
 * API server entry point
 * Loads the pledge and payment sources, then starts the Fastify HTTP server
 */

import 'dotenv/config';

import { buildApp } from './app/build-app.js';
import { parseEnv, createConfig } from './infra/config/index.js';
import { createLogger, PRETTY_TRANSPORT } from './infra/logger/index.js';
import { createSourceReader, loadJoinedTable } from './modules/pledges/index.js';

const getVersion = (): string | undefined => process.env['APP_VERSION'];

const main = async (): Promise<void> => {
  const env = parseEnv(process.env);
  const config = createConfig(env);

  const logger = createLogger({
    level: config.logger.level,
    pretty: config.logger.pretty,
  });

  logger.info({ config: { server: config.server, sources: config.sources } }, 'Starting API server');

  const sourceReader = createSourceReader({
    timeoutMs: config.sources.timeoutMs,
    logger,
  });

  const tableResult = await loadJoinedTable(
    { sourceReader, logger },
    { pledgesSource: config.sources.pledges, paymentsSource: config.sources.payments }
  );

  if (tableResult.isErr()) {
    logger.fatal({ err: tableResult.error }, `Failed to load data: ${tableResult.error.message}`);
    process.exit(1);
  }

  const app = await buildApp({
    fastifyOptions: {
      logger: {
        level: config.logger.level,
        ...(config.logger.pretty && { transport: PRETTY_TRANSPORT }),
      },
      disableRequestLogging: false,
    },
    deps: {
      config,
      table: tableResult.value,
    },
    version: getVersion(),
  });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');

    try {
      await app.close();
      logger.info('Server closed gracefully');
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  try {
    const address = await app.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info({ address }, 'Server listening');
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
};

// Start the server (top-level await)
await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
