/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

export const DEFAULT_PLEDGES_SOURCE = './data/pledges.json';
export const DEFAULT_PAYMENTS_SOURCE = './data/payments.json';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  // Server
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),
  PORT: Type.Number({ default: 3000, minimum: 1, maximum: 65535 }),
  HOST: Type.String({ default: '0.0.0.0' }),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  // Data sources (URL or file path)
  PLEDGES_SOURCE: Type.String({ minLength: 1 }),
  PAYMENTS_SOURCE: Type.String({ minLength: 1 }),
  SOURCE_TIMEOUT_MS: Type.Integer({ minimum: 1, default: 30_000 }),

  // CORS
  ALLOWED_ORIGINS: Type.Optional(Type.String()),
});

export type Env = Static<typeof EnvSchema>;

const parseInteger = (raw: string | undefined, fallback: number): number =>
  raw != null && raw !== '' ? Number.parseInt(raw, 10) : fallback;

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    PORT: parseInteger(env['PORT'], 3000),
    HOST: env['HOST'] ?? '0.0.0.0',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    PLEDGES_SOURCE: env['PLEDGES_SOURCE'] ?? DEFAULT_PLEDGES_SOURCE,
    PAYMENTS_SOURCE: env['PAYMENTS_SOURCE'] ?? DEFAULT_PAYMENTS_SOURCE,
    SOURCE_TIMEOUT_MS: parseInteger(env['SOURCE_TIMEOUT_MS'], 30_000),
    ALLOWED_ORIGINS: env['ALLOWED_ORIGINS'],
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  server: {
    port: env.PORT,
    host: env.HOST,
    isDevelopment: env.NODE_ENV === 'development',
    isProduction: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
  },
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV !== 'production',
  },
  sources: {
    pledges: env.PLEDGES_SOURCE,
    payments: env.PAYMENTS_SOURCE,
    timeoutMs: env.SOURCE_TIMEOUT_MS,
  },
  cors: {
    /** Comma-separated list of origins allowed to call the JSON API */
    allowedOrigins: env.ALLOWED_ORIGINS,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
