import { describe, expect, it } from 'vitest';

import { createConfig, parseEnv } from '@/infra/config/index.js';

describe('parseEnv', () => {
  it('applies defaults', () => {
    expect(parseEnv({})).toEqual({
      NODE_ENV: 'development',
      PORT: 3000,
      HOST: '0.0.0.0',
      LOG_LEVEL: 'info',
      PLEDGES_SOURCE: './data/pledges.json',
      PAYMENTS_SOURCE: './data/payments.json',
      SOURCE_TIMEOUT_MS: 30000,
      ALLOWED_ORIGINS: undefined,
    });
  });

  it('reads numeric settings', () => {
    const env = parseEnv({ PORT: '8080', SOURCE_TIMEOUT_MS: '5000' });
    expect(env.PORT).toBe(8080);
    expect(env.SOURCE_TIMEOUT_MS).toBe(5000);
  });

  it('rejects invalid values', () => {
    expect(() => parseEnv({ PORT: 'eighty' })).toThrow(/^Invalid environment configuration: /);
    expect(() => parseEnv({ LOG_LEVEL: 'loud' })).toThrow(/^Invalid environment configuration: /);
    expect(() => parseEnv({ SOURCE_TIMEOUT_MS: '0' })).toThrow(
      /^Invalid environment configuration: /
    );
    expect(() => parseEnv({ PLEDGES_SOURCE: '' })).toThrow(/^Invalid environment configuration: /);
  });
});

describe('createConfig', () => {
  it('maps the environment to the app config', () => {
    const config = createConfig(
      parseEnv({
        NODE_ENV: 'production',
        PLEDGES_SOURCE: 'https://data.example.test/pledges.json',
        ALLOWED_ORIGINS: 'https://dash.example.test',
      })
    );

    expect(config.server.isProduction).toBe(true);
    expect(config.logger.pretty).toBe(false);
    expect(config.sources).toEqual({
      pledges: 'https://data.example.test/pledges.json',
      payments: './data/payments.json',
      timeoutMs: 30000,
    });
    expect(config.cors.allowedOrigins).toBe('https://dash.example.test');
  });
});
