/**
 * CORS plugin for Fastify
 * Lets configured browser origins call the JSON dashboard API
 */

import cors from '@fastify/cors';

import type { AppConfig } from '../config/env.js';
import type { FastifyInstance } from 'fastify';

/**
 * Parse the comma-separated ALLOWED_ORIGINS value
 */
export function parseAllowedOrigins(raw: string | undefined): Set<string> {
  if (raw === undefined || raw === '') {
    return new Set();
  }

  return new Set(
    raw
      .split(',')
      .map((s) => s.trim())
      .filter((s) => s !== '')
  );
}

export function isLocalhostOrigin(origin: string): boolean {
  try {
    const url = new URL(origin);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      return false;
    }

    // Match hostnames exactly (avoid `startsWith('http://localhost')` pitfalls)
    return url.hostname === 'localhost' || url.hostname === '127.0.0.1' || url.hostname === '[::1]';
  } catch {
    return false;
  }
}

/**
 * Register CORS plugin with Fastify
 */
export async function registerCors(fastify: FastifyInstance, config: AppConfig): Promise<void> {
  const allowedOrigins = parseAllowedOrigins(config.cors.allowedOrigins);

  await fastify.register(cors, {
    origin: (origin, cb) => {
      // Same-origin page requests and server-to-server calls carry no Origin header
      if (origin === undefined || origin === '') {
        cb(null, true);
        return;
      }

      if (allowedOrigins.has(origin)) {
        cb(null, true);
        return;
      }

      // Local tooling is always allowed outside production
      if (!config.server.isProduction && isLocalhostOrigin(origin)) {
        cb(null, true);
        return;
      }

      cb(new Error('CORS origin not allowed'), false);
    },
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['content-type', 'accept', 'x-requested-with'],
    exposedHeaders: ['content-length'],
  });
}
