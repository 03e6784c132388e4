/**
 * Security Headers Plugin
 *
 * Configures HTTP security headers using @fastify/helmet.
 * The dashboard page loads Plotly from its CDN and draws the charts from
 * the figure JSON embedded in the page, so scripts are limited to self and
 * that CDN. Plotly writes inline styles into the chart SVG.
 */

import helmet from '@fastify/helmet';

import type { AppConfig } from '../config/env.js';
import type { FastifyInstance } from 'fastify';

export const PLOTLY_CDN_ORIGIN = 'https://cdn.plot.ly';

const CSP_DIRECTIVES = {
  defaultSrc: ["'self'"],
  scriptSrc: ["'self'", PLOTLY_CDN_ORIGIN],
  styleSrc: ["'self'", "'unsafe-inline'"],
  imgSrc: ["'self'", 'data:', 'blob:'],
  connectSrc: ["'self'"],
  fontSrc: ["'self'", 'data:'],
  objectSrc: ["'none'"],
  frameAncestors: ["'none'"],
  formAction: ["'self'"],
};

/**
 * HSTS configuration.
 * 1 year max-age with subdomains included.
 */
const HSTS_CONFIG = {
  maxAge: 31536000,
  includeSubDomains: true,
  preload: false,
};

/**
 * Registers HTTP security headers plugin.
 */
export async function registerSecurityHeaders(
  fastify: FastifyInstance,
  config: AppConfig
): Promise<void> {
  const { isProduction, isTest } = config.server;

  // Skip in test environment for easier testing
  if (isTest) {
    fastify.log.debug('Security headers disabled in test environment');
    return;
  }

  await fastify.register(helmet, {
    contentSecurityPolicy: {
      directives: CSP_DIRECTIVES,
    },
    dnsPrefetchControl: { allow: false },
    frameguard: { action: 'deny' },
    hsts: isProduction ? HSTS_CONFIG : false,
    referrerPolicy: { policy: 'strict-origin-when-cross-origin' },
    // Modern browsers rely on CSP instead
    xssFilter: false,
    hidePoweredBy: true,
    crossOriginEmbedderPolicy: false,
  });

  fastify.log.info(
    { environment: isProduction ? 'production' : 'development' },
    'Security headers plugin registered'
  );
}
