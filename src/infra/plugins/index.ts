export { registerCors, parseAllowedOrigins, isLocalhostOrigin } from './cors.js';
export { registerSecurityHeaders, PLOTLY_CDN_ORIGIN } from './security-headers.js';
