/**
 * Health module exports
 */

export { makeHealthRoutes } from './shell/rest/routes.js';
export { makeTableHealthChecker, type TableHealthCheckerOptions } from './shell/checkers/index.js';
export { getReadiness, type GetReadinessDeps } from './core/usecases/get-readiness.js';
export { evaluateReadiness, mapCheckResults } from './core/logic.js';

export type { HealthChecker } from './core/ports.js';
export type { HealthCheckResult, LivenessResponse, ReadinessResponse } from './core/types.js';
