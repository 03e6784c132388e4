import type { HealthCheckResult, ReadinessResponse } from './types.js';

/**
 * Maps settled checker promises to results. A checker that threw is reported
 * unhealthy under its own name.
 */
export const mapCheckResults = (
  names: readonly string[],
  results: readonly PromiseSettledResult<HealthCheckResult>[]
): HealthCheckResult[] =>
  results.map((result, index) => {
    if (result.status === 'fulfilled') {
      return result.value;
    }
    return {
      name: names[index] ?? 'unknown',
      status: 'unhealthy',
      message: result.reason instanceof Error ? result.reason.message : 'Check failed',
    };
  });

export interface ReadinessInput {
  checks: HealthCheckResult[];
  uptime: number;
  timestamp: string;
  version?: string | undefined;
}

export const evaluateReadiness = (input: ReadinessInput): ReadinessResponse => {
  const { checks, uptime, timestamp, version } = input;
  const status = checks.some((c) => c.status === 'unhealthy') ? 'unhealthy' : 'ok';

  return {
    status,
    timestamp,
    uptime,
    checks,
    ...(version !== undefined && { version }),
  };
};
