import { evaluateReadiness, mapCheckResults } from '../logic.js';

import type { HealthChecker } from '../ports.js';
import type { ReadinessResponse } from '../types.js';

export interface GetReadinessDeps {
  checkers: readonly HealthChecker[];
  version?: string | undefined;
}

export interface GetReadinessInput {
  uptime: number;
  timestamp: string;
}

/**
 * Runs every checker in parallel and folds the results into one readiness status.
 */
export async function getReadiness(
  deps: GetReadinessDeps,
  input: GetReadinessInput
): Promise<ReadinessResponse> {
  const { checkers, version } = deps;

  const results = await Promise.allSettled(checkers.map((checker) => checker.check()));
  const checks = mapCheckResults(
    checkers.map((checker) => checker.name),
    results
  );

  return evaluateReadiness({ checks, uptime: input.uptime, timestamp: input.timestamp, version });
}
