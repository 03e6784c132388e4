import type { HealthCheckResult } from './types.js';

export interface HealthChecker {
  readonly name: string;
  check(): Promise<HealthCheckResult>;
}
