/**
 * Shared test data
 */

import { createLogger, LoggerConfigs, type EngineLogger } from '../logging/index.js';
import type { RouteStats } from '../metrics/types.js';

export function makeStats(overrides: Partial<RouteStats> = {}): RouteStats {
  const method = overrides.method ?? 'GET';
  const path = overrides.path ?? '/items';
  return {
    route: `${method} ${path}`,
    method,
    path,
    totalRequests: 100,
    totalErrors: 0,
    total5xx: 0,
    errorRate: 0,
    rps: 10,
    sampleCount: 100,
    avgLatencyMs: 50,
    p50LatencyMs: 40,
    p95LatencyMs: 100,
    p99LatencyMs: 150,
    avgResponseBytes: 0,
    inFlight: 0,
    firstSeen: 0,
    lastUpdated: 0,
    ...overrides,
  };
}

export function silentLogger(): EngineLogger {
  return createLogger(LoggerConfigs.silent());
}
