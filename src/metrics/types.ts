/**
 * Traffic observation types shared by the recorder, scorer, predictor,
 * optimizer and reporter.
 */

export type HttpMethod = 'GET' | 'HEAD' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'OPTIONS' | (string & {});

/**
 * A route as the router knows it: method plus path pattern (not the concrete path).
 */
export interface RouteKey {
  readonly method: HttpMethod;
  readonly path: string;
}

/** "METHOD /pattern" */
export type RouteId = string;

export function routeKey(method: string, path: string): RouteKey {
  return Object.freeze({ method: method.toUpperCase(), path });
}

export function routeId(key: RouteKey): RouteId {
  return `${key.method.toUpperCase()} ${key.path}`;
}

export function parseRouteId(id: RouteId): RouteKey {
  const space = id.indexOf(' ');
  if (space <= 0) {
    return routeKey('GET', id);
  }
  return routeKey(id.slice(0, space), id.slice(space + 1));
}

/**
 * Point-in-time view of one route's counters and latency window.
 */
export interface RouteStats {
  route: RouteId;
  method: string;
  path: string;
  totalRequests: number;
  /** Responses with status >= 400 */
  totalErrors: number;
  total5xx: number;
  errorRate: number;
  /** Requests in the trailing rps window divided by its length */
  rps: number;
  /** Latency samples currently in the rolling window */
  sampleCount: number;
  avgLatencyMs: number;
  p50LatencyMs: number;
  p95LatencyMs: number;
  p99LatencyMs: number;
  avgResponseBytes: number;
  /** Requests started but not yet recorded */
  inFlight: number;
  firstSeen: number;
  lastUpdated: number;
}

/**
 * Measured cost of one middleware stage.
 */
export interface MiddlewareCostProfile {
  name: string;
  calls: number;
  avgCostMs: number;
  shortCircuits: number;
  shortCircuitRate: number;
}

export interface TrafficTotals {
  totalRequests: number;
  totalErrors: number;
  globalRps: number;
  trackedRoutes: number;
  trackedMiddleware: number;
}

export interface RecorderConfig {
  /** Latency samples kept per route */
  latencyWindowSize: number;
  /** Length of the trailing rps window, in seconds */
  rpsWindowSeconds: number;
}

export const DEFAULT_RECORDER_CONFIG: RecorderConfig = {
  latencyWindowSize: 1000,
  rpsWindowSeconds: 10,
};
