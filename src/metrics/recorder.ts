/**
 * Metric Recorder - per-route counters, latency windows and rps estimates.
 *
 * Every route owns its own RouteRecord, so recording for one route never
 * touches another route's state. `record()` is a handful of counter updates
 * and one ring-buffer write; percentiles are only computed when a snapshot
 * is requested.
 */

import { CircularBuffer } from './circular-buffer.js';
import type {
  MiddlewareCostProfile,
  RecorderConfig,
  RouteId,
  RouteKey,
  RouteStats,
  TrafficTotals,
} from './types.js';
import { DEFAULT_RECORDER_CONFIG, routeId } from './types.js';

/**
 * Sliding per-second counter: one slot per second of the trailing window.
 */
class RateWindow {
  private readonly seconds: number[];
  private readonly counts: number[];

  constructor(private readonly windowSeconds: number) {
    this.seconds = new Array<number>(windowSeconds).fill(-1);
    this.counts = new Array<number>(windowSeconds).fill(0);
  }

  hit(nowMs: number): void {
    const second = Math.floor(nowMs / 1000);
    const slot = second % this.windowSeconds;
    if (this.seconds[slot] !== second) {
      this.seconds[slot] = second;
      this.counts[slot] = 0;
    }
    this.counts[slot] = (this.counts[slot] ?? 0) + 1;
  }

  /**
   * Hits in the trailing window (the current second included) divided by its length.
   */
  rate(nowMs: number): number {
    const current = Math.floor(nowMs / 1000);
    let total = 0;
    for (let i = 0; i < this.windowSeconds; i++) {
      const second = this.seconds[i] ?? -1;
      if (second > current - this.windowSeconds && second <= current) {
        total += this.counts[i] ?? 0;
      }
    }
    return total / this.windowSeconds;
  }

  clear(): void {
    this.seconds.fill(-1);
    this.counts.fill(0);
  }
}

class RouteRecord {
  totalRequests = 0;
  totalErrors = 0;
  total5xx = 0;
  totalResponseBytes = 0;
  inFlight = 0;
  lastUpdated: number;
  readonly latencies: CircularBuffer<number>;
  readonly rate: RateWindow;

  constructor(readonly key: RouteKey, readonly firstSeen: number, config: RecorderConfig) {
    this.lastUpdated = firstSeen;
    this.latencies = new CircularBuffer<number>(config.latencyWindowSize);
    this.rate = new RateWindow(config.rpsWindowSeconds);
  }

  record(latencyMs: number, statusCode: number, responseBytes: number, now: number): void {
    this.totalRequests++;
    if (statusCode >= 400) this.totalErrors++;
    if (statusCode >= 500) this.total5xx++;
    if (Number.isFinite(latencyMs) && latencyMs >= 0) {
      this.latencies.push(latencyMs);
    }
    if (Number.isFinite(responseBytes) && responseBytes > 0) {
      this.totalResponseBytes += responseBytes;
    }
    this.rate.hit(now);
    this.lastUpdated = now;
  }

  snapshot(now: number): RouteStats {
    const sorted = this.latencies.toArray().sort((a, b) => a - b);
    const sum = sorted.reduce((acc, value) => acc + value, 0);

    return {
      route: routeId(this.key),
      method: this.key.method,
      path: this.key.path,
      totalRequests: this.totalRequests,
      totalErrors: this.totalErrors,
      total5xx: this.total5xx,
      errorRate: this.totalRequests > 0 ? this.totalErrors / this.totalRequests : 0,
      rps: this.rate.rate(now),
      sampleCount: sorted.length,
      avgLatencyMs: sorted.length > 0 ? sum / sorted.length : 0,
      p50LatencyMs: percentile(sorted, 50),
      p95LatencyMs: percentile(sorted, 95),
      p99LatencyMs: percentile(sorted, 99),
      avgResponseBytes: this.totalRequests > 0 ? this.totalResponseBytes / this.totalRequests : 0,
      firstSeen: this.firstSeen,
      lastUpdated: this.lastUpdated,
      inFlight: this.inFlight,
    };
  }
}

class MiddlewareRecord {
  calls = 0;
  shortCircuits = 0;
  private costSum = 0;
  private readonly costs: CircularBuffer<number>;

  constructor(readonly name: string, windowSize: number) {
    this.costs = new CircularBuffer<number>(windowSize);
  }

  record(costMs: number, shortCircuited: boolean): void {
    this.calls++;
    if (shortCircuited) this.shortCircuits++;
    if (!Number.isFinite(costMs) || costMs < 0) return;
    const evicted = this.costs.push(costMs);
    this.costSum += costMs - (evicted ?? 0);
  }

  profile(): MiddlewareCostProfile {
    const samples = this.costs.getSize();
    return {
      name: this.name,
      calls: this.calls,
      avgCostMs: samples > 0 ? this.costSum / samples : 0,
      shortCircuits: this.shortCircuits,
      shortCircuitRate: this.calls > 0 ? this.shortCircuits / this.calls : 0,
    };
  }
}

/**
 * Nearest-rank percentile over an ascending array: index `ceil(p/100 * n) - 1`.
 */
export function percentile(sortedValues: readonly number[], p: number): number {
  if (sortedValues.length === 0) return 0;
  const index = Math.ceil((p / 100) * sortedValues.length) - 1;
  return sortedValues[Math.max(0, Math.min(index, sortedValues.length - 1))] ?? 0;
}

const MIDDLEWARE_WINDOW = 500;

export class MetricRecorder {
  private routes = new Map<RouteId, RouteRecord>();
  private middleware = new Map<string, MiddlewareRecord>();
  private globalRate: RateWindow;
  private totalRequests = 0;
  private totalErrors = 0;

  constructor(
    private readonly config: RecorderConfig = DEFAULT_RECORDER_CONFIG,
    private readonly now: () => number = Date.now
  ) {
    this.globalRate = new RateWindow(config.rpsWindowSeconds);
  }

  /**
   * Returns the route's record, creating it on first sight.
   */
  private ensure(key: RouteKey): RouteRecord {
    const id = routeId(key);
    let record = this.routes.get(id);
    if (!record) {
      record = new RouteRecord(key, this.now(), this.config);
      this.routes.set(id, record);
    }
    return record;
  }

  /**
   * Registers a route without counting a request (used when a request starts).
   */
  track(key: RouteKey): void {
    this.ensure(key).inFlight++;
  }

  /**
   * Counterpart of `track` for requests that end without a `record`.
   */
  untrack(key: RouteKey): void {
    const record = this.routes.get(routeId(key));
    if (record && record.inFlight > 0) record.inFlight--;
  }

  record(key: RouteKey, latencyMs: number, statusCode: number, responseBytes = 0): void {
    const now = this.now();
    this.ensure(key).record(latencyMs, statusCode, responseBytes, now);
    this.globalRate.hit(now);
    this.totalRequests++;
    if (statusCode >= 400) this.totalErrors++;
  }

  recordMiddleware(name: string, costMs: number, shortCircuited = false): void {
    let record = this.middleware.get(name);
    if (!record) {
      record = new MiddlewareRecord(name, MIDDLEWARE_WINDOW);
      this.middleware.set(name, record);
    }
    record.record(costMs, shortCircuited);
  }

  has(key: RouteKey): boolean {
    return this.routes.has(routeId(key));
  }

  getStats(key: RouteKey): RouteStats | null {
    const record = this.routes.get(routeId(key));
    return record ? record.snapshot(this.now()) : null;
  }

  /**
   * Snapshots of every tracked route, ordered by route id.
   */
  getAllStats(): RouteStats[] {
    const now = this.now();
    return [...this.routes.keys()]
      .sort()
      .map(id => this.routes.get(id))
      .filter((record): record is RouteRecord => record !== undefined)
      .map(record => record.snapshot(now));
  }

  getMiddlewareProfiles(): MiddlewareCostProfile[] {
    return [...this.middleware.values()].map(record => record.profile());
  }

  getTotals(): TrafficTotals {
    return {
      totalRequests: this.totalRequests,
      totalErrors: this.totalErrors,
      globalRps: this.globalRate.rate(this.now()),
      trackedRoutes: this.routes.size,
      trackedMiddleware: this.middleware.size,
    };
  }

  /**
   * Zeroes every route's counters and window. Routes stay known (with zero
   * counts) so a report taken right after shows them as reset, not vanished.
   */
  reset(): void {
    const now = this.now();
    for (const [id, record] of this.routes) {
      const fresh = new RouteRecord(record.key, now, this.config);
      fresh.inFlight = record.inFlight;
      this.routes.set(id, fresh);
    }
    this.middleware.clear();
    this.globalRate.clear();
    this.totalRequests = 0;
    this.totalErrors = 0;
  }

  /**
   * Drops every route, including their identities.
   */
  clear(): void {
    this.routes.clear();
    this.middleware.clear();
    this.globalRate.clear();
    this.totalRequests = 0;
    this.totalErrors = 0;
  }
}
