/**
 * Tests for the metric recorder
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { MetricRecorder, percentile } from '../recorder.js';
import { CircularBuffer } from '../circular-buffer.js';
import { parseRouteId, routeId, routeKey } from '../types.js';

const users = routeKey('GET', '/users/:id');
const orders = routeKey('POST', '/orders');

describe('percentile', () => {
  const hundred = Array.from({ length: 100 }, (_, i) => i + 1);

  it('should use nearest rank', () => {
    expect(percentile(hundred, 50)).toBe(50);
    expect(percentile(hundred, 95)).toBe(95);
    expect(percentile(hundred, 99)).toBe(99);
    expect(percentile(hundred, 100)).toBe(100);
  });

  it('should handle tiny windows', () => {
    expect(percentile([], 95)).toBe(0);
    expect(percentile([7], 95)).toBe(7);
    expect(percentile([1, 2], 50)).toBe(1);
  });
});

describe('route keys', () => {
  it('should upper-case the method and join method and pattern', () => {
    const key = routeKey('get', '/users/:id');
    expect(key.method).toBe('GET');
    expect(routeId(key)).toBe('GET /users/:id');
  });

  it('should parse a route id back into a key', () => {
    expect(parseRouteId('DELETE /items/:id')).toEqual({ method: 'DELETE', path: '/items/:id' });
  });
});

describe('CircularBuffer', () => {
  it('should return the displaced item once full', () => {
    const buffer = new CircularBuffer<number>(3);
    expect(buffer.push(1)).toBeUndefined();
    expect(buffer.push(2)).toBeUndefined();
    expect(buffer.push(3)).toBeUndefined();
    expect(buffer.push(4)).toBe(1);
    expect(buffer.toArray()).toEqual([2, 3, 4]);
    expect(buffer.last()).toBe(4);
    expect(buffer.isFull()).toBe(true);
  });

  it('should reject a non-positive capacity', () => {
    expect(() => new CircularBuffer<number>(0)).toThrow(RangeError);
  });
});

describe('MetricRecorder', () => {
  let now: number;
  let recorder: MetricRecorder;

  beforeEach(() => {
    now = 1_000_000;
    recorder = new MetricRecorder({ latencyWindowSize: 5, rpsWindowSeconds: 10 }, () => now);
  });

  it('should count requests and errors', () => {
    for (let i = 0; i < 8; i++) recorder.record(users, 10, 200);
    recorder.record(users, 10, 500);
    recorder.record(users, 10, 404);

    const stats = recorder.getStats(users);
    expect(stats?.totalRequests).toBe(10);
    expect(stats?.totalErrors).toBe(2);
    expect(stats?.total5xx).toBe(1);
    expect(stats?.errorRate).toBeCloseTo(0.2, 10);
  });

  it('should keep only the most recent latencies', () => {
    for (let latency = 1; latency <= 8; latency++) {
      recorder.record(users, latency, 200);
    }

    const stats = recorder.getStats(users);
    expect(stats?.totalRequests).toBe(8);
    expect(stats?.sampleCount).toBe(5);
    expect(stats?.avgLatencyMs).toBe(6);
    expect(stats?.p50LatencyMs).toBe(6);
    expect(stats?.p95LatencyMs).toBe(8);
  });

  it('should estimate rps over the trailing window', () => {
    for (let i = 0; i < 20; i++) recorder.record(users, 5, 200);
    expect(recorder.getStats(users)?.rps).toBe(2);

    now += 10_000;
    expect(recorder.getStats(users)?.rps).toBe(0);
    expect(recorder.getStats(users)?.totalRequests).toBe(20);
  });

  it('should count a request with an unusable latency without sampling it', () => {
    recorder.record(users, Number.NaN, 200);
    recorder.record(users, -3, 200);

    const stats = recorder.getStats(users);
    expect(stats?.totalRequests).toBe(2);
    expect(stats?.sampleCount).toBe(0);
    expect(stats?.p95LatencyMs).toBe(0);
  });

  it('should keep routes independent', () => {
    recorder.record(users, 10, 200);
    recorder.record(orders, 300, 503);

    expect(recorder.getStats(users)?.totalErrors).toBe(0);
    expect(recorder.getStats(orders)?.totalErrors).toBe(1);
    expect(recorder.getAllStats().map(stats => stats.route)).toEqual(['GET /users/:id', 'POST /orders']);
  });

  it('should track requests in flight', () => {
    recorder.track(users);
    recorder.track(users);
    expect(recorder.getStats(users)?.inFlight).toBe(2);
    expect(recorder.getStats(users)?.totalRequests).toBe(0);

    recorder.untrack(users);
    recorder.untrack(users);
    recorder.untrack(users);
    expect(recorder.getStats(users)?.inFlight).toBe(0);
  });

  it('should return null for unknown routes', () => {
    expect(recorder.getStats(orders)).toBeNull();
    expect(recorder.has(orders)).toBe(false);
  });

  it('should profile middleware cost and short-circuits', () => {
    recorder.recordMiddleware('auth', 2);
    recorder.recordMiddleware('auth', 4, true);

    expect(recorder.getMiddlewareProfiles()).toEqual([
      { name: 'auth', calls: 2, avgCostMs: 3, shortCircuits: 1, shortCircuitRate: 0.5 },
    ]);
  });

  it('should report global totals', () => {
    for (let i = 0; i < 5; i++) recorder.record(users, 5, 200);
    for (let i = 0; i < 5; i++) recorder.record(orders, 5, 400);

    expect(recorder.getTotals()).toEqual({
      totalRequests: 10,
      totalErrors: 5,
      globalRps: 1,
      trackedRoutes: 2,
      trackedMiddleware: 0,
    });
  });

  it('should zero counts on reset but remember the routes', () => {
    for (let i = 0; i < 5; i++) recorder.record(users, 5, 500);
    recorder.recordMiddleware('auth', 1);
    recorder.reset();

    const stats = recorder.getStats(users);
    expect(recorder.has(users)).toBe(true);
    expect(stats?.totalRequests).toBe(0);
    expect(stats?.totalErrors).toBe(0);
    expect(stats?.sampleCount).toBe(0);
    expect(stats?.rps).toBe(0);
    expect(recorder.getMiddlewareProfiles()).toEqual([]);
    expect(recorder.getTotals().totalRequests).toBe(0);
  });

  it('should forget routes on clear', () => {
    recorder.record(users, 5, 200);
    recorder.clear();
    expect(recorder.getAllStats()).toEqual([]);
  });
});
