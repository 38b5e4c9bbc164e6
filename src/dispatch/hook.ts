/**
 * Dispatch Hook - the three calls a host router makes per request.
 *
 * None of these methods throws. A fault inside the engine is logged at warn
 * and the request proceeds as if the engine were not there: the handler runs
 * and no cached value is served.
 */

import type { ResponseCache } from '../cache/response-cache.js';
import { fingerprint, type CacheKeyMaterial } from '../cache/fingerprint.js';
import { errorMessage } from '../errors.js';
import type { EngineLogger } from '../logging/index.js';
import { correlationContext, generateCorrelationId } from '../logging/index.js';
import type { MetricRecorder } from '../metrics/recorder.js';
import type { RouteId, RouteKey } from '../metrics/types.js';
import { routeId } from '../metrics/types.js';
import type { AdaptiveOptimizer } from '../optimizer/optimizer.js';
import type { LatencyPredictor } from '../prediction/predictor.js';
import type { RequestToken } from './types.js';

export interface DispatchHookDeps<V> {
  recorder: MetricRecorder;
  optimizer: AdaptiveOptimizer;
  cache: ResponseCache<V>;
  logger: EngineLogger;
  /** Current predictor, null while prediction is off */
  predictor: () => LatencyPredictor | null;
  isEnabled: () => boolean;
  /** TTL for responses stored for a memoized route */
  memoizeTtlMs: (route: RouteId) => number;
  now?: () => number;
}

export class DispatchHook<V = unknown> {
  private nextId = 1;
  private readonly logger: EngineLogger;
  private readonly now: () => number;

  constructor(private readonly deps: DispatchHookDeps<V>) {
    this.logger = deps.logger.child({ component: 'dispatch' });
    this.now = deps.now ?? Date.now;
  }

  onRequestStart(key: RouteKey): RequestToken {
    const tracked = this.deps.isEnabled();
    const token: RequestToken = {
      id: this.nextId++,
      routeKey: key,
      startedAt: this.now(),
      correlationId: correlationContext.getId() ?? generateCorrelationId(),
      tracked,
    };

    if (tracked) {
      try {
        this.deps.recorder.track(key);
      } catch (error) {
        this.warn('onRequestStart', key, error);
      }
    }
    return token;
  }

  /**
   * Records the finished request. `latencyMs` is measured by the caller;
   * status >= 400 counts as an error.
   */
  onRequestEnd(token: RequestToken, latencyMs: number, statusCode: number, responseBytes = 0): void {
    try {
      if (token.tracked) {
        this.deps.recorder.untrack(token.routeKey);
      }
      if (!this.deps.isEnabled()) return;

      this.deps.recorder.record(token.routeKey, latencyMs, statusCode, responseBytes);

      const predictor = this.deps.predictor();
      if (predictor && Number.isFinite(latencyMs) && latencyMs >= 0) {
        const observation = predictor.observe(token.routeKey, latencyMs);
        if (observation.anomalous) {
          this.logger.debug('Latency anomaly', {
            route: routeId(token.routeKey),
            latencyMs,
            zScore: Number(observation.zScore.toFixed(2)),
            correlationId: token.correlationId,
          });
        }
      }
    } catch (error) {
      this.warn('onRequestEnd', token.routeKey, error);
    }
  }

  /**
   * The stored response for this request, when its route is memoized and an
   * unexpired entry exists. Undefined means "run the handler".
   */
  shouldServeFromCache(key: RouteKey, material: CacheKeyMaterial = {}): V | undefined {
    try {
      if (!this.deps.isEnabled() || !this.deps.optimizer.isMemoized(key)) return undefined;
      return this.deps.cache.get(fingerprint(routeId(key), material));
    } catch (error) {
      this.warn('shouldServeFromCache', key, error);
      return undefined;
    }
  }

  /**
   * Stores a handler's response for a memoized route. Returns whether it was
   * stored.
   */
  storeResponse(key: RouteKey, material: CacheKeyMaterial, value: V, ttlMs?: number): boolean {
    try {
      if (!this.deps.isEnabled() || !this.deps.optimizer.isMemoized(key)) return false;
      const id = routeId(key);
      this.deps.cache.set(fingerprint(id, material), value, ttlMs ?? this.deps.memoizeTtlMs(id));
      return true;
    } catch (error) {
      this.warn('storeResponse', key, error);
      return false;
    }
  }

  private warn(operation: string, key: RouteKey, error: unknown): void {
    this.logger.warn(`Dispatch hook ${operation} failed; passing request through`, {
      route: routeId(key),
      error: errorMessage(error),
    });
  }
}
