/**
 * Optimizer decision types.
 */

import type { RouteId } from '../metrics/types.js';

/**
 * Lifecycle of a route across optimize cycles:
 * cold → watched (enough samples) → hot (in the hot set) → memoized
 * (hot and passing every auto-memoize gate), and back down when a
 * condition stops holding.
 */
export type RouteState = 'cold' | 'watched' | 'hot' | 'memoized';

export interface HotSetEntry {
  readonly route: RouteId;
  /** Cycle in which the route entered the hot set */
  readonly promotedAtCycle: number;
  readonly scoreAtPromotion: number;
  /** Score in the cycle that produced this decision */
  readonly score: number;
}

/**
 * Everything a request needs from the optimizer, published as one frozen
 * object and replaced wholesale each cycle.
 */
export interface OptimizerDecision {
  readonly cycle: number;
  readonly decidedAt: number;
  readonly hotSet: readonly HotSetEntry[];
  readonly hotRoutes: ReadonlySet<RouteId>;
  readonly memoized: ReadonlySet<RouteId>;
  readonly states: ReadonlyMap<RouteId, RouteState>;
  readonly scores: ReadonlyMap<RouteId, number>;
  /** Middleware stage names in execution order; null when nothing is declared */
  readonly middlewareOrder: readonly string[] | null;
}

export type OptimizerActionType = 'promote' | 'demote' | 'memoize' | 'unmemoize' | 'reorder';

export interface OptimizerAction {
  type: OptimizerActionType;
  /** Route or, for reorder, the new stage order joined by " → " */
  target: string;
  detail: string;
}

export interface EvolutionEntry {
  cycle: number;
  at: number;
  actions: OptimizerAction[];
}

export interface AutoMemoizeThresholds {
  minRps: number;
  maxErrorRate: number;
  minSamples: number;
}

export interface OptimizerConfig {
  hotSetCapacity: number;
  /** Requests before a route leaves the cold state */
  watchMinSamples: number;
  autoMemoizeEnabled: boolean;
  middlewareReorderEnabled: boolean;
  autoMemoize: AutoMemoizeThresholds;
  /** Cycles kept in the evolution log */
  evolutionLogSize: number;
  /** TTL handed to memoize directives */
  memoizeTtlMs: number;
}

export const DEFAULT_OPTIMIZER_CONFIG: OptimizerConfig = {
  hotSetCapacity: 20,
  watchMinSamples: 10,
  autoMemoizeEnabled: true,
  middlewareReorderEnabled: true,
  autoMemoize: { minRps: 5, maxErrorRate: 0.02, minSamples: 50 },
  evolutionLogSize: 100,
  memoizeTtlMs: 30_000,
};

/**
 * Receives memoize / un-memoize directives. The optimizer never touches
 * cache entries itself.
 */
export interface MemoizationSink {
  memoize(route: RouteId, ttlMs: number): void;
  unmemoize(route: RouteId): void;
}

export interface CycleResult {
  ok: boolean;
  cycle: number;
  actions: OptimizerAction[];
  durationMs: number;
  error?: Error;
}
