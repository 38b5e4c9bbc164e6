/**
 * Adaptive Optimizer - the decision loop.
 *
 * Each cycle reads the recorder, scores routes, moves routes between
 * cold/watched/hot/memoized, rebuilds the middleware order and publishes the
 * result as a single frozen OptimizerDecision. Requests only ever read the
 * published object, so they see either the previous decision or the new one,
 * never a mix.
 *
 * A cycle that throws is logged and counted; the previous decision stays.
 */

import type { EngineLogger } from '../logging/index.js';
import type { MetricRecorder } from '../metrics/recorder.js';
import type { RouteId, RouteKey, RouteStats } from '../metrics/types.js';
import { routeId } from '../metrics/types.js';
import type { RouteScorer } from '../scoring/heat-scorer.js';
import { selectHotSet } from './hot-set.js';
import { planMiddlewareOrder, type MiddlewareStageSpec } from './middleware-order.js';
import type {
  CycleResult,
  EvolutionEntry,
  MemoizationSink,
  OptimizerAction,
  OptimizerConfig,
  OptimizerDecision,
  RouteState,
} from './types.js';

export interface OptimizerDeps {
  recorder: MetricRecorder;
  scorer: RouteScorer;
  logger: EngineLogger;
  memoization?: MemoizationSink;
  now?: () => number;
}

export interface OptimizerStats {
  cycles: number;
  failedCycles: number;
  lastCycleAt: number | null;
  lastCycleDurationMs: number;
  lastError: string | null;
  hotRoutes: number;
  memoizedRoutes: number;
  totalActions: number;
  middlewareReorders: number;
}

export function emptyDecision(decidedAt = 0): OptimizerDecision {
  return Object.freeze({
    cycle: 0,
    decidedAt,
    hotSet: Object.freeze([]),
    hotRoutes: new Set<RouteId>(),
    memoized: new Set<RouteId>(),
    states: new Map<RouteId, RouteState>(),
    scores: new Map<RouteId, number>(),
    middlewareOrder: null,
  });
}

/**
 * True when a hot route passes every auto-memoize gate.
 */
export function qualifiesForMemoization(stats: RouteStats, config: OptimizerConfig): boolean {
  const gates = config.autoMemoize;
  return stats.method === 'GET'
    && stats.rps >= gates.minRps
    && stats.errorRate <= gates.maxErrorRate
    && stats.totalRequests >= gates.minSamples;
}

export class AdaptiveOptimizer {
  private current: OptimizerDecision;
  private cycleCount = 0;
  private failedCycles = 0;
  private lastCycleAt: number | null = null;
  private lastCycleDurationMs = 0;
  private lastError: string | null = null;
  private totalActions = 0;
  private middlewareReorders = 0;
  private evolution: EvolutionEntry[] = [];
  private stages: MiddlewareStageSpec[] = [];

  private readonly recorder: MetricRecorder;
  private readonly scorer: RouteScorer;
  private readonly logger: EngineLogger;
  private readonly memoization: MemoizationSink | undefined;
  private readonly now: () => number;

  constructor(private readonly config: OptimizerConfig, deps: OptimizerDeps) {
    this.recorder = deps.recorder;
    this.scorer = deps.scorer;
    this.logger = deps.logger.child({ component: 'optimizer' });
    this.memoization = deps.memoization;
    this.now = deps.now ?? Date.now;
    this.current = emptyDecision(this.now());
  }

  /**
   * The decision requests should act on right now.
   */
  get decision(): OptimizerDecision {
    return this.current;
  }

  isHot(key: RouteKey): boolean {
    return this.current.hotRoutes.has(routeId(key));
  }

  isMemoized(key: RouteKey): boolean {
    return this.current.memoized.has(routeId(key));
  }

  stateOf(route: RouteId): RouteState {
    return this.current.states.get(route) ?? 'cold';
  }

  /**
   * Declares the pipeline's stages in their written order.
   */
  setMiddlewareStages(stages: readonly MiddlewareStageSpec[]): void {
    this.stages = stages.map(stage => ({ ...stage }));
  }

  runCycle(): CycleResult {
    const startedAt = this.now();
    const cycle = this.cycleCount + 1;
    this.cycleCount = cycle;
    this.lastCycleAt = startedAt;

    try {
      const { decision, actions } = this.decide(cycle, startedAt);
      this.current = decision;
      this.applyDirectives(actions);
      this.recordEvolution(cycle, startedAt, actions);
      this.lastError = null;
      this.lastCycleDurationMs = this.now() - startedAt;

      this.logger.debug('Optimize cycle complete', {
        cycle,
        hotRoutes: decision.hotSet.length,
        memoized: decision.memoized.size,
        actions: actions.length,
      });
      return { ok: true, cycle, actions, durationMs: this.lastCycleDurationMs };
    } catch (caught) {
      const error = caught instanceof Error ? caught : new Error(String(caught));
      this.failedCycles++;
      this.lastError = error.message;
      this.lastCycleDurationMs = this.now() - startedAt;
      this.logger.error(`Optimize cycle ${cycle} failed; keeping decision from cycle ${this.current.cycle}`, error);
      return { ok: false, cycle, actions: [], durationMs: this.lastCycleDurationMs, error };
    }
  }

  private decide(cycle: number, decidedAt: number): { decision: OptimizerDecision; actions: OptimizerAction[] } {
    const previous = this.current;
    const allStats = this.recorder.getAllStats();
    const statsByRoute = new Map(allStats.map(stats => [stats.route, stats]));

    const scores = new Map<RouteId, number>();
    for (const stats of allStats) {
      const score = this.scorer.score(stats);
      if (!Number.isFinite(score)) {
        throw new Error(`Heat score for ${stats.route} is not a finite number (${score})`);
      }
      scores.set(stats.route, score);
    }

    const candidates = allStats
      .filter(stats => stats.totalRequests >= this.config.watchMinSamples)
      .map(stats => ({ route: stats.route, score: scores.get(stats.route) ?? 0 }));

    const selection = selectHotSet(candidates, previous.hotSet, this.config.hotSetCapacity, cycle);
    const hotRoutes = new Set(selection.entries.map(entry => entry.route));

    const memoized = new Set<RouteId>();
    if (this.config.autoMemoizeEnabled) {
      for (const route of hotRoutes) {
        const stats = statsByRoute.get(route);
        if (stats && qualifiesForMemoization(stats, this.config)) {
          memoized.add(route);
        }
      }
    }

    const states = new Map<RouteId, RouteState>();
    for (const stats of allStats) {
      states.set(stats.route, this.classify(stats, hotRoutes, memoized));
    }

    const actions: OptimizerAction[] = [];
    for (const route of selection.promoted) {
      actions.push({ type: 'promote', target: route, detail: `score=${formatScore(scores.get(route))}` });
    }
    for (const route of selection.demoted) {
      const score = scores.get(route);
      actions.push({ type: 'demote', target: route, detail: score === undefined ? 'no longer tracked' : `score=${formatScore(score)}` });
    }
    for (const route of memoized) {
      if (!previous.memoized.has(route)) {
        const stats = statsByRoute.get(route);
        actions.push({
          type: 'memoize',
          target: route,
          detail: `rps=${stats?.rps.toFixed(2)} errorRate=${stats?.errorRate.toFixed(4)} requests=${stats?.totalRequests}`,
        });
      }
    }
    for (const route of previous.memoized) {
      if (!memoized.has(route)) {
        actions.push({ type: 'unmemoize', target: route, detail: this.unmemoizeReason(statsByRoute.get(route), hotRoutes) });
      }
    }

    const middlewareOrder = this.planOrder(previous.middlewareOrder, actions);

    const decision: OptimizerDecision = Object.freeze({
      cycle,
      decidedAt,
      hotSet: Object.freeze(selection.entries),
      hotRoutes,
      memoized,
      states,
      scores,
      middlewareOrder,
    });

    return { decision, actions };
  }

  private classify(stats: RouteStats, hot: ReadonlySet<RouteId>, memoized: ReadonlySet<RouteId>): RouteState {
    if (memoized.has(stats.route)) return 'memoized';
    if (hot.has(stats.route)) return 'hot';
    if (stats.totalRequests >= this.config.watchMinSamples) return 'watched';
    return 'cold';
  }

  private planOrder(previousOrder: readonly string[] | null, actions: OptimizerAction[]): readonly string[] | null {
    if (this.stages.length === 0) return null;

    const declared = this.stages.map(stage => stage.name);
    if (!this.config.middlewareReorderEnabled) {
      return Object.freeze(declared);
    }

    const plan = planMiddlewareOrder(this.stages, this.recorder.getMiddlewareProfiles());
    const before = previousOrder ?? declared;
    if (plan.order.join('\u0000') !== before.join('\u0000')) {
      actions.push({
        type: 'reorder',
        target: plan.order.join(' → '),
        detail: `${before.join(' → ')} ⇒ ${plan.order.join(' → ')}`,
      });
    }
    return Object.freeze(plan.order);
  }

  private unmemoizeReason(stats: RouteStats | undefined, hot: ReadonlySet<RouteId>): string {
    if (!stats) return 'route no longer tracked';
    if (!this.config.autoMemoizeEnabled) return 'auto-memoization disabled';
    if (!hot.has(stats.route)) return 'left the hot set';
    const gates = this.config.autoMemoize;
    if (stats.rps < gates.minRps) return `rps ${stats.rps.toFixed(2)} < ${gates.minRps}`;
    if (stats.errorRate > gates.maxErrorRate) return `error rate ${stats.errorRate.toFixed(4)} > ${gates.maxErrorRate}`;
    if (stats.totalRequests < gates.minSamples) return `requests ${stats.totalRequests} < ${gates.minSamples}`;
    return 'conditions no longer met';
  }

  private applyDirectives(actions: readonly OptimizerAction[]): void {
    for (const action of actions) {
      this.logger.info(`Optimization: ${action.type} ${action.target}`, { detail: action.detail });
      if (!this.memoization) continue;
      if (action.type === 'memoize') {
        this.memoization.memoize(action.target, this.config.memoizeTtlMs);
      } else if (action.type === 'unmemoize') {
        this.memoization.unmemoize(action.target);
      }
    }
  }

  private recordEvolution(cycle: number, at: number, actions: OptimizerAction[]): void {
    if (actions.length === 0) return;
    this.totalActions += actions.length;
    this.middlewareReorders += actions.filter(action => action.type === 'reorder').length;
    this.evolution.push({ cycle, at, actions });
    if (this.evolution.length > this.config.evolutionLogSize) {
      this.evolution.splice(0, this.evolution.length - this.config.evolutionLogSize);
    }
  }

  getEvolutionLog(): EvolutionEntry[] {
    return this.evolution.map(entry => ({ ...entry, actions: [...entry.actions] }));
  }

  getStats(): OptimizerStats {
    return {
      cycles: this.cycleCount,
      failedCycles: this.failedCycles,
      lastCycleAt: this.lastCycleAt,
      lastCycleDurationMs: this.lastCycleDurationMs,
      lastError: this.lastError,
      hotRoutes: this.current.hotSet.length,
      memoizedRoutes: this.current.memoized.size,
      totalActions: this.totalActions,
      middlewareReorders: this.middlewareReorders,
    };
  }

  /**
   * Clears hot-set membership, memoization and history. Memoized routes get
   * an un-memoize directive so their cached responses go too.
   */
  reset(): void {
    if (this.memoization) {
      for (const route of this.current.memoized) {
        this.memoization.unmemoize(route);
      }
    }
    this.current = emptyDecision(this.now());
    this.evolution = [];
    this.cycleCount = 0;
    this.totalActions = 0;
    this.middlewareReorders = 0;
    this.failedCycles = 0;
    this.lastError = null;
  }
}

function formatScore(score: number | undefined): string {
  return score === undefined ? 'n/a' : score.toFixed(4);
}
