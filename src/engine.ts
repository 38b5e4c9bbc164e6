/**
 * Adaptive Engine - owns every component and the periodic optimize cycle.
 *
 * The engine is constructed explicitly and handed to whatever integrates it
 * (the Hono middleware, the dashboard routes). There is no module-level
 * state: two engines in one process are fully independent.
 */

import { ResponseCache } from './cache/response-cache.js';
import { routeCachePrefix, type CacheKeyMaterial } from './cache/fingerprint.js';
import { parseConfig, type EngineConfig, type EngineConfigInput } from './config.js';
import { DispatchHook } from './dispatch/hook.js';
import { MiddlewarePipeline } from './dispatch/pipeline.js';
import type { PipelineStage, RequestContext, RequestToken } from './dispatch/types.js';
import { errorMessage } from './errors.js';
import { createLogger, type EngineLogger } from './logging/index.js';
import { MetricRecorder } from './metrics/recorder.js';
import type { RouteId, RouteKey } from './metrics/types.js';
import { AdaptiveOptimizer } from './optimizer/optimizer.js';
import type { CycleResult, MemoizationSink, OptimizerDecision } from './optimizer/types.js';
import { LatencyPredictor } from './prediction/predictor.js';
import { EngineReporter } from './reporting/reporter.js';
import type { Report } from './reporting/types.js';
import { HeatScorer } from './scoring/heat-scorer.js';

export interface EngineOptions {
  logger?: EngineLogger;
  /** Wall clock shared by every component */
  now?: () => number;
}

/**
 * Per-route TTLs handed out by memoize directives. Un-memoizing a route drops
 * its cached responses.
 */
class MemoizationTable<V> implements MemoizationSink {
  private ttls = new Map<RouteId, number>();

  constructor(
    private readonly cache: ResponseCache<V>,
    private readonly defaultTtlMs: number,
    private readonly logger: EngineLogger
  ) {}

  memoize(route: RouteId, ttlMs: number): void {
    this.ttls.set(route, ttlMs);
  }

  unmemoize(route: RouteId): void {
    this.ttls.delete(route);
    const dropped = this.cache.invalidatePrefix(routeCachePrefix(route));
    if (dropped > 0) {
      this.logger.debug('Dropped cached responses', { route, entries: dropped });
    }
  }

  ttlFor(route: RouteId): number {
    return this.ttls.get(route) ?? this.defaultTtlMs;
  }

  clear(): void {
    this.ttls.clear();
  }
}

export class AdaptiveEngine<V = unknown> {
  readonly config: EngineConfig;
  readonly recorder: MetricRecorder;
  readonly scorer: HeatScorer;
  readonly predictor: LatencyPredictor;
  readonly optimizer: AdaptiveOptimizer;
  readonly cache: ResponseCache<V>;
  readonly reporter: EngineReporter;
  readonly hook: DispatchHook<V>;

  private readonly logger: EngineLogger;
  private readonly memoization: MemoizationTable<V>;
  private enabled: boolean;
  private started = false;
  private running = false;
  private timer: NodeJS.Timeout | null = null;
  private pipeline: MiddlewarePipeline<RequestContext> | null = null;

  constructor(config: EngineConfig, options: EngineOptions = {}) {
    this.config = config;
    this.enabled = config.enabled;
    const now = options.now ?? Date.now;
    this.logger = (options.logger ?? createLogger(config.logging)).child({ component: 'engine' });

    const ttlMs = config.cacheDefaultTtlSeconds * 1000;
    this.recorder = new MetricRecorder(config.recorder, now);
    this.scorer = new HeatScorer(config.heatWeights, config.heatScale);
    this.predictor = new LatencyPredictor(config.predictor, now);
    this.cache = new ResponseCache<V>({ maxEntries: config.cacheMaxEntries, defaultTtlMs: ttlMs }, now);
    this.memoization = new MemoizationTable(this.cache, ttlMs, this.logger);

    this.optimizer = new AdaptiveOptimizer(
      {
        hotSetCapacity: config.hotSetCapacity,
        watchMinSamples: config.watchMinSamples,
        autoMemoizeEnabled: config.autoMemoizeEnabled,
        middlewareReorderEnabled: config.middlewareReorderEnabled,
        autoMemoize: config.autoMemoize,
        evolutionLogSize: config.evolutionLogSize,
        memoizeTtlMs: ttlMs,
      },
      { recorder: this.recorder, scorer: this.scorer, logger: this.logger, memoization: this.memoization, now }
    );

    const activePredictor = () => (config.predictorEnabled ? this.predictor : null);

    this.reporter = new EngineReporter(
      {
        recorder: this.recorder,
        scorer: this.scorer,
        optimizer: this.optimizer,
        cache: this.cache,
        predictor: activePredictor,
        isEnabled: () => this.enabled,
      },
      {
        now,
        suggestions: {
          slowRouteThresholdMs: config.slowRouteThresholdMs,
          errorRate: 0.05,
          minRequests: 10,
          memoizeRps: config.autoMemoize.minRps,
        },
      }
    );

    this.hook = new DispatchHook<V>({
      recorder: this.recorder,
      optimizer: this.optimizer,
      cache: this.cache,
      logger: this.logger,
      predictor: activePredictor,
      isEnabled: () => this.enabled,
      memoizeTtlMs: route => this.memoization.ttlFor(route),
      now,
    });
  }

  get isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * True while the periodic cycle is armed.
   */
  get isScheduled(): boolean {
    return this.timer !== null;
  }

  get decision(): OptimizerDecision {
    return this.optimizer.decision;
  }

  // ---- dispatch hook -------------------------------------------------------

  onRequestStart(key: RouteKey): RequestToken {
    return this.hook.onRequestStart(key);
  }

  onRequestEnd(token: RequestToken, latencyMs: number, statusCode: number, responseBytes?: number): void {
    this.hook.onRequestEnd(token, latencyMs, statusCode, responseBytes);
  }

  shouldServeFromCache(key: RouteKey, material?: CacheKeyMaterial): V | undefined {
    return this.hook.shouldServeFromCache(key, material);
  }

  storeResponse(key: RouteKey, material: CacheKeyMaterial, value: V): boolean {
    return this.hook.storeResponse(key, material, value);
  }

  /**
   * Builds the middleware pipeline and declares its stages to the optimizer.
   * Replaces any pipeline registered before.
   */
  usePipeline(stages: readonly PipelineStage<RequestContext>[]): MiddlewarePipeline<RequestContext> {
    const pipeline = new MiddlewarePipeline<RequestContext>(stages, {
      recorder: this.recorder,
      logger: this.logger,
      order: () => (this.enabled ? this.optimizer.decision.middlewareOrder : null),
    });
    this.optimizer.setMiddlewareStages(pipeline.specs());
    this.pipeline = pipeline;
    return pipeline;
  }

  getPipeline(): MiddlewarePipeline<RequestContext> | null {
    return this.pipeline;
  }

  /** Logger for an integration mounted on this engine */
  loggerFor(component: string): EngineLogger {
    return this.logger.child({ component });
  }

  // ---- lifecycle -----------------------------------------------------------

  /**
   * Arms the periodic optimize cycle. Does nothing while disabled; `enable()`
   * arms it later.
   */
  start(): void {
    this.started = true;
    if (this.enabled) this.schedule();
    this.logger.info('Engine started', {
      enabled: this.enabled,
      intervalSeconds: this.config.optimizeIntervalSeconds,
    });
  }

  stop(): void {
    this.started = false;
    this.clearTimer();
    this.logger.info('Engine stopped');
  }

  /**
   * Resumes recording and optimizing from the existing state.
   */
  enable(): void {
    if (this.enabled) return;
    this.enabled = true;
    if (this.started) this.schedule();
    this.logger.info('Engine enabled');
  }

  /**
   * Stops the optimize cycle and turns the hooks into pass-throughs.
   * Accumulated statistics are kept.
   */
  disable(): void {
    if (!this.enabled) return;
    this.enabled = false;
    this.clearTimer();
    this.logger.info('Engine disabled');
  }

  /**
   * Clears statistics, predictions, hot set, memoization, cached responses
   * and report history. The cycle timer keeps running.
   */
  reset(): void {
    this.optimizer.reset();
    this.memoization.clear();
    this.recorder.reset();
    this.predictor.reset();
    this.cache.clear();
    this.reporter.reset();
    this.logger.info('Engine state reset');
  }

  /**
   * Runs one optimize cycle now. Returns null when a cycle is already
   * running.
   */
  runCycle(): CycleResult | null {
    if (this.running) {
      this.logger.debug('Optimize cycle already running; skipped');
      return null;
    }

    this.running = true;
    try {
      const result = this.optimizer.runCycle();
      const swept = this.cache.sweep();
      if (swept > 0) {
        this.logger.debug('Swept expired cache entries', { entries: swept });
      }
      return result;
    } finally {
      this.running = false;
    }
  }

  // ---- reporting -----------------------------------------------------------

  snapshot(): Report {
    return this.reporter.snapshot();
  }

  printableReport(): string {
    return this.reporter.printable();
  }

  toJson(): string {
    return this.reporter.toJson();
  }

  // ---- timer ---------------------------------------------------------------

  private schedule(): void {
    if (this.timer) return;
    this.timer = setTimeout(() => this.tick(), this.config.optimizeIntervalSeconds * 1000);
    this.timer.unref();
  }

  private tick(): void {
    this.timer = null;
    try {
      this.runCycle();
    } catch (error) {
      this.logger.error(`Optimize cycle raised outside the optimizer: ${errorMessage(error)}`);
    }
    if (this.started && this.enabled) {
      this.schedule();
    }
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}

/**
 * Validates `config` (throwing ConfigValidationError on bad input) and
 * builds an engine.
 */
export function createEngine<V = unknown>(
  config: EngineConfigInput = {},
  options: EngineOptions = {}
): AdaptiveEngine<V> {
  return new AdaptiveEngine<V>(parseConfig(config), options);
}
