/**
 * hotpath - adaptive request routing engine.
 *
 * Watches per-route traffic, keeps the hottest routes on a fast path,
 * memoizes the ones that are safe to serve from cache and reorders
 * commutable middleware by measured cost.
 */

export { AdaptiveEngine, createEngine, type EngineOptions } from './engine.js';

export {
  EngineConfigSchema,
  HeatWeightsSchema,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILE,
  MAX_TIMER_SECONDS,
  parseConfig,
  validateConfig,
  mergeWithDefaults,
  loadConfig,
  type EngineConfig,
  type EngineConfigInput,
} from './config.js';

export { ConfigValidationError, describeError, errorMessage, type ConfigIssue } from './errors.js';

// Metrics
export * from './metrics/index.js';

// Scoring and prediction
export {
  HeatScorer,
  logNormalize,
  DEFAULT_HEAT_WEIGHTS,
  DEFAULT_HEAT_SCALE,
  type HeatWeights,
  type HeatScale,
  type HeatScoreBreakdown,
  type RouteScorer,
} from './scoring/heat-scorer.js';
export {
  LatencyPredictor,
  trendDirection,
  DEFAULT_PREDICTOR_CONFIG,
  type PredictorConfig,
  type PredictionSnapshot,
  type SpikeOutlook,
  type TrendDirection,
} from './prediction/predictor.js';
export { Ewma, samplesToConverge } from './prediction/ewma.js';

// Optimizer
export { AdaptiveOptimizer, qualifiesForMemoization, type OptimizerStats } from './optimizer/optimizer.js';
export { selectHotSet } from './optimizer/hot-set.js';
export { planMiddlewareOrder, type MiddlewareStageSpec, type OrderPlan } from './optimizer/middleware-order.js';
export type {
  RouteState,
  HotSetEntry,
  OptimizerDecision,
  OptimizerAction,
  EvolutionEntry,
  CycleResult,
  MemoizationSink,
} from './optimizer/types.js';

// Cache
export * from './cache/index.js';

// Reporting
export * from './reporting/index.js';

// Dispatch
export * from './dispatch/index.js';

// Integrations
export {
  hotpathMiddleware,
  resolveRouteKey,
  UNMATCHED_ROUTE,
  type CachedResponse,
  type HotpathEnv,
  type HotpathMiddlewareOptions,
} from './middleware/hono.js';
export * from './dashboard/index.js';

// Logging
export {
  EngineLogger,
  createLogger,
  createLoggerFromEnv,
  createEngineLogger,
  LoggerConfigs,
  correlationContext,
  withCorrelation,
  type LoggerConfig,
  type LogLevel,
} from './logging/index.js';
