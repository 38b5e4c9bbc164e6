import type { ResponseCacheStats } from '../cache/response-cache.js';
import type {
  MiddlewareCostProfile,
  RouteId,
  RouteStats,
  TrafficTotals,
} from '../metrics/types.js';
import type { OptimizerStats } from '../optimizer/optimizer.js';
import type { EvolutionEntry, HotSetEntry, RouteState } from '../optimizer/types.js';
import type { SpikeOutlook, TrendDirection } from '../prediction/predictor.js';
import type { Suggestion } from './suggestions.js';

export interface RoutePrediction {
  forecastMs: number;
  ewmaMs: number;
  slopeMsPerSample: number;
  trend: TrendDirection;
  lastZScore: number;
  anomalous: boolean;
  anomalyCount: number;
  spike: SpikeOutlook;
}

export interface RouteDelta {
  /** Change since the previous report; 0 for routes it did not contain */
  score: number;
  rps: number;
}

export interface RouteReport {
  route: RouteId;
  state: RouteState;
  score: number;
  hot: boolean;
  memoized: boolean;
  stats: RouteStats;
  /** null while the predictor is disabled or has no samples for the route */
  prediction: RoutePrediction | null;
  delta: RouteDelta;
}

/**
 * Point-in-time view of the engine. Assembled on demand, never stored
 * (apart from the scores/rps the reporter keeps for the next delta).
 */
export interface Report {
  generatedAt: string;
  reportNumber: number;
  uptimeSeconds: number;
  enabled: boolean;
  cycle: number;
  totals: TrafficTotals & { errorRate: number };
  routes: RouteReport[];
  hotSet: HotSetEntry[];
  memoized: RouteId[];
  anomalies: RouteId[];
  middleware: {
    profiles: MiddlewareCostProfile[];
    order: string[] | null;
  };
  cache: ResponseCacheStats;
  optimizer: OptimizerStats;
  suggestions: Suggestion[];
  evolution: EvolutionEntry[];
}
