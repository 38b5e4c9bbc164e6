/**
 * Latency Predictor - per-route EWMA, trend slope and z-score anomaly flags.
 *
 * State is updated incrementally on every latency sample and never rebuilt
 * from the recorder. Missing history produces neutral answers (0 forecast,
 * 0 z-score), never errors.
 */

import type { RouteId, RouteKey } from '../metrics/types.js';
import { routeId } from '../metrics/types.js';
import { Ewma } from './ewma.js';
import { RollingMoments, TrendWindow } from './window-stats.js';

export interface PredictorConfig {
  /** EWMA smoothing factor, (0, 1] */
  alpha: number;
  /** Samples behind the trend slope */
  trendWindowSize: number;
  /** Samples behind the rolling mean/stddev */
  anomalyWindowSize: number;
  /** |z| above this marks a sample anomalous */
  zScoreThreshold: number;
  /** z-scores are 0 until a route has this many samples */
  minSamples: number;
  /** Samples ahead the forecast projects the trend */
  horizon: number;
}

export const DEFAULT_PREDICTOR_CONFIG: PredictorConfig = {
  alpha: 0.3,
  trendWindowSize: 30,
  anomalyWindowSize: 100,
  zScoreThreshold: 2.5,
  minSamples: 10,
  horizon: 1,
};

export type TrendDirection = 'rising' | 'falling' | 'stable';

/** |slope| at or below this (ms per sample) counts as stable */
export const TREND_EPSILON = 0.01;

export interface Observation {
  ewma: number;
  zScore: number;
  anomalous: boolean;
}

export interface SpikeOutlook {
  likely: boolean;
  probability: number;
  acceleration: number;
  reason: string;
}

export interface PredictionSnapshot {
  route: RouteId;
  samples: number;
  ewmaMs: number;
  slopeMsPerSample: number;
  forecastMs: number;
  trend: TrendDirection;
  rollingMeanMs: number;
  rollingStddevMs: number;
  lastZScore: number;
  lastAnomalous: boolean;
  anomalyCount: number;
  lastAnomalyAt: number | null;
  spike: SpikeOutlook;
}

class PredictionState {
  readonly ewma: Ewma;
  readonly trend: TrendWindow;
  readonly moments: RollingMoments;
  lastZScore = 0;
  lastAnomalous = false;
  anomalyCount = 0;
  lastAnomalyAt: number | null = null;

  constructor(config: PredictorConfig) {
    this.ewma = new Ewma(config.alpha);
    this.trend = new TrendWindow(config.trendWindowSize);
    this.moments = new RollingMoments(config.anomalyWindowSize);
  }
}

export function trendDirection(slope: number): TrendDirection {
  if (slope > TREND_EPSILON) return 'rising';
  if (slope < -TREND_EPSILON) return 'falling';
  return 'stable';
}

const NO_SPIKE: SpikeOutlook = { likely: false, probability: 0, acceleration: 0, reason: 'insufficient data' };

export class LatencyPredictor {
  private states = new Map<RouteId, PredictionState>();

  constructor(
    private readonly config: PredictorConfig = DEFAULT_PREDICTOR_CONFIG,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Feeds one latency sample. The z-score is taken against the window as it
   * stood before this sample.
   */
  observe(key: RouteKey, latencyMs: number): Observation {
    const id = routeId(key);
    let state = this.states.get(id);
    if (!state) {
      state = new PredictionState(this.config);
      this.states.set(id, state);
    }

    const zScore = this.zScoreFor(state, latencyMs);
    const anomalous = Math.abs(zScore) > this.config.zScoreThreshold;

    state.lastZScore = zScore;
    state.lastAnomalous = anomalous;
    if (anomalous) {
      state.anomalyCount++;
      state.lastAnomalyAt = this.now();
    }

    const ewma = state.ewma.update(latencyMs);
    state.trend.add(latencyMs);
    state.moments.add(latencyMs);

    return { ewma, zScore, anomalous };
  }

  /**
   * (latency − rolling mean) / rolling stddev; 0 when the route has too few
   * samples or no spread.
   */
  zscore(key: RouteKey, latencyMs: number): number {
    const state = this.states.get(routeId(key));
    return state ? this.zScoreFor(state, latencyMs) : 0;
  }

  isAnomalous(key: RouteKey, latencyMs: number): boolean {
    return Math.abs(this.zscore(key, latencyMs)) > this.config.zScoreThreshold;
  }

  /**
   * ewma + slope · horizon, floored at 0. 0 for routes never observed.
   */
  forecast(key: RouteKey, horizon = this.config.horizon): number {
    const state = this.states.get(routeId(key));
    if (!state || state.ewma.count === 0) return 0;
    return Math.max(0, state.ewma.value + state.trend.slope() * horizon);
  }

  /**
   * Spike likelihood from the trend window: a rising slope and a second half
   * averaging well above the first half both add to the probability.
   */
  spikeOutlook(key: RouteKey): SpikeOutlook {
    const state = this.states.get(routeId(key));
    if (!state || state.trend.size < 5) return NO_SPIKE;

    const values = state.trend.values();
    const half = Math.floor(values.length / 2);
    const early = mean(values.slice(0, half));
    const late = mean(values.slice(half));
    const acceleration = (late - early) / Math.max(early, 0.001);
    const slope = state.trend.slope();

    let probability = 0;
    const reasons: string[] = [];
    if (slope > 0.05 * Math.max(early, 1)) {
      probability += 0.3;
      reasons.push(`rising trend (slope=${slope.toFixed(3)}ms/sample)`);
    }
    if (acceleration > 0.5) {
      probability += 0.4;
      reasons.push(`accelerating latency (+${Math.round(acceleration * 100)}%)`);
    }
    if (trendDirection(slope) === 'rising' && slope > 0.1 * Math.max(early, 1)) {
      probability += 0.2;
      reasons.push('strong upward momentum');
    }
    probability = Math.min(probability, 0.95);

    return {
      likely: probability > 0.5,
      probability: Math.round(probability * 1000) / 1000,
      acceleration: Math.round(acceleration * 10000) / 10000,
      reason: reasons.length > 0 ? reasons.join('; ') : 'stable latency pattern',
    };
  }

  snapshot(key: RouteKey): PredictionSnapshot | null {
    const id = routeId(key);
    const state = this.states.get(id);
    if (!state) return null;

    const slope = state.trend.slope();
    return {
      route: id,
      samples: state.ewma.count,
      ewmaMs: state.ewma.value,
      slopeMsPerSample: slope,
      forecastMs: this.forecast(key),
      trend: trendDirection(slope),
      rollingMeanMs: state.moments.mean(),
      rollingStddevMs: state.moments.stddev(),
      lastZScore: state.lastZScore,
      lastAnomalous: state.lastAnomalous,
      anomalyCount: state.anomalyCount,
      lastAnomalyAt: state.lastAnomalyAt,
      spike: this.spikeOutlook(key),
    };
  }

  trackedRoutes(): RouteId[] {
    return [...this.states.keys()].sort();
  }

  reset(): void {
    this.states.clear();
  }

  private zScoreFor(state: PredictionState, latencyMs: number): number {
    if (state.moments.count < this.config.minSamples) return 0;
    const stddev = state.moments.stddev();
    if (stddev === 0) return 0;
    return (latencyMs - state.moments.mean()) / stddev;
  }
}

function mean(values: readonly number[]): number {
  return values.length === 0 ? 0 : values.reduce((acc, value) => acc + value, 0) / values.length;
}
