/**
 * Heat scoring: one ranking number per route from its traffic snapshot.
 *
 *   score = wRps * n(rps, rpsReference)
 *         + wLatency * n(p95, latencyReferenceMs)
 *         + wErrorRate * errorRate
 *
 * where n(x, ref) = ln(1 + x) / ln(1 + ref). The log scale keeps a route
 * doing thousands of rps from drowning out latency, and both terms reach 1
 * at their reference value. Error rate is already a fraction. Every term is
 * strictly increasing in its input, so busier, slower or more failing routes
 * always score higher.
 */

import type { RouteId, RouteStats } from '../metrics/types.js';

export interface HeatWeights {
  rps: number;
  latency: number;
  errorRate: number;
}

export interface HeatScale {
  rpsReference: number;
  latencyReferenceMs: number;
}

export interface HeatScoreBreakdown {
  route: RouteId;
  score: number;
  rpsTerm: number;
  latencyTerm: number;
  errorTerm: number;
}

/**
 * What the optimizer needs from a scorer.
 */
export interface RouteScorer {
  score(stats: RouteStats): number;
}

export const DEFAULT_HEAT_WEIGHTS: HeatWeights = { rps: 0.5, latency: 0.3, errorRate: 0.2 };
export const DEFAULT_HEAT_SCALE: HeatScale = { rpsReference: 100, latencyReferenceMs: 1000 };

export function logNormalize(value: number, reference: number): number {
  if (!Number.isFinite(value) || value <= 0) return 0;
  return Math.log1p(value) / Math.log1p(reference);
}

export class HeatScorer implements RouteScorer {
  constructor(
    private readonly weights: HeatWeights = DEFAULT_HEAT_WEIGHTS,
    private readonly scale: HeatScale = DEFAULT_HEAT_SCALE
  ) {}

  score(stats: RouteStats): number {
    return this.breakdown(stats).score;
  }

  breakdown(stats: RouteStats): HeatScoreBreakdown {
    const rpsTerm = this.weights.rps * logNormalize(stats.rps, this.scale.rpsReference);
    const latencyTerm = this.weights.latency * logNormalize(stats.p95LatencyMs, this.scale.latencyReferenceMs);
    const errorTerm = this.weights.errorRate * Math.min(Math.max(stats.errorRate, 0), 1);

    return {
      route: stats.route,
      score: rpsTerm + latencyTerm + errorTerm,
      rpsTerm,
      latencyTerm,
      errorTerm,
    };
  }

  scoreAll(statsList: readonly RouteStats[]): Map<RouteId, number> {
    const scores = new Map<RouteId, number>();
    for (const stats of statsList) {
      scores.set(stats.route, this.score(stats));
    }
    return scores;
  }
}
