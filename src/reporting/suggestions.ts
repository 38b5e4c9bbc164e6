/**
 * Actionable hints derived from a report's route data.
 */

import type { RouteId, RouteStats } from '../metrics/types.js';
import type { SpikeOutlook } from '../prediction/predictor.js';

export type SuggestionType = 'slow_endpoint' | 'error_prone' | 'spike_warning';

export interface Suggestion {
  route: RouteId;
  type: SuggestionType;
  recommendations: string[];
}

export interface SuggestionThresholds {
  slowRouteThresholdMs: number;
  /** Error rate above which a route is flagged */
  errorRate: number;
  /** Requests a route needs before it can be flagged error-prone */
  minRequests: number;
  /** rps above which a slow GET route is a memoization candidate */
  memoizeRps: number;
}

export const DEFAULT_SUGGESTION_THRESHOLDS: SuggestionThresholds = {
  slowRouteThresholdMs: 200,
  errorRate: 0.05,
  minRequests: 10,
  memoizeRps: 5,
};

export function buildSuggestions(
  routes: ReadonlyArray<{ stats: RouteStats; spike: SpikeOutlook | null }>,
  thresholds: SuggestionThresholds = DEFAULT_SUGGESTION_THRESHOLDS
): Suggestion[] {
  const suggestions: Suggestion[] = [];

  for (const { stats, spike } of routes) {
    if (stats.sampleCount > 0 && stats.p95LatencyMs > thresholds.slowRouteThresholdMs) {
      const recommendations = [`p95 latency ${Math.round(stats.p95LatencyMs)}ms exceeds ${thresholds.slowRouteThresholdMs}ms`];
      if (stats.p95LatencyMs > thresholds.slowRouteThresholdMs * 2.5) {
        recommendations.push('Move slow work off the request path (background job or queue)');
      }
      if (stats.method === 'GET' && stats.rps > thresholds.memoizeRps) {
        recommendations.push('Frequent and slow: a good candidate for response memoization');
      }
      suggestions.push({ route: stats.route, type: 'slow_endpoint', recommendations });
    }

    if (stats.totalRequests >= thresholds.minRequests && stats.errorRate > thresholds.errorRate) {
      suggestions.push({
        route: stats.route,
        type: 'error_prone',
        recommendations: [
          `error rate ${(stats.errorRate * 100).toFixed(1)}% over ${stats.totalRequests} requests`,
          'Investigate handler failures; consider a circuit breaker',
        ],
      });
    }

    if (spike?.likely) {
      suggestions.push({
        route: stats.route,
        type: 'spike_warning',
        recommendations: [
          `latency spike likely (${Math.round(spike.probability * 100)}% probability)`,
          spike.reason,
        ],
      });
    }
  }

  return suggestions;
}
