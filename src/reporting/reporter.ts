/**
 * Engine Reporter - snapshots and a printable summary.
 *
 * A snapshot reads the recorder, predictor, optimizer decision and cache
 * stats without changing any of them. The only state the reporter owns is
 * its report counter and the scores/rps of the single previous snapshot,
 * which every route's delta is taken against.
 */

import type { ResponseCacheStats } from '../cache/response-cache.js';
import type { MetricRecorder } from '../metrics/recorder.js';
import type { RouteId, RouteKey, RouteStats } from '../metrics/types.js';
import { routeKey } from '../metrics/types.js';
import type { AdaptiveOptimizer } from '../optimizer/optimizer.js';
import type { LatencyPredictor, SpikeOutlook } from '../prediction/predictor.js';
import type { RouteScorer } from '../scoring/heat-scorer.js';
import { buildSuggestions, DEFAULT_SUGGESTION_THRESHOLDS, type SuggestionThresholds } from './suggestions.js';
import type { Report, RoutePrediction, RouteReport } from './types.js';

export interface ReportSources {
  recorder: MetricRecorder;
  scorer: RouteScorer;
  optimizer: AdaptiveOptimizer;
  cache: { stats(): ResponseCacheStats };
  /** Absent while prediction is turned off */
  predictor: () => LatencyPredictor | null;
  isEnabled: () => boolean;
}

export interface ReporterOptions {
  suggestions: SuggestionThresholds;
  /** Evolution entries included in a report, newest last */
  evolutionLimit: number;
  now: () => number;
}

const DEFAULT_REPORTER_OPTIONS: ReporterOptions = {
  suggestions: DEFAULT_SUGGESTION_THRESHOLDS,
  evolutionLimit: 20,
  now: Date.now,
};

const BOX_WIDTH = 76;

interface PreviousPoint {
  score: number;
  rps: number;
}

export class EngineReporter {
  private previous: Map<RouteId, PreviousPoint> | null = null;
  private reportCount = 0;
  private readonly options: ReporterOptions;
  private readonly startedAt: number;

  constructor(
    private readonly sources: ReportSources,
    options: Partial<ReporterOptions> = {}
  ) {
    this.options = { ...DEFAULT_REPORTER_OPTIONS, ...options };
    this.startedAt = this.options.now();
  }

  snapshot(): Report {
    const now = this.options.now();
    const { recorder, optimizer, cache } = this.sources;
    const predictor = this.sources.predictor();
    const decision = optimizer.decision;
    const previous = this.previous;

    const routes: RouteReport[] = [];
    const spikes: Array<{ stats: RouteStats; spike: SpikeOutlook | null }> = [];
    for (const stats of recorder.getAllStats()) {
      const route = this.routeReport(stats, predictor, previous);
      routes.push(route);
      spikes.push({ stats, spike: route.prediction?.spike ?? null });
    }

    this.previous = new Map(routes.map(route => [route.route, { score: route.score, rps: route.stats.rps }]));
    this.reportCount++;

    const totals = recorder.getTotals();
    const evolution = optimizer.getEvolutionLog();

    return {
      generatedAt: new Date(now).toISOString(),
      reportNumber: this.reportCount,
      uptimeSeconds: Math.max(0, Math.round((now - this.startedAt) / 1000)),
      enabled: this.sources.isEnabled(),
      cycle: decision.cycle,
      totals: {
        ...totals,
        errorRate: totals.totalRequests > 0 ? totals.totalErrors / totals.totalRequests : 0,
      },
      routes,
      hotSet: decision.hotSet.map(entry => ({ ...entry })),
      memoized: [...decision.memoized].sort(),
      anomalies: routes.filter(route => route.prediction?.anomalous).map(route => route.route),
      middleware: {
        profiles: recorder.getMiddlewareProfiles(),
        order: decision.middlewareOrder ? [...decision.middlewareOrder] : null,
      },
      cache: cache.stats(),
      optimizer: optimizer.getStats(),
      suggestions: buildSuggestions(spikes, this.options.suggestions),
      evolution: evolution.slice(-this.options.evolutionLimit),
    };
  }

  /**
   * One route as the next snapshot would show it. Neither the delta baseline
   * nor the report counter moves.
   */
  describeRoute(key: RouteKey): RouteReport | null {
    const stats = this.sources.recorder.getStats(key);
    return stats ? this.routeReport(stats, this.sources.predictor(), this.previous) : null;
  }

  /**
   * Boxed plain-text rendering of a report (a fresh snapshot by default).
   */
  printable(report: Report = this.snapshot()): string {
    const lines: string[] = [];
    const rule = `╠${'═'.repeat(BOX_WIDTH + 2)}╣`;

    lines.push(`╔${'═'.repeat(BOX_WIDTH + 2)}╗`);
    lines.push(boxLine(`HOTPATH REPORT #${report.reportNumber}   cycle ${report.cycle}   ${report.enabled ? 'enabled' : 'disabled'}`));
    lines.push(boxLine(`generated ${report.generatedAt}   uptime ${report.uptimeSeconds}s`));
    lines.push(rule);

    const totals = report.totals;
    lines.push(boxLine(
      `requests ${totals.totalRequests}   errors ${totals.totalErrors} (${percent(totals.errorRate)})   ` +
      `routes ${totals.trackedRoutes}   rps ${totals.globalRps.toFixed(2)}`
    ));
    lines.push(rule);

    lines.push(boxLine(routeRow('ROUTE', 'STATE', 'SCORE', 'RPS', 'P95ms', 'ΔSCORE')));
    if (report.routes.length === 0) {
      lines.push(boxLine('(no traffic recorded)'));
    }
    for (const route of report.routes) {
      lines.push(boxLine(routeRow(
        route.route,
        route.state,
        route.score.toFixed(3),
        route.stats.rps.toFixed(2),
        route.stats.p95LatencyMs.toFixed(1),
        signed(route.delta.score)
      )));
    }
    lines.push(rule);

    lines.push(boxLine(`hot set: ${listOrEmpty(report.hotSet.map(entry => entry.route))}`));
    lines.push(boxLine(`memoized: ${listOrEmpty(report.memoized)}`));
    lines.push(boxLine(`middleware: ${report.middleware.order ? listOrEmpty(report.middleware.order, ' → ') : '(none registered)'}`));
    lines.push(boxLine(
      `cache: ${report.cache.size}/${report.cache.maxEntries} entries   ` +
      `hits ${report.cache.hits}   misses ${report.cache.misses}   hit rate ${percent(report.cache.hitRate)}`
    ));
    if (report.anomalies.length > 0) {
      lines.push(boxLine(`anomalies: ${report.anomalies.join(', ')}`));
    }

    if (report.suggestions.length > 0) {
      lines.push(rule);
      for (const suggestion of report.suggestions) {
        lines.push(boxLine(`[${suggestion.type}] ${suggestion.route}: ${suggestion.recommendations[0] ?? ''}`));
      }
    }

    lines.push(`╚${'═'.repeat(BOX_WIDTH + 2)}╝`);
    return lines.join('\n');
  }

  toJson(report: Report = this.snapshot()): string {
    return JSON.stringify(report, null, 2);
  }

  /**
   * Forgets the previous snapshot and restarts the report counter.
   */
  reset(): void {
    this.previous = null;
    this.reportCount = 0;
  }

  private routeReport(
    stats: RouteStats,
    predictor: LatencyPredictor | null,
    previous: ReadonlyMap<RouteId, PreviousPoint> | null
  ): RouteReport {
    const decision = this.sources.optimizer.decision;
    const score = this.sources.scorer.score(stats);
    const before = previous?.get(stats.route);

    return {
      route: stats.route,
      state: decision.states.get(stats.route) ?? 'cold',
      score,
      hot: decision.hotRoutes.has(stats.route),
      memoized: decision.memoized.has(stats.route),
      stats,
      prediction: predictor ? this.predictionFor(predictor, stats.method, stats.path) : null,
      delta: before
        ? { score: score - before.score, rps: stats.rps - before.rps }
        : { score: 0, rps: 0 },
    };
  }

  private predictionFor(predictor: LatencyPredictor, method: string, path: string): RoutePrediction | null {
    const snapshot = predictor.snapshot(routeKey(method, path));
    if (!snapshot) return null;
    return {
      forecastMs: snapshot.forecastMs,
      ewmaMs: snapshot.ewmaMs,
      slopeMsPerSample: snapshot.slopeMsPerSample,
      trend: snapshot.trend,
      lastZScore: snapshot.lastZScore,
      anomalous: snapshot.lastAnomalous,
      anomalyCount: snapshot.anomalyCount,
      spike: snapshot.spike,
    };
  }
}

function boxLine(text: string): string {
  const fitted = text.length > BOX_WIDTH ? `${text.slice(0, BOX_WIDTH - 1)}…` : text;
  return `║ ${fitted.padEnd(BOX_WIDTH)} ║`;
}

function routeRow(route: string, state: string, score: string, rps: string, p95: string, delta: string): string {
  const name = route.length > 30 ? `${route.slice(0, 29)}…` : route;
  return `${name.padEnd(30)} ${state.padEnd(9)}${score.padStart(7)}${rps.padStart(9)}${p95.padStart(9)}${delta.padStart(10)}`;
}

function percent(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}

function signed(value: number): string {
  const fixed = value.toFixed(3);
  return value > 0 ? `+${fixed}` : fixed;
}

function listOrEmpty(items: readonly string[], separator = ', '): string {
  return items.length > 0 ? items.join(separator) : '(empty)';
}
