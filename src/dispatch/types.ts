import type { CacheKeyMaterial } from '../cache/fingerprint.js';
import type { RouteKey } from '../metrics/types.js';

/**
 * Handle returned by `onRequestStart`; pass it back to `onRequestEnd`.
 */
export interface RequestToken {
  readonly id: number;
  readonly routeKey: RouteKey;
  readonly startedAt: number;
  readonly correlationId: string;
  /** False when the engine was disabled at start; the request is not counted */
  readonly tracked: boolean;
}

/**
 * Per-request state shared by the pipeline stages and the handler.
 */
export interface RequestContext {
  readonly routeKey: RouteKey;
  readonly method: string;
  /** Concrete request path (the RouteKey holds the pattern) */
  readonly path: string;
  readonly correlationId: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly cacheKey: CacheKeyMaterial;
  /** Values stages hand to later stages and to the handler */
  readonly locals: Map<string, unknown>;
  /** Status to report when a stage halts the pipeline */
  status?: number;
  /** Response to send when a stage halts the pipeline */
  response?: Response;
}

/**
 * `'halt'` ends the pipeline; anything else moves on to the next stage.
 */
export type StageOutcome = 'continue' | 'halt';

export interface PipelineStage<C = RequestContext> {
  name: string;
  run(context: C): StageOutcome | void | Promise<StageOutcome | void>;
  dependsOn?: readonly string[];
  shortCircuits?: boolean;
  pinned?: boolean;
}

export interface PipelineResult {
  /** Stages that ran, in execution order */
  executed: string[];
  /** Stage that halted the pipeline, null when every stage continued */
  haltedBy: string | null;
  totalCostMs: number;
}
