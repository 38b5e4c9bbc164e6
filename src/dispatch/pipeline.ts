/**
 * Middleware pipeline whose stage order the optimizer may rewrite.
 *
 * Every stage run is timed into the recorder. The pipeline asks for the
 * current order on each run, so a new decision applies from the next request
 * on and a request in flight keeps the order it started with.
 */

import type { EngineLogger } from '../logging/index.js';
import type { MetricRecorder } from '../metrics/recorder.js';
import type { MiddlewareStageSpec } from '../optimizer/middleware-order.js';
import type { PipelineResult, PipelineStage, RequestContext, StageOutcome } from './types.js';

export interface PipelineDeps {
  recorder: MetricRecorder;
  logger: EngineLogger;
  /** Order published by the optimizer, null for the declared order */
  order: () => readonly string[] | null;
  clock?: () => number;
}

export class MiddlewarePipeline<C = RequestContext> {
  private readonly byName: Map<string, PipelineStage<C>>;
  private readonly declared: readonly string[];
  private readonly clock: () => number;

  constructor(stages: readonly PipelineStage<C>[], private readonly deps: PipelineDeps) {
    this.byName = new Map();
    for (const stage of stages) {
      if (this.byName.has(stage.name)) {
        throw new Error(`Duplicate middleware stage "${stage.name}"`);
      }
      this.byName.set(stage.name, stage);
    }
    for (const stage of stages) {
      for (const dependency of stage.dependsOn ?? []) {
        if (!this.byName.has(dependency)) {
          throw new Error(`Middleware stage "${stage.name}" depends on unknown stage "${dependency}"`);
        }
      }
    }
    this.declared = stages.map(stage => stage.name);
    this.clock = deps.clock ?? (() => performance.now());
  }

  /**
   * Stage declarations without their run functions, for the optimizer.
   */
  specs(): MiddlewareStageSpec[] {
    return this.declared.flatMap(name => {
      const stage = this.byName.get(name);
      if (!stage) return [];
      return [{
        name: stage.name,
        ...(stage.dependsOn && { dependsOn: [...stage.dependsOn] }),
        ...(stage.shortCircuits !== undefined && { shortCircuits: stage.shortCircuits }),
        ...(stage.pinned !== undefined && { pinned: stage.pinned }),
      }];
    });
  }

  /**
   * The order the next run will use. A published order that does not name
   * exactly this pipeline's stages is ignored.
   */
  currentOrder(): readonly string[] {
    const published = this.deps.order();
    if (!published || published.length !== this.declared.length) return this.declared;
    return published.every(name => this.byName.has(name)) ? published : this.declared;
  }

  async run(context: C): Promise<PipelineResult> {
    const order = this.currentOrder();
    const executed: string[] = [];
    let totalCostMs = 0;

    for (const name of order) {
      const stage = this.byName.get(name);
      if (!stage) continue;

      const startedAt = this.clock();
      let outcome: StageOutcome | void;
      try {
        outcome = await stage.run(context);
      } catch (error) {
        this.deps.recorder.recordMiddleware(name, this.elapsed(startedAt), false);
        throw error;
      }

      const costMs = this.elapsed(startedAt);
      const halted = outcome === 'halt';
      totalCostMs += costMs;
      executed.push(name);
      this.deps.recorder.recordMiddleware(name, costMs, halted);

      if (halted) {
        if (!stage.shortCircuits) {
          this.deps.logger.warn(`Stage "${name}" halted the pipeline without declaring shortCircuits`);
        }
        return { executed, haltedBy: name, totalCostMs };
      }
    }

    return { executed, haltedBy: null, totalCostMs };
  }

  private elapsed(startedAt: number): number {
    return Math.max(0, this.clock() - startedAt);
  }
}
