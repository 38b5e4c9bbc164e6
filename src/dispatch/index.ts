export { DispatchHook, type DispatchHookDeps } from './hook.js';
export { MiddlewarePipeline, type PipelineDeps } from './pipeline.js';
export type {
  RequestToken,
  RequestContext,
  StageOutcome,
  PipelineStage,
  PipelineResult,
} from './types.js';
