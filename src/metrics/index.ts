/**
 * Metrics - per-route traffic, latency and middleware cost recording.
 */

export { MetricRecorder, percentile } from './recorder.js';
export { CircularBuffer } from './circular-buffer.js';
export {
  routeKey,
  routeId,
  parseRouteId,
  DEFAULT_RECORDER_CONFIG,
  type HttpMethod,
  type RouteKey,
  type RouteId,
  type RouteStats,
  type MiddlewareCostProfile,
  type TrafficTotals,
  type RecorderConfig,
} from './types.js';
