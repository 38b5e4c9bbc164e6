export { EngineReporter, type ReportSources, type ReporterOptions } from './reporter.js';
export {
  buildSuggestions,
  DEFAULT_SUGGESTION_THRESHOLDS,
  type Suggestion,
  type SuggestionType,
  type SuggestionThresholds,
} from './suggestions.js';
export type { Report, RouteReport, RoutePrediction, RouteDelta } from './types.js';
