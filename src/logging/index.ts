/**
 * Logging - structured, leveled logging with correlation ids.
 */

import type { LogContext, EngineLogger } from './logger.js';
import type { LogLevel } from './levels.js';
import { createLoggerFromEnv } from './logger.js';

export {
  EngineLogger,
  createLogger,
  createLoggerFromEnv,
  LoggerConfigs,
  type LoggerConfig,
  type LogContext,
} from './logger.js';

export {
  LOG_LEVELS,
  shouldLog,
  isLogLevel,
  getEnabledLevels,
  formatLogLevel,
  parseLogLevel,
  type LogLevel,
} from './levels.js';

export {
  CORRELATION_HEADER,
  generateCorrelationId,
  isValidCorrelationId,
  correlationContext,
  extractOrGenerateCorrelationId,
  withCorrelation,
} from './correlation.js';

export {
  LogFormatter,
  createLogEntry,
  formatValue,
  type LogEntry,
  type FormatterOptions,
} from './formatter.js';

/**
 * Logger with the engine's defaults for the current NODE_ENV.
 */
export function createEngineLogger(
  level: LogLevel = 'info',
  context: LogContext = {}
): EngineLogger {
  return createLoggerFromEnv(context, { level });
}
