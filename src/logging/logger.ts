/**
 * Engine logger: structured, leveled, optionally mirrored to daily log files.
 */

import { appendFile, mkdir } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import type { LogLevel } from './levels.js';
import { parseLogLevel, shouldLog } from './levels.js';
import { correlationContext } from './correlation.js';
import { LogFormatter, createLogEntry } from './formatter.js';

export interface LoggerConfig {
  level: LogLevel;
  format: 'json' | 'human';
  fileOutput: boolean;
  /** Directory for daily log files, resolved against the working directory */
  logDir: string;
  consoleOutput: boolean;
  includeStackTrace: boolean;
  colors: boolean;
  component?: string;
}

export interface LogContext {
  correlationId?: string;
  component?: string;
  route?: string;
  metadata?: Record<string, unknown>;
}

export class EngineLogger {
  private formatter: LogFormatter;
  private pendingWrites = new Set<Promise<void>>();
  private logDir: string;

  constructor(private config: LoggerConfig, private context: LogContext = {}) {
    this.formatter = new LogFormatter({
      format: config.format,
      includeStackTrace: config.includeStackTrace,
      colors: config.colors,
    });
    this.logDir = resolve(config.logDir);
  }

  child(context: Partial<LogContext>): EngineLogger {
    return new EngineLogger(this.config, { ...this.context, ...context });
  }

  updateConfig(config: Partial<LoggerConfig>): EngineLogger {
    return new EngineLogger({ ...this.config, ...config }, this.context);
  }

  get level(): LogLevel {
    return this.config.level;
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.log('debug', message, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.log('info', message, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.log('warn', message, metadata);
  }

  error(message: string, error?: Error | Record<string, unknown>): void {
    if (error instanceof Error) {
      this.log('error', message, undefined, error);
    } else {
      this.log('error', message, error);
    }
  }

  private log(
    level: LogLevel,
    message: string,
    metadata?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!shouldLog(level, this.config.level)) {
      return;
    }

    const component = this.context.component ?? this.config.component;
    const correlationId = this.context.correlationId ?? correlationContext.getId();

    const entry = createLogEntry(level, message, {
      ...(correlationId && { correlationId }),
      ...(component && { component }),
      ...(this.context.route && { route: this.context.route }),
      metadata: { ...this.context.metadata, ...metadata },
      ...(error && { error }),
    });

    const formatted = this.formatter.format(entry);

    if (this.config.consoleOutput) {
      this.writeToConsole(level, formatted);
    }
    if (this.config.fileOutput) {
      this.writeToFile(entry.timestamp, formatted);
    }
  }

  private writeToConsole(level: LogLevel, line: string): void {
    switch (level) {
      case 'debug':
        console.debug(line);
        break;
      case 'info':
        console.info(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'error':
        console.error(line);
        break;
    }
  }

  private writeToFile(timestamp: string, line: string): void {
    const filepath = join(this.logDir, `${timestamp.slice(0, 10)}.log`);

    const write = mkdir(this.logDir, { recursive: true })
      .then(() => appendFile(filepath, line + '\n', 'utf8'))
      .catch((error: unknown) => {
        console.error('Failed to write log file:', error);
      })
      .finally(() => {
        this.pendingWrites.delete(write);
      });

    this.pendingWrites.add(write);
  }

  /**
   * Resolves once every queued file write has settled.
   */
  async flush(): Promise<void> {
    await Promise.all([...this.pendingWrites]);
  }
}

export const LoggerConfigs = {
  development: (): LoggerConfig => ({
    level: 'debug',
    format: 'human',
    fileOutput: false,
    logDir: 'logs',
    consoleOutput: true,
    includeStackTrace: true,
    colors: true,
    component: 'hotpath',
  }),

  production: (): LoggerConfig => ({
    level: 'info',
    format: 'json',
    fileOutput: true,
    logDir: 'logs',
    consoleOutput: true,
    includeStackTrace: false,
    colors: false,
    component: 'hotpath',
  }),

  testing: (): LoggerConfig => ({
    level: 'error',
    format: 'human',
    fileOutput: false,
    logDir: 'logs',
    consoleOutput: false,
    includeStackTrace: false,
    colors: false,
    component: 'hotpath',
  }),

  silent: (): LoggerConfig => ({
    level: 'error',
    format: 'human',
    fileOutput: false,
    logDir: 'logs',
    consoleOutput: false,
    includeStackTrace: false,
    colors: false,
    component: 'hotpath',
  }),
};

export function createLogger(
  config: Partial<LoggerConfig> = {},
  context: LogContext = {}
): EngineLogger {
  return new EngineLogger({ ...LoggerConfigs.development(), ...config }, context);
}

/**
 * Picks the base configuration from NODE_ENV; HOTPATH_LOG_LEVEL overrides the level.
 */
export function createLoggerFromEnv(
  context: LogContext = {},
  overrides: Partial<LoggerConfig> = {}
): EngineLogger {
  const env = process.env.NODE_ENV || 'development';

  let baseConfig: LoggerConfig;
  switch (env) {
    case 'production':
      baseConfig = LoggerConfigs.production();
      break;
    case 'test':
      baseConfig = LoggerConfigs.testing();
      break;
    default:
      baseConfig = LoggerConfigs.development();
      break;
  }

  const config = { ...baseConfig, ...overrides };
  const envLevel = process.env.HOTPATH_LOG_LEVEL;
  if (envLevel) {
    config.level = parseLogLevel(envLevel, config.level);
  }

  return new EngineLogger(config, context);
}
