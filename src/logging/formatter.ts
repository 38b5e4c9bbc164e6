/**
 * Log line formatting: JSON for machines, a single readable line for humans.
 */

import type { LogLevel } from './levels.js';
import { formatLogLevel } from './levels.js';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  correlationId?: string;
  component?: string;
  /** Route the line is about, as "METHOD /pattern" */
  route?: string;
  metadata?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

export interface FormatterOptions {
  format: 'json' | 'human';
  includeStackTrace: boolean;
  colors?: boolean;
}

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};

const RESET = '\x1b[0m';

export class LogFormatter {
  constructor(private options: FormatterOptions) {}

  format(entry: LogEntry): string {
    return this.options.format === 'json' ? this.formatJson(entry) : this.formatHuman(entry);
  }

  private formatJson(entry: LogEntry): string {
    const error = entry.error && !this.options.includeStackTrace
      ? { name: entry.error.name, message: entry.error.message }
      : entry.error;

    return JSON.stringify({
      timestamp: entry.timestamp,
      level: entry.level,
      message: entry.message,
      ...(entry.correlationId && { correlationId: entry.correlationId }),
      ...(entry.component && { component: entry.component }),
      ...(entry.route && { route: entry.route }),
      ...(entry.metadata && Object.keys(entry.metadata).length > 0 && { metadata: entry.metadata }),
      ...(error && { error }),
    });
  }

  /**
   * `[HH:MM:SS.mmm] LEVEL [correlationId] [component] message (route=…) | k=v`
   */
  private formatHuman(entry: LogEntry): string {
    const level = formatLogLevel(entry.level);
    const parts = [
      `[${entry.timestamp.slice(11, 23)}]`,
      this.options.colors ? `${LEVEL_COLORS[entry.level]}${level}${RESET}` : level,
    ];

    if (entry.correlationId) parts.push(`[${entry.correlationId}]`);
    if (entry.component) parts.push(`[${entry.component}]`);
    parts.push(entry.message);

    let result = parts.join(' ');

    if (entry.route) {
      result += ` (route=${entry.route})`;
    }

    if (entry.metadata && Object.keys(entry.metadata).length > 0) {
      const pairs = Object.entries(entry.metadata)
        .map(([key, value]) => `${key}=${formatValue(value)}`)
        .join(' ');
      result += ` | ${pairs}`;
    }

    if (entry.error) {
      result += `\n  Error: ${entry.error.name}: ${entry.error.message}`;
      if (this.options.includeStackTrace && entry.error.stack) {
        result += '\n' + entry.error.stack.split('\n').map(line => `    ${line}`).join('\n');
      }
    }

    return result;
  }
}

export function formatValue(value: unknown): string {
  if (value === null || value === undefined) return String(value);
  if (typeof value === 'string') return value.includes(' ') ? `"${value}"` : value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (Array.isArray(value)) return `[${value.map(formatValue).join(',')}]`;
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

export function createLogEntry(
  level: LogLevel,
  message: string,
  options: {
    correlationId?: string;
    component?: string;
    route?: string;
    metadata?: Record<string, unknown>;
    error?: Error;
    timestamp?: string;
  } = {}
): LogEntry {
  const entry: LogEntry = {
    timestamp: options.timestamp ?? new Date().toISOString(),
    level,
    message,
  };

  if (options.correlationId) entry.correlationId = options.correlationId;
  if (options.component) entry.component = options.component;
  if (options.route) entry.route = options.route;
  if (options.metadata) entry.metadata = options.metadata;

  if (options.error) {
    entry.error = {
      name: options.error.name,
      message: options.error.message,
      ...(options.error.stack && { stack: options.error.stack }),
    };
  }

  return entry;
}
