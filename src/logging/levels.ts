/**
 * Log levels, ordered by severity.
 */

export const LOG_LEVELS = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

const LEVEL_NAMES: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * True when a message at `messageLevel` passes a logger configured at `minLevel`.
 */
export function shouldLog(messageLevel: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVELS[messageLevel] >= LOG_LEVELS[minLevel];
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Parses a level name (case-insensitive). Unknown names resolve to `fallback`.
 */
export function parseLogLevel(level: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  if (!level) return fallback;
  const normalized = level.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : fallback;
}

export function getEnabledLevels(minLevel: LogLevel): LogLevel[] {
  return LEVEL_NAMES.filter(level => shouldLog(level, minLevel));
}

export function formatLogLevel(level: LogLevel): string {
  return level.toUpperCase().padEnd(5);
}
