/**
 * Tests for log levels and utilities
 */

import { describe, it, expect } from 'vitest';
import {
  LOG_LEVELS,
  shouldLog,
  isLogLevel,
  getEnabledLevels,
  formatLogLevel,
  parseLogLevel,
} from '../levels.js';

describe('LOG_LEVELS', () => {
  it('should order levels by severity', () => {
    expect(LOG_LEVELS.debug).toBeLessThan(LOG_LEVELS.info);
    expect(LOG_LEVELS.info).toBeLessThan(LOG_LEVELS.warn);
    expect(LOG_LEVELS.warn).toBeLessThan(LOG_LEVELS.error);
  });
});

describe('shouldLog', () => {
  it('should allow messages at or above the minimum level', () => {
    expect(shouldLog('debug', 'info')).toBe(false);
    expect(shouldLog('info', 'info')).toBe(true);
    expect(shouldLog('error', 'info')).toBe(true);
    expect(shouldLog('warn', 'error')).toBe(false);
  });
});

describe('getEnabledLevels', () => {
  it('should list the levels a logger lets through', () => {
    expect(getEnabledLevels('debug')).toEqual(['debug', 'info', 'warn', 'error']);
    expect(getEnabledLevels('warn')).toEqual(['warn', 'error']);
  });
});

describe('parseLogLevel', () => {
  it('should accept names in any case', () => {
    expect(parseLogLevel('WARN')).toBe('warn');
    expect(parseLogLevel(' debug ')).toBe('debug');
  });

  it('should fall back on unknown or missing names', () => {
    expect(parseLogLevel('verbose')).toBe('info');
    expect(parseLogLevel(undefined, 'error')).toBe('error');
    expect(isLogLevel('trace')).toBe(false);
  });
});

describe('formatLogLevel', () => {
  it('should pad to five characters', () => {
    expect(formatLogLevel('info')).toBe('INFO ');
    expect(formatLogLevel('error')).toBe('ERROR');
  });
});
