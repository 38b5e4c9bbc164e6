/**
 * Tests for the engine logger and formatter
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { EngineLogger, LoggerConfigs, createLoggerFromEnv, type LoggerConfig } from '../logger.js';
import { LogFormatter, createLogEntry, formatValue } from '../formatter.js';
import { correlationContext } from '../correlation.js';

const TIMESTAMP = '2026-03-04T05:06:07.089Z';

describe('LogFormatter', () => {
  it('should render a human line', () => {
    const formatter = new LogFormatter({ format: 'human', includeStackTrace: false, colors: false });
    const entry = createLogEntry('warn', 'Route went cold', {
      timestamp: TIMESTAMP,
      correlationId: 'a1b2c3d4',
      component: 'optimizer',
      route: 'GET /items',
      metadata: { rps: 0.5, reason: 'low traffic' },
    });

    expect(formatter.format(entry)).toBe(
      '[05:06:07.089] WARN  [a1b2c3d4] [optimizer] Route went cold (route=GET /items) | rps=0.5 reason="low traffic"'
    );
  });

  it('should render JSON without empty metadata', () => {
    const formatter = new LogFormatter({ format: 'json', includeStackTrace: false });
    const entry = createLogEntry('info', 'ready', { timestamp: TIMESTAMP, metadata: {} });

    expect(JSON.parse(formatter.format(entry))).toEqual({ timestamp: TIMESTAMP, level: 'info', message: 'ready' });
  });

  it('should drop the stack from JSON unless asked for', () => {
    const formatter = new LogFormatter({ format: 'json', includeStackTrace: false });
    const entry = createLogEntry('error', 'failed', { timestamp: TIMESTAMP, error: new TypeError('bad input') });

    expect(JSON.parse(formatter.format(entry)).error).toEqual({ name: 'TypeError', message: 'bad input' });
  });

  it('should format metadata values', () => {
    expect(formatValue(['a', 2])).toBe('[a,2]');
    expect(formatValue({ k: 1 })).toBe('{"k":1}');
    expect(formatValue(null)).toBe('null');
  });
});

describe('EngineLogger', () => {
  const config: LoggerConfig = {
    level: 'info',
    format: 'human',
    fileOutput: false,
    logDir: 'test-logs',
    consoleOutput: true,
    includeStackTrace: false,
    colors: false,
    component: 'test',
  };

  beforeEach(() => {
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    vi.spyOn(console, 'info').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  it('should route each level to its console method', () => {
    const logger = new EngineLogger(config);
    logger.info('info line');
    logger.warn('warn line');
    logger.error('error line');

    expect(console.info).toHaveBeenCalledOnce();
    expect(console.warn).toHaveBeenCalledOnce();
    expect(console.error).toHaveBeenCalledOnce();
    expect(String(vi.mocked(console.warn).mock.calls[0]?.[0])).toContain('WARN  [test] warn line');
  });

  it('should drop messages below the configured level', () => {
    const logger = new EngineLogger(config);
    logger.debug('hidden');
    expect(console.debug).not.toHaveBeenCalled();
  });

  it('should write nothing when console output is off', () => {
    const logger = new EngineLogger(LoggerConfigs.silent());
    logger.error('quiet');
    expect(console.error).not.toHaveBeenCalled();
  });

  it('should tag child loggers with their component', () => {
    const logger = new EngineLogger(config).child({ component: 'cache' });
    logger.info('swept');
    expect(String(vi.mocked(console.info).mock.calls[0]?.[0])).toContain('[cache] swept');
  });

  it('should include the active correlation id', () => {
    const logger = new EngineLogger(config);
    correlationContext.run('feedf00d', () => logger.info('inside'));
    expect(String(vi.mocked(console.info).mock.calls[0]?.[0])).toContain('[feedf00d] [test] inside');
  });

  it('should append error details', () => {
    const logger = new EngineLogger(config);
    logger.error('cycle failed', new Error('scorer exploded'));
    expect(String(vi.mocked(console.error).mock.calls[0]?.[0])).toContain('\n  Error: Error: scorer exploded');
  });

  it('should read the level from the environment', () => {
    vi.stubEnv('NODE_ENV', 'test');
    vi.stubEnv('HOTPATH_LOG_LEVEL', 'debug');
    expect(createLoggerFromEnv().level).toBe('debug');

    vi.stubEnv('HOTPATH_LOG_LEVEL', '');
    expect(createLoggerFromEnv().level).toBe('error');
  });
});
