/**
 * Logger tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Logger, logger, createLogger, isLogLevel } from '../../src/utils/logger.js';

describe('Logger', () => {
  let consoleSpy: {
    log: ReturnType<typeof vi.spyOn>;
    warn: ReturnType<typeof vi.spyOn>;
    error: ReturnType<typeof vi.spyOn>;
  };

  beforeEach(() => {
    consoleSpy = {
      log: vi.spyOn(console, 'log').mockImplementation(() => {}),
      warn: vi.spyOn(console, 'warn').mockImplementation(() => {}),
      error: vi.spyOn(console, 'error').mockImplementation(() => {}),
    };
    logger.setLevel('info');
    logger.setFormat('pretty');
  });

  afterEach(() => {
    vi.restoreAllMocks();
    logger.setLevel('info');
    logger.setFormat('pretty');
  });

  function lastJson(spy: ReturnType<typeof vi.spyOn>): Record<string, unknown> {
    const calls = spy.mock.calls;
    return JSON.parse(String(calls[calls.length - 1]?.[0]));
  }

  describe('log levels', () => {
    it('should route levels to the matching console method', () => {
      logger.info('info message');
      logger.warn('warn message');
      logger.error('error message');

      expect(consoleSpy.log).toHaveBeenCalledTimes(1);
      expect(consoleSpy.warn).toHaveBeenCalledTimes(1);
      expect(consoleSpy.error).toHaveBeenCalledTimes(1);
    });

    it('should drop messages below the level', () => {
      logger.debug('hidden');
      logger.setLevel('error');
      logger.warn('hidden too');

      expect(consoleSpy.log).not.toHaveBeenCalled();
      expect(consoleSpy.warn).not.toHaveBeenCalled();
    });

    it('should report the current level', () => {
      logger.setLevel('debug');

      expect(logger.getLevel()).toBe('debug');
    });
  });

  describe('child loggers', () => {
    it('should follow level changes on the root', () => {
      const child = logger.child('scheduler');
      logger.setLevel('debug');

      child.debug('visible');

      expect(consoleSpy.log).toHaveBeenCalledTimes(1);
    });

    it('should prefix the module name', () => {
      logger.setFormat('json');
      createLogger('queue').child('inner').info('hello');

      expect(lastJson(consoleSpy.log)).toMatchObject({ level: 'info', message: 'hello', module: 'queue:inner' });
    });
  });

  describe('json format', () => {
    beforeEach(() => {
      logger.setFormat('json');
    });

    it('should include context fields', () => {
      logger.info('Task assigned', { taskId: 't1', agentId: 'a1' });

      const entry = lastJson(consoleSpy.log);
      expect(entry.message).toBe('Task assigned');
      expect(entry.taskId).toBe('t1');
      expect(entry.agentId).toBe('a1');
      expect(typeof entry.timestamp).toBe('string');
    });

    it('should serialize thrown errors', () => {
      logger.error('Failed', { error: new TypeError('bad input') });

      expect(lastJson(consoleSpy.error).error).toMatchObject({ name: 'TypeError', message: 'bad input' });
    });

    it('should keep plain error strings', () => {
      logger.warn('Failed', { error: 'timeout' });

      expect(lastJson(consoleSpy.warn).error).toBe('timeout');
    });
  });

  describe('pretty format', () => {
    it('should print level, module and context', () => {
      new Logger('bus', { level: 'info', format: 'pretty', useColors: false }).info('posted', { id: 3 });

      const line = String(consoleSpy.log.mock.calls[0]?.[0]);
      expect(line).toMatch(/^\S+ INFO  \[bus\] posted \{"id":3\}$/);
    });

    it('should append the stack of an error', () => {
      const error = new Error('boom');
      error.stack = 'Error: boom\n    at test';
      new Logger('', { level: 'info', format: 'pretty', useColors: false }).error('failed', { error });

      const line = String(consoleSpy.error.mock.calls[0]?.[0]);
      expect(line.endsWith('failed\nError: boom\n    at test')).toBe(true);
    });
  });

  it('should recognise log levels', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(3)).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
    expect(isLogLevel('constructor')).toBe(false);
  });

  it('should fall back to info for an inherited property name in LOG_LEVEL', () => {
    vi.stubEnv('LOG_LEVEL', 'toString');
    try {
      const fromEnv = new Logger('env');
      fromEnv.info('still printed');

      expect(fromEnv.getLevel()).toBe('info');
      expect(consoleSpy.log).toHaveBeenCalledTimes(1);
    } finally {
      vi.unstubAllEnvs();
    }
  });
});
