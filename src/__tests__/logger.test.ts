import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { logger, Logger, isLogLevel } from '../utils/logger.js';

describe('Logger', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const firstOutput = (): string => String(vi.mocked(console.error).mock.calls[0][0]);

  describe('default logger', () => {
    it('should be an instance of Logger', () => {
      expect(logger).toBeInstanceOf(Logger);
    });
  });

  describe('Logger class', () => {
    it('should create a logger with default prefix', () => {
      const log = new Logger(undefined, 'info');
      log.info('test message');

      expect(console.error).toHaveBeenCalled();
      const output = firstOutput();
      expect(output).toContain('[nix-hyperfine]');
      expect(output).toContain('[INFO]');
      expect(output).toContain('test message');
    });

    it('should create child loggers', () => {
      const parent = new Logger('parent', 'info');
      const child = parent.child('prebuild');
      child.info('test');

      expect(firstOutput()).toContain('[parent:prebuild]');
    });

    it('should log debug messages when level is debug', () => {
      const log = new Logger('test', 'debug');
      log.debug('debug message');

      expect(firstOutput()).toContain('[DEBUG]');
    });

    it('should not log debug messages when level is info', () => {
      const log = new Logger('test', 'info');
      log.debug('debug message');

      expect(console.error).not.toHaveBeenCalled();
    });

    it('should only log errors when level is error', () => {
      const log = new Logger('test', 'error');
      log.warn('warning message');
      log.error('error message');

      expect(console.error).toHaveBeenCalledTimes(1);
      expect(firstOutput()).toContain('[ERROR] error message');
    });

    it('should propagate setLevel to existing children', () => {
      const parent = new Logger('parent', 'info');
      const child = parent.child('revisions');

      child.debug('hidden');
      expect(console.error).not.toHaveBeenCalled();

      parent.setLevel('debug');
      child.debug('shown');

      expect(child.level).toBe('debug');
      expect(firstOutput()).toContain('[parent:revisions] [DEBUG] shown');
    });

    it('should read the level from LOG_LEVEL when none is given', () => {
      const original = process.env.LOG_LEVEL;
      process.env.LOG_LEVEL = 'warn';
      try {
        expect(new Logger('env').level).toBe('warn');
        process.env.LOG_LEVEL = 'loud';
        expect(new Logger('env').level).toBe('info');
      } finally {
        if (original === undefined) {
          delete process.env.LOG_LEVEL;
        } else {
          process.env.LOG_LEVEL = original;
        }
      }
    });

    it('should include timestamp in output', () => {
      const log = new Logger('test', 'info');
      log.info('test');

      // ISO timestamp format: 2024-01-15T12:00:00.000Z
      expect(firstOutput()).toMatch(/^\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\]/);
    });
  });

  describe('isLogLevel', () => {
    it('accepts known levels only', () => {
      expect(isLogLevel('debug')).toBe(true);
      expect(isLogLevel('error')).toBe(true);
      expect(isLogLevel('trace')).toBe(false);
      expect(isLogLevel(undefined)).toBe(false);
    });
  });
});
