/**
 * Tests for logger utility.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Logger, logger } from '../../../src/utils/logger.js';

describe('Logger', () => {
  const consoleSpy = {
    log: vi.spyOn(console, 'log').mockImplementation(() => {}),
    warn: vi.spyOn(console, 'warn').mockImplementation(() => {}),
    error: vi.spyOn(console, 'error').mockImplementation(() => {}),
  };

  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(() => {
    logger.setLevel('info');
    logger.setPrefix('');
  });

  describe('log levels', () => {
    it('should default to info', () => {
      const log = new Logger();
      expect(log.getLevel()).toBe('info');
      log.debug('hidden');
      log.info('shown');
      expect(consoleSpy.log).toHaveBeenCalledTimes(1);
    });

    it('should log debug when level is debug', () => {
      const log = new Logger();
      log.setLevel('debug');
      log.debug('test message');
      expect(consoleSpy.log).toHaveBeenCalledWith(expect.stringContaining('[DEBUG] test message'));
    });

    it('should send warnings to console.warn', () => {
      const log = new Logger();
      log.warn('careful');
      expect(consoleSpy.warn).toHaveBeenCalledWith(expect.stringContaining('[WARN] careful'));
    });

    it('should not log warn when level is error', () => {
      const log = new Logger();
      log.setLevel('error');
      log.warn('test message');
      expect(consoleSpy.warn).not.toHaveBeenCalled();
    });

    it('should log nothing when silent', () => {
      const log = new Logger();
      log.setLevel('silent');
      log.error('test message');
      log.success('done');
      expect(consoleSpy.error).not.toHaveBeenCalled();
      expect(consoleSpy.log).not.toHaveBeenCalled();
    });

    it('should never report silent as enabled', () => {
      const log = new Logger();
      log.setLevel('debug');
      expect(log.isEnabled('silent')).toBe(false);
      expect(log.isEnabled('debug')).toBe(true);
    });
  });

  describe('data and errors', () => {
    it('should print attached data as JSON', () => {
      const log = new Logger();
      log.info('with data', { count: 2 });
      expect(consoleSpy.log).toHaveBeenCalledTimes(2);
      expect(consoleSpy.log).toHaveBeenLastCalledWith(expect.stringContaining('"count": 2'));
    });

    it('should print the stack of an error', () => {
      const log = new Logger();
      const error = new Error('kaput');
      log.error('failed', error);
      expect(consoleSpy.error).toHaveBeenCalledWith(expect.stringContaining('[ERROR] failed'));
      expect(consoleSpy.error).toHaveBeenLastCalledWith(expect.stringContaining('Error: kaput'));
    });
  });

  describe('success and fail', () => {
    it('should mark outcomes', () => {
      const log = new Logger();
      log.success('passed');
      log.fail('failed');
      expect(consoleSpy.log).toHaveBeenNthCalledWith(1, expect.stringContaining('✓ passed'));
      expect(consoleSpy.log).toHaveBeenNthCalledWith(2, expect.stringContaining('✗ failed'));
    });
  });

  describe('child loggers', () => {
    it('should prefix messages', () => {
      const child = new Logger().child('engine');
      child.info('ran');
      expect(consoleSpy.log).toHaveBeenCalledWith(expect.stringContaining('[INFO] [engine] ran'));
    });

    it('should nest prefixes', () => {
      const parent = new Logger();
      parent.setPrefix('cli');
      parent.child('check').info('ran');
      expect(consoleSpy.log).toHaveBeenCalledWith(expect.stringContaining('[cli:check] ran'));
    });

    it('should follow the parent level until given its own', () => {
      const parent = new Logger();
      const child = parent.child('rules');

      parent.setLevel('debug');
      expect(child.getLevel()).toBe('debug');

      child.setLevel('warn');
      parent.setLevel('info');
      expect(child.getLevel()).toBe('warn');
    });
  });
});
