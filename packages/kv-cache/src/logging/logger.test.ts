import { describe, it, expect } from 'vitest';
import { createLogger, createSilentLogger, logAt, toPinoLevel } from './logger.js';
import { loadLoggingConfig } from './config.js';
import { createCaptureStream } from '../test/mocks.js';

describe('toPinoLevel', () => {
  it('maps warning and critical onto pino names', () => {
    expect(toPinoLevel('warning')).toBe('warn');
    expect(toPinoLevel('critical')).toBe('fatal');
    expect(toPinoLevel('debug')).toBe('debug');
  });
});

describe('createLogger', () => {
  describe('given a destination stream', () => {
    it('writes JSON lines with the prefixed name and a string level', () => {
      const capture = createCaptureStream();
      const logger = createLogger('purge', { level: 'debug', destination: capture });

      logger.debug({ removed: 3 }, 'Purged expired cache entries');

      expect(capture.records()).toHaveLength(1);
      expect(capture.records()[0]).toMatchObject({
        level: 'debug',
        name: 'kv-cache:purge',
        removed: 3,
        msg: 'Purged expired cache entries',
      });
    });
  });

  describe('given a level above the message level', () => {
    it('drops the message', () => {
      const capture = createCaptureStream();
      const logger = createLogger('purge', { level: 'warn', destination: capture });

      logger.info('ignored');

      expect(capture.records()).toEqual([]);
    });
  });
});

describe('logAt', () => {
  it('logs application levels through pino', () => {
    const capture = createCaptureStream();
    const logger = createLogger('app', { level: 'debug', destination: capture });

    logAt(logger, 'warning', 'Low disk space', { freeBytes: 10 });
    logAt(logger, 'critical', 'Cache directory missing');

    expect(capture.records()).toMatchObject([
      { level: 'warn', msg: 'Low disk space', freeBytes: 10 },
      { level: 'fatal', msg: 'Cache directory missing' },
    ]);
  });
});

describe('createSilentLogger', () => {
  it('is disabled', () => {
    expect(createSilentLogger().isLevelEnabled('fatal')).toBe(false);
  });
});

describe('loadLoggingConfig', () => {
  describe('given no KV_CACHE_LOG_LEVEL', () => {
    it('defaults to info', () => {
      expect(loadLoggingConfig({})).toEqual({ level: 'info' });
    });
  });

  describe('given a valid level in any case', () => {
    it('normalizes it', () => {
      expect(loadLoggingConfig({ KV_CACHE_LOG_LEVEL: ' DEBUG ' })).toEqual({ level: 'debug' });
    });
  });

  describe('given an unknown level', () => {
    it('throws naming the variable', () => {
      expect(() => loadLoggingConfig({ KV_CACHE_LOG_LEVEL: 'verbose' })).toThrow(
        'KV_CACHE_LOG_LEVEL must be one of fatal, error, warn, info, debug, trace, silent'
      );
    });
  });
});
