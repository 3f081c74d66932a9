import { afterEach, describe, it, expect } from 'vitest';
import { loadConfig } from '../src/config.js';
import { InvalidArgumentError } from '../src/errors.js';
import { configureLogger, createChannelLogger, logger } from '../src/utils/logger.js';

describe('loadConfig', () => {
  it('defaults to warnings only', () => {
    expect(loadConfig({})).toEqual({ logLevel: 'warn', production: false });
  });

  it('reads LOG_LEVEL case-insensitively', () => {
    expect(loadConfig({ LOG_LEVEL: ' DEBUG ' }).logLevel).toBe('debug');
  });

  it('switches to production output', () => {
    expect(loadConfig({ NODE_ENV: 'production' }).production).toBe(true);
  });

  it('rejects unknown log levels', () => {
    try {
      loadConfig({ LOG_LEVEL: 'loud' });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(InvalidArgumentError);
      expect(e).toMatchObject({ param: 'LOG_LEVEL' });
    }
  });
});

describe('logger', () => {
  afterEach(() => {
    configureLogger({ logLevel: 'warn', production: false });
  });

  it('is quiet by default', () => {
    expect(logger.isLevelEnabled('warn')).toBe(true);
    expect(logger.isLevelEnabled('info')).toBe(false);
  });

  it('takes its level from the configuration', () => {
    configureLogger({ logLevel: 'debug', production: false });
    expect(logger.level).toBe('debug');
    expect(logger.isLevelEnabled('debug')).toBe(true);
  });

  it('gives diagnostic channels their own threshold', () => {
    configureLogger({ logLevel: 'debug', production: false });
    const channel = createChannelLogger('manifest.proxy-metrics', 'error');
    expect(channel.isLevelEnabled('warn')).toBe(false);
    expect(channel.isLevelEnabled('error')).toBe(true);
    expect(logger.isLevelEnabled('warn')).toBe(true);
  });
});
