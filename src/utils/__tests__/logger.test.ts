import { afterEach, describe, it, expect } from 'vitest';
import { loadConfig } from '../../config.js';
import { configureLogger, logger } from '../logger.js';
import { TEST_CONFIG_ENV } from '../../test/stand-ins.js';

describe('configureLogger', () => {
  afterEach(() => {
    logger.level = 'silent';
  });

  it('applies LOG_LEVEL from the loaded config', () => {
    const config = loadConfig({ ...TEST_CONFIG_ENV, LOG_LEVEL: 'warn' });

    const options = configureLogger(config);

    expect(logger.level).toBe('warn');
    expect(options.level).toBe('warn');
  });

  it('accepts an upper-case level', () => {
    configureLogger(loadConfig({ ...TEST_CONFIG_ENV, LOG_LEVEL: 'DEBUG' }));

    expect(logger.level).toBe('debug');
  });
});
