/**
 * Logging configuration using Pino.
 */

import pino, { type LoggerOptions } from 'pino';
import type { Config } from '../config.js';

const pretty = process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';

/**
 * Level used before the configuration is loaded. Unknown values fall back
 * to info; `loadConfig` reports them.
 */
function initialLevel(): string {
  const level = (process.env.LOG_LEVEL ?? 'INFO').toLowerCase();
  return level === 'silent' || level in pino.levels.values ? level : 'info';
}

/**
 * Options shared by the global logger and the Fastify request logger.
 */
const loggerConfig: LoggerOptions = {
  level: initialLevel(),
  transport: pretty
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
};

/**
 * Global logger instance configured with environment settings.
 */
export const logger = pino(loggerConfig);

/**
 * Apply the validated `LOG_LEVEL` once `.env` and the environment are loaded.
 *
 * @returns options for a Fastify request logger at the same level
 */
export function configureLogger(config: Pick<Config, 'LOG_LEVEL'>): LoggerOptions {
  const level = config.LOG_LEVEL.toLowerCase();
  logger.level = level;
  return { ...loggerConfig, level };
}
