/**
 * Base Logger Configuration
 *
 * Pino logger setup with environment-based configuration for the batch
 * request processor. Emits structured JSON lines suitable for piping into
 * log tooling while a long batch runs.
 */

import pino from 'pino';

/**
 * Log level mapping by environment
 */
const LOG_LEVELS = {
  development: 'debug',
  production: 'info',
  test: 'silent',
} as const;

function isKnownEnvironment(value: string): value is keyof typeof LOG_LEVELS {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

const NODE_ENV = process.env.NODE_ENV || 'development';
const LOG_LEVEL =
  process.env.LOG_LEVEL ||
  (isKnownEnvironment(NODE_ENV) ? LOG_LEVELS[NODE_ENV] : undefined) ||
  'info';

const loggerConfig: pino.LoggerOptions = {
  level: LOG_LEVEL,
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level(label) {
      return { level: label };
    },
  },
};

/**
 * Base logger instance shared by the whole process.
 *
 * Component loggers are children created via createServiceLogger() in
 * logger-factory.ts. Children copy the level when they are created, so
 * setLogLevel() must run before components are constructed.
 */
export const logger = pino(loggerConfig);

export type Logger = typeof logger;

/**
 * Override the log level at runtime (used by the CLI's --log-level flag)
 *
 * @throws Error if the level is not a pino level name
 */
export function setLogLevel(level: string): void {
  if (!(level in logger.levels.values) && level !== 'silent') {
    throw new Error(
      `Unknown log level "${level}". Expected one of: ${Object.keys(logger.levels.values).join(', ')}, silent`
    );
  }
  logger.level = level;
}

export { LOG_LEVEL, NODE_ENV };
