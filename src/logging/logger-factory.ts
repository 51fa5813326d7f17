/**
 * Logger Factory
 *
 * Creates component-specific Pino child loggers with consistent patterns.
 * Provides utility functions for the logging scenarios of a batch run.
 */

import pino from 'pino';
import { logger as baseLogger } from './logger.js';

/**
 * Service logger interface
 * Extends Pino logger with service-specific context
 */
export interface ServiceLogger extends pino.Logger {}

/**
 * Create a component-specific logger with structured context
 *
 * @param serviceName - Name of the component (e.g., 'AdmissionLoop', 'Dispatcher')
 *
 * @example
 * ```typescript
 * const logger = createServiceLogger('Dispatcher');
 * logger.info('Dispatcher ready');
 * // Output: {"level":"info","service":"Dispatcher","msg":"Dispatcher ready"}
 * ```
 */
export function createServiceLogger(serviceName: string): ServiceLogger {
  return baseLogger.child({
    service: serviceName,
  });
}

/**
 * Common logging patterns
 *
 * Keeps the shape of recurring log lines uniform across components.
 */
export const LogPatterns = {
  /**
   * Log method entry (debug level)
   *
   * @example
   * ```typescript
   * LogPatterns.methodEntry(logger, 'run', { maxAttempts: 5 });
   * // Output: {"level":"debug","service":"...","method":"run","params":{"maxAttempts":5},"msg":"Entering run"}
   * ```
   */
  methodEntry: (
    logger: ServiceLogger,
    method: string,
    params: Record<string, unknown> = {}
  ) => {
    logger.debug({ method, params }, `Entering ${method}`);
  },

  /**
   * Log method exit (debug level)
   *
   * @param result - Optional result summary (avoid logging large objects)
   */
  methodExit: (
    logger: ServiceLogger,
    method: string,
    result?: Record<string, unknown>
  ) => {
    logger.debug({ method, result }, `Exiting ${method}`);
  },

  /**
   * Log method error (error level)
   *
   * @example
   * ```typescript
   * LogPatterns.methodError(logger, 'close', error, { path: 'out.jsonl' });
   * // Output: {"level":"error","service":"...","method":"close","error":"EACCES","stack":"...","path":"out.jsonl","msg":"Error in close"}
   * ```
   */
  methodError: (
    logger: ServiceLogger,
    method: string,
    error: Error,
    context: Record<string, unknown> = {}
  ) => {
    logger.error(
      {
        method,
        error: error.message,
        errorName: error.name,
        stack: error.stack,
        ...context,
      },
      `Error in ${method}`
    );
  },

  /**
   * Log an outbound API call (debug level)
   *
   * @param api - Target description (e.g., the request URL host)
   * @param endpoint - Endpoint path
   */
  externalApiCall: (
    logger: ServiceLogger,
    api: string,
    endpoint: string,
    params: Record<string, unknown> = {}
  ) => {
    logger.debug({ api, endpoint, params }, `External API call: ${api}`);
  },

  /**
   * Log a state machine transition (trace level; loops transition every tick)
   *
   * @example
   * ```typescript
   * LogPatterns.stateTransition(logger, 'WAIT', 'COOLDOWN', { remainingMs: 4200 });
   * // Output: {"level":"trace","service":"...","from":"WAIT","to":"COOLDOWN","remainingMs":4200,"msg":"WAIT -> COOLDOWN"}
   * ```
   */
  stateTransition: (
    logger: ServiceLogger,
    from: string,
    to: string,
    context: Record<string, unknown> = {}
  ) => {
    logger.trace({ from, to, ...context }, `${from} -> ${to}`);
  },

  /**
   * Log the end-of-run summary (info level)
   */
  runSummary: (
    logger: ServiceLogger,
    summary: Record<string, unknown>
  ) => {
    logger.info({ summary }, 'Batch run complete');
  },
};

/**
 * Alias for LogPatterns for more concise usage
 *
 * @example
 * ```typescript
 * log.methodEntry(logger, 'dispatch', { jobId: 3 });
 * log.methodExit(logger, 'dispatch');
 * ```
 */
export const log = LogPatterns;
