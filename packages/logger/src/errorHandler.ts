/**
 * @fileoverview Fatal error handling for one-shot scripts.
 * Ensures errors are logged before the process terminates.
 */

import type { Logger } from './types.js';

/**
 * Timeout in milliseconds to wait for the logger to flush before a forced exit.
 */
const FLUSH_TIMEOUT_MS = 3000;

/**
 * Tracks whether global handlers have been attached to prevent duplicate registration.
 */
let handlersAttached = false;

/**
 * Attaches global handlers for uncaught exceptions and unhandled promise
 * rejections. Each is logged with its stack and the process exits with code 1.
 * No attempt is made to continue a run after an unhandled error.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info' });
 * attachGlobalHandlers(logger);
 * ```
 */
export function attachGlobalHandlers(logger: Logger): void {
  if (handlersAttached) {
    logger.debug('Global error handlers already attached, skipping');
    return;
  }

  const uncaughtExceptionHandler = (error: Error) => {
    logger.error('Uncaught exception detected - process will exit', {
      error: describeError(error),
      event: 'uncaughtException',
      fatal: true,
    });
    exitAfterFlush(logger, 1);
  };

  const unhandledRejectionHandler = (reason: unknown) => {
    logger.error('Unhandled promise rejection detected - process will exit', {
      error: describeError(reason),
      event: 'unhandledRejection',
      fatal: true,
    });
    exitAfterFlush(logger, 1);
  };

  process.on('uncaughtException', uncaughtExceptionHandler);
  process.on('unhandledRejection', unhandledRejectionHandler);

  handlersAttached = true;
  logger.debug('Global error handlers attached', {
    handlers: ['uncaughtException', 'unhandledRejection'],
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reduces any thrown value to plain, JSON-safe fields for logging.
 * Errors exposing a `toJSON()` (the dataset error taxonomy) keep their code and data.
 */
export function describeError(reason: unknown): Record<string, unknown> {
  if (reason instanceof Error) {
    const toJSON: unknown = Reflect.get(reason, 'toJSON');
    const serialized: unknown = typeof toJSON === 'function' ? toJSON.call(reason) : undefined;
    return {
      ...(isRecord(serialized) ? serialized : {}),
      name: reason.name,
      message: reason.message,
      stack: reason.stack,
    };
  }

  return { message: String(reason), value: reason };
}

/**
 * Exits the process once the logger has flushed, or after FLUSH_TIMEOUT_MS.
 *
 * @param exitCode - Process exit code (0 = success, 1 = error)
 */
export function exitAfterFlush(logger: Logger, exitCode: number): void {
  const timeoutId = setTimeout(() => {
    console.error(`[Logger] Flush timeout expired (${FLUSH_TIMEOUT_MS}ms), forcing exit`);
    process.exit(exitCode);
  }, FLUSH_TIMEOUT_MS);

  logger.on('finish', () => {
    clearTimeout(timeoutId);
    process.exit(exitCode);
  });

  logger.end();
}
