/**
 * @fileoverview Process-level handlers for uncaught exceptions and unhandled
 * rejections. Errors are logged, the logger is flushed, then the process exits.
 */

import type { Logger } from './types.js';

/** Upper bound on how long to wait for transports to flush before exiting. */
const FLUSH_TIMEOUT_MS = 3000;

let handlersAttached = false;

function describeError(reason: unknown): Record<string, unknown> {
  if (reason instanceof Error) {
    return { name: reason.name, message: reason.message, stack: reason.stack };
  }
  return { message: String(reason) };
}

/**
 * Attaches `uncaughtException`, `unhandledRejection` and `warning` listeners.
 * The first two log at error level and exit with code 1; warnings are only
 * logged. A second call is a no-op that logs a warning.
 *
 * @returns true if handlers were attached by this call
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info' });
 * attachGlobalHandlers(logger);
 * ```
 */
export function attachGlobalHandlers(logger: Logger): boolean {
  if (handlersAttached) {
    logger.warn('Global error handlers already attached, skipping');
    return false;
  }

  process.on('uncaughtException', (error: Error) => {
    logger.error('Uncaught exception detected - process will exit', {
      error: describeError(error),
      event: 'uncaughtException',
      fatal: true,
    });
    gracefulExit(logger, 1);
  });

  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled promise rejection detected - process will exit', {
      error: describeError(reason),
      event: 'unhandledRejection',
      fatal: true,
    });
    gracefulExit(logger, 1);
  });

  process.on('warning', (warning: Error) => {
    logger.warn('Process warning emitted', {
      warning: describeError(warning),
      event: 'warning',
    });
  });

  handlersAttached = true;
  logger.debug('Global error handlers attached', {
    handlers: ['uncaughtException', 'unhandledRejection', 'warning'],
  });
  return true;
}

/**
 * Ends the logger and exits once it has flushed, or after
 * {@link FLUSH_TIMEOUT_MS} if it never does.
 */
export function gracefulExit(logger: Logger, exitCode: number): void {
  const timeoutId = setTimeout(() => {
    process.exit(exitCode);
  }, FLUSH_TIMEOUT_MS);

  logger.on('finish', () => {
    clearTimeout(timeoutId);
    process.exit(exitCode);
  });

  logger.end();
}
