/**
 * @fileoverview Global handlers for uncaught exceptions and unhandled rejections
 */

import type { Logger } from './types.js';

/**
 * How long to wait for transports to flush before exiting anyway
 */
const FLUSH_TIMEOUT_MS = 3000;

let handlersAttached = false;

export interface GlobalHandlerOptions {
  /**
   * Called with the exit code once the logger has flushed.
   * @default process.exit
   */
  exit?: (code: number) => void;
}

function describeError(reason: unknown): Record<string, unknown> {
  return reason instanceof Error
    ? { name: reason.name, message: reason.message, stack: reason.stack }
    : { message: String(reason) };
}

/**
 * Log uncaught exceptions and unhandled rejections, then exit with code 1.
 *
 * The process is not kept alive after such an error. Registration is process-wide and
 * happens once; a second call logs a warning and changes nothing.
 *
 * @returns A function that removes the handlers again
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info' });
 * attachGlobalHandlers(logger);
 * ```
 */
export function attachGlobalHandlers(logger: Logger, options: GlobalHandlerOptions = {}): () => void {
  if (handlersAttached) {
    logger.warn('Global error handlers already attached, skipping');
    return () => undefined;
  }

  const exit = options.exit ?? ((code: number) => process.exit(code));

  const onUncaughtException = (error: Error) => {
    logger.error('Uncaught exception detected - process will exit', {
      error: describeError(error),
      event: 'uncaughtException',
      fatal: true,
    });
    flushThenExit(logger, 1, exit);
  };

  const onUnhandledRejection = (reason: unknown) => {
    logger.error('Unhandled promise rejection detected - process will exit', {
      error: describeError(reason),
      event: 'unhandledRejection',
      fatal: true,
    });
    flushThenExit(logger, 1, exit);
  };

  process.on('uncaughtException', onUncaughtException);
  process.on('unhandledRejection', onUnhandledRejection);
  handlersAttached = true;

  logger.debug('Global error handlers attached', {
    handlers: ['uncaughtException', 'unhandledRejection'],
  });

  return () => {
    process.off('uncaughtException', onUncaughtException);
    process.off('unhandledRejection', onUnhandledRejection);
    handlersAttached = false;
  };
}

/**
 * End the logger and exit once it has finished, or after FLUSH_TIMEOUT_MS.
 */
function flushThenExit(logger: Logger, exitCode: number, exit: (code: number) => void): void {
  let exited = false;
  const exitOnce = () => {
    if (exited) return;
    exited = true;
    exit(exitCode);
  };

  const timeoutId = setTimeout(() => {
    process.stderr.write(`[logger] Flush timeout expired (${FLUSH_TIMEOUT_MS}ms), forcing exit\n`);
    exitOnce();
  }, FLUSH_TIMEOUT_MS);

  logger.on('finish', () => {
    clearTimeout(timeoutId);
    exitOnce();
  });

  logger.end();
}
