/**
 * @fileoverview Public API of @levelscope/logger
 * Structured logging, request correlation and timing
 */

export { createLogger, createChildLogger } from './createLogger.js';

export { attachGlobalHandlers } from './errorHandler.js';
export type { GlobalHandlerOptions } from './errorHandler.js';

export {
  generateRequestId,
  getRequestContext,
  withRequestContext,
  setRequestContext,
} from './request-context.js';
export type { RequestContext } from './request-context.js';

export { startTimer, measureAsync, measureSync } from './perf-timer.js';
export type { PerfTimer } from './perf-timer.js';

export { redactPII, redactValue, isSensitiveFieldName } from './formats.js';

export type { Logger, LoggerConfig, LogLevel, LogFields } from './types.js';
