/**
 * Error sanitization utilities for safe logging
 */

import { isLevelscopeError } from '@levelscope/contracts';

/**
 * Sanitizes error objects before logging to prevent sensitive information exposure
 * Only message, name, code and (in development or on request) the stack are kept
 */
export function sanitizeError(error: unknown, includeStack = false): Record<string, unknown> {
  const isDevelopment = process.env['NODE_ENV'] === 'development';

  if (error instanceof Error) {
    const sanitized: Record<string, unknown> = {
      message: error.message,
      name: error.name,
    };

    if (isLevelscopeError(error)) {
      sanitized['code'] = error.code;
    }

    if ((isDevelopment || includeStack) && error.stack) {
      sanitized['stack'] = error.stack;
    }

    return sanitized;
  }

  return {
    message: String(error),
    name: 'Unknown',
  };
}
