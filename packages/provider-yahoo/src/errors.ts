/**
 * @fileoverview Yahoo Finance error mapping and retry policy.
 *
 * @module @levelscope/provider-yahoo/errors
 */

import { isAxiosError } from 'axios';
import {
  ProviderError,
  ProviderRateLimitError,
  SymbolResolutionError,
  isLevelscopeError,
  isProviderError,
  isProviderRateLimitError,
} from '@levelscope/contracts';
import { chartResponseSchema } from './types.js';

export const PROVIDER_NAME = 'yahoo';

const RETRYABLE_STATUS_CODES = [500, 502, 503, 504];

/**
 * Parse a Retry-After header given in seconds
 */
function parseRetryAfter(header: unknown): number | undefined {
  if (typeof header !== 'string' && typeof header !== 'number') {
    return undefined;
  }
  const seconds = Number(header);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : undefined;
}

/**
 * Whether a chart error body reports an unknown symbol
 */
export function isNotFoundBody(body: unknown): boolean {
  const parsed = chartResponseSchema.safeParse(body);
  return parsed.success && parsed.data.chart.error?.code === 'Not Found';
}

/**
 * Map any failure of a chart request to the error taxonomy.
 *
 * - HTTP 429 → ProviderRateLimitError (retryAfter from the Retry-After header)
 * - HTTP 404, or a body whose chart error code is "Not Found" → SymbolResolutionError
 * - everything else → ProviderError, with statusCode when there was a response
 *
 * Errors that are already LevelscopeErrors pass through unchanged.
 */
export function mapYahooError(error: unknown, symbol: string): Error {
  if (isLevelscopeError(error)) {
    return error;
  }

  if (isAxiosError(error)) {
    const status = error.response?.status;

    if (status === 429) {
      return new ProviderRateLimitError('Yahoo Finance rate limit exceeded', {
        provider: PROVIDER_NAME,
        retryAfter: parseRetryAfter(error.response?.headers['retry-after']),
      });
    }

    if (status === 404 || isNotFoundBody(error.response?.data)) {
      return new SymbolResolutionError(`Symbol not found on Yahoo Finance: ${symbol}`, {
        symbol,
        provider: PROVIDER_NAME,
      });
    }

    if (status !== undefined) {
      return new ProviderError(`Yahoo Finance request failed with HTTP ${status}`, {
        provider: PROVIDER_NAME,
        statusCode: status,
      });
    }

    return new ProviderError(`Yahoo Finance request failed: ${error.message}`, {
      provider: PROVIDER_NAME,
      cause: error.code,
    });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new ProviderError(`Yahoo Finance request failed: ${message}`, { provider: PROVIDER_NAME });
}

/**
 * Rate limits and 5xx responses are transient; everything else is final.
 */
export function isRetryableError(error: Error): boolean {
  if (isProviderRateLimitError(error)) {
    return true;
  }

  if (isProviderError(error)) {
    const statusCode = error.data?.['statusCode'];
    return typeof statusCode === 'number' && RETRYABLE_STATUS_CODES.includes(statusCode);
  }

  return false;
}

/**
 * Delay before retry number `attempt` (0-based): the server's Retry-After when
 * given, otherwise exponential backoff from `baseDelayMs`.
 *
 * @example
 * ```typescript
 * getRetryDelay(new ProviderError('HTTP 503', { provider: 'yahoo', statusCode: 503 }), 2, 1000); // 4000
 * ```
 */
export function getRetryDelay(error: Error, attempt: number, baseDelayMs: number): number {
  if (isProviderRateLimitError(error)) {
    const retryAfter = error.data?.['retryAfter'];
    if (typeof retryAfter === 'number') {
      return retryAfter * 1000;
    }
  }

  return baseDelayMs * 2 ** attempt;
}
