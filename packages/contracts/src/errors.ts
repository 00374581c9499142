/**
 * @fileoverview Error taxonomy for levelscope.
 *
 * Defines a hierarchy of structured error classes with machine-readable codes
 * and rich contextual data for debugging, reporting, and retry logic.
 *
 * All errors extend LevelscopeError base class and include:
 * - Unique error code (string constant)
 * - Structured data payload
 * - ISO timestamp
 *
 * @module @levelscope/contracts/errors
 */

/**
 * Base error class for all levelscope errors.
 *
 * Extends native Error with structured fields for machine processing.
 *
 * @invariant code is non-empty string
 * @invariant timestamp is valid ISO 8601 string
 *
 * @example
 * ```typescript
 * throw new LevelscopeError(
 *   'CUSTOM_ERROR',
 *   'Something went wrong',
 *   { context: 'value' }
 * );
 * ```
 */
export class LevelscopeError extends Error {
  /**
   * Machine-readable error code (e.g., 'INSUFFICIENT_DATA').
   * Use for error categorization and handling logic.
   */
  readonly code: string;

  /**
   * Structured error data for debugging and retry logic.
   * Format varies by error type.
   */
  readonly data?: Record<string, unknown>;

  /** ISO 8601 timestamp when error was created. */
  readonly timestamp: string;

  constructor(code: string, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.data = data;
    this.timestamp = new Date().toISOString();

    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Serializes error to JSON-safe object.
   *
   * @example
   * ```typescript
   * const err = new LevelscopeError('TEST', 'Test error');
   * JSON.stringify(err.toJSON());
   * ```
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Thrown when a series with zero bars reaches the analysis pipeline.
 *
 * Fatal to the invocation; no partial output is produced.
 */
export class EmptyInputError extends LevelscopeError {
  /**
   * @param message - Human-readable description
   * @param data - Optional context (symbol, window)
   */
  constructor(message: string, data: Record<string, unknown> = {}) {
    super('EMPTY_INPUT', message, data);
  }
}

/**
 * Thrown when a series is shorter than the rolling window requires.
 *
 * @example
 * ```typescript
 * throw new InsufficientDataError(
 *   'Need at least 14 bars for a 14-bar average true range',
 *   { required: 14, received: 13 }
 * );
 * ```
 */
export class InsufficientDataError extends LevelscopeError {
  /**
   * @param message - Human-readable description
   * @param data - Context data
   * @param data.required - Minimum bars required
   * @param data.received - Actual bars received
   */
  constructor(
    message: string,
    data: {
      required: number;
      received: number;
      [key: string]: unknown;
    }
  ) {
    super('INSUFFICIENT_DATA', message, data);
  }
}

/**
 * Thrown when a bar violates the OHLC ordering, carries a non-finite price,
 * or breaks the strictly increasing date order of its series.
 */
export class MalformedBarError extends LevelscopeError {
  /**
   * @param message - Human-readable description
   * @param data - Context data
   * @param data.index - Position of the offending bar in the series
   * @param data.reason - Short machine-friendly reason (e.g. 'high_below_close')
   */
  constructor(
    message: string,
    data: {
      index: number;
      reason: string;
      date?: string;
      [key: string]: unknown;
    }
  ) {
    super('MALFORMED_BAR', message, data);
  }
}

/**
 * Thrown when an analysis parameter (window size, multiplier, date) is out of range.
 */
export class InvalidParameterError extends LevelscopeError {
  constructor(
    message: string,
    data: {
      parameter: string;
      value: unknown;
      [key: string]: unknown;
    }
  ) {
    super('INVALID_PARAMETER', message, data);
  }
}

/**
 * Thrown when a data provider's rate limit is exceeded.
 *
 * Indicates temporary throttling; caller should implement exponential backoff.
 *
 * @example
 * ```typescript
 * throw new ProviderRateLimitError(
 *   'Yahoo Finance rate limit exceeded',
 *   { provider: 'yahoo', retryAfter: 60 }
 * );
 * ```
 */
export class ProviderRateLimitError extends LevelscopeError {
  /**
   * @param message - Human-readable description
   * @param data - Context data
   * @param data.provider - Provider name (e.g., 'yahoo')
   * @param data.retryAfter - Optional: seconds to wait before retry
   */
  constructor(
    message: string,
    data: {
      provider: string;
      retryAfter?: number;
      [key: string]: unknown;
    }
  ) {
    super('PROVIDER_RATE_LIMIT', message, data);
  }
}

/**
 * Thrown when a symbol cannot be resolved by a provider.
 *
 * May indicate typo, delisted symbol, or provider-specific naming.
 */
export class SymbolResolutionError extends LevelscopeError {
  /**
   * @param message - Human-readable description
   * @param data - Context data
   * @param data.symbol - Symbol that failed to resolve
   * @param data.provider - Provider where resolution failed
   */
  constructor(
    message: string,
    data: {
      symbol: string;
      provider: string;
      [key: string]: unknown;
    }
  ) {
    super('SYMBOL_RESOLUTION', message, data);
  }
}

/**
 * Thrown for any other provider failure (transport error, unexpected payload, 5xx).
 */
export class ProviderError extends LevelscopeError {
  constructor(
    message: string,
    data: {
      provider: string;
      statusCode?: number;
      [key: string]: unknown;
    }
  ) {
    super('PROVIDER_ERROR', message, data);
  }
}

/**
 * Type guard to check if an error is a LevelscopeError.
 *
 * @example
 * ```typescript
 * try {
 *   // ... code
 * } catch (err) {
 *   if (isLevelscopeError(err)) {
 *     console.error(`[${err.code}]:`, err.message);
 *   }
 * }
 * ```
 */
export function isLevelscopeError(error: unknown): error is LevelscopeError {
  return error instanceof LevelscopeError;
}

export function isEmptyInputError(error: unknown): error is EmptyInputError {
  return error instanceof EmptyInputError;
}

export function isInsufficientDataError(error: unknown): error is InsufficientDataError {
  return error instanceof InsufficientDataError;
}

export function isMalformedBarError(error: unknown): error is MalformedBarError {
  return error instanceof MalformedBarError;
}

export function isInvalidParameterError(error: unknown): error is InvalidParameterError {
  return error instanceof InvalidParameterError;
}

/**
 * Type guard to check if an error is a ProviderRateLimitError.
 *
 * @example
 * ```typescript
 * catch (err) {
 *   if (isProviderRateLimitError(err)) {
 *     await sleep(Number(err.data?.retryAfter ?? 1) * 1000);
 *     return retry();
 *   }
 * }
 * ```
 */
export function isProviderRateLimitError(error: unknown): error is ProviderRateLimitError {
  return error instanceof ProviderRateLimitError;
}

export function isSymbolResolutionError(error: unknown): error is SymbolResolutionError {
  return error instanceof SymbolResolutionError;
}

export function isProviderError(error: unknown): error is ProviderError {
  return error instanceof ProviderError;
}
