/**
 * @fileoverview Custom Winston formats
 * PII redaction, standard fields with request_id injection, and the pretty console line.
 */

import { format } from 'winston';
import { getRequestContext } from './request-context.js';

/**
 * Field names whose values never reach a log sink (case-insensitive).
 */
const SENSITIVE_FIELD_PATTERNS = [
  /password/i,
  /passwd/i,
  /secret/i,
  /api[_-]?key/i,
  /token/i,
  /authorization/i,
  /cookie/i,
  /private[_-]?key/i,
];

const REDACTED = '[REDACTED]';

/**
 * Winston's own fields, never inspected for redaction
 */
const CORE_FIELDS = new Set(['level', 'message', 'timestamp', 'label', 'stack']);

/**
 * Fields rendered up front by prettyPrint, in this order
 */
const CONTEXT_FIELDS = ['component', 'symbol', 'provider', 'request_id'];
const CONTEXT_FIELD_SET = new Set(CONTEXT_FIELDS);

export function isSensitiveFieldName(key: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some((pattern) => pattern.test(key));
}

/**
 * Copy a value with every sensitive field replaced by [REDACTED], at any depth.
 *
 * @example
 * ```typescript
 * redactValue({ symbol: 'AAPL', headers: { Authorization: 'Bearer test-token' } });
 * // { symbol: 'AAPL', headers: { Authorization: '[REDACTED]' } }
 * ```
 */
export function redactValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item));
  }

  if (value === null || typeof value !== 'object' || value instanceof Error) {
    return value;
  }

  const copy: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    copy[key] = isSensitiveFieldName(key) ? REDACTED : redactValue(nested);
  }
  return copy;
}

/**
 * Winston format that redacts sensitive metadata before any other format sees it.
 *
 * @example
 * ```typescript
 * logger.info('Fetching', { symbol: 'AAPL', apiKey: 'test-key' });
 * // {"level":"info","message":"Fetching","symbol":"AAPL","apiKey":"[REDACTED]"}
 * ```
 */
export const redactPII = format((info) => {
  const redacted = { ...info };

  for (const key of Object.keys(redacted)) {
    if (CORE_FIELDS.has(key)) continue;
    redacted[key] = isSensitiveFieldName(key) ? REDACTED : redactValue(redacted[key]);
  }

  return redacted;
});

/**
 * ISO timestamp, error stacks, and the fields of the active request context
 * (request_id, operation, anything merged with setRequestContext). Fields already on the entry win.
 */
export const standardFields = format.combine(
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  format.errors({ stack: true }),
  format((info) => {
    const context = getRequestContext();
    if (context) {
      for (const [key, value] of Object.entries(context)) {
        if (info[key] === undefined) {
          info[key] = value;
        }
      }
    }
    return info;
  })()
);

/**
 * Human-readable single line, for development.
 *
 * @example
 * ```typescript
 * // [2025-03-03T12:34:56.789+00:00] info: Analysis complete component=levels-command symbol=AAPL count=3
 * ```
 */
export const prettyPrint = format.combine(
  format.colorize(),
  format.printf((info) => {
    const context: string[] = [];

    for (const field of CONTEXT_FIELDS) {
      const value = info[field];
      if (value !== undefined && value !== null && value !== '') {
        context.push(`${field}=${String(value)}`);
      }
    }

    for (const [key, value] of Object.entries(info)) {
      if (CORE_FIELDS.has(key) || key === 'splat') continue;
      if (CONTEXT_FIELD_SET.has(key)) continue;
      context.push(`${key}=${JSON.stringify(value)}`);
    }

    const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
    const line = `[${String(info['timestamp'])}] ${info.level}: ${String(info.message)}${contextStr}`;

    const stack = info['stack'];
    return typeof stack === 'string' ? `${line}\n${stack}` : line;
  })
);
