/**
 * @fileoverview Tests for error classes and serialization.
 */

import { describe, it, expect } from 'vitest';
import {
  LevelscopeError,
  EmptyInputError,
  InsufficientDataError,
  MalformedBarError,
  InvalidParameterError,
  ProviderRateLimitError,
  SymbolResolutionError,
  ProviderError,
  isLevelscopeError,
  isEmptyInputError,
  isInsufficientDataError,
  isMalformedBarError,
  isInvalidParameterError,
  isProviderRateLimitError,
  isSymbolResolutionError,
  isProviderError,
} from '../src/errors.js';

describe('LevelscopeError', () => {
  it('should create error with code and message', () => {
    const error = new LevelscopeError('TEST_CODE', 'Test message');

    expect(error.name).toBe('LevelscopeError');
    expect(error.code).toBe('TEST_CODE');
    expect(error.message).toBe('Test message');
    expect(error.timestamp).toBeDefined();
    expect(error.stack).toBeDefined();
    expect(error).toBeInstanceOf(Error);
  });

  it('should include optional data', () => {
    const data = { foo: 'bar', count: 42 };
    const error = new LevelscopeError('TEST_CODE', 'Test message', data);

    expect(error.data).toEqual(data);
  });

  it('should have valid ISO timestamp', () => {
    const error = new LevelscopeError('TEST_CODE', 'Test message');
    const timestamp = new Date(error.timestamp);

    expect(timestamp.toISOString()).toBe(error.timestamp);
  });

  it('should serialize to JSON correctly', () => {
    const error = new LevelscopeError('TEST_CODE', 'Test message', { key: 'value' });
    const json = error.toJSON();

    expect(json['name']).toBe('LevelscopeError');
    expect(json['code']).toBe('TEST_CODE');
    expect(json['message']).toBe('Test message');
    expect(json['data']).toEqual({ key: 'value' });
    expect(json['timestamp']).toBe(error.timestamp);
    expect(json['stack']).toBeDefined();
  });

  it('should be JSON stringifiable', () => {
    const error = new LevelscopeError('TEST_CODE', 'Test message', { key: 'value' });
    const parsed = JSON.parse(JSON.stringify(error));

    expect(parsed.name).toBe('LevelscopeError');
    expect(parsed.code).toBe('TEST_CODE');
    expect(parsed.data).toEqual({ key: 'value' });
  });
});

describe('EmptyInputError', () => {
  it('should default to an empty data payload', () => {
    const error = new EmptyInputError('No bars returned');

    expect(error.name).toBe('EmptyInputError');
    expect(error.code).toBe('EMPTY_INPUT');
    expect(error.data).toEqual({});
  });
});

describe('InsufficientDataError', () => {
  it('should carry required and received counts', () => {
    const error = new InsufficientDataError('Need more bars', {
      required: 14,
      received: 13,
    });

    expect(error.name).toBe('InsufficientDataError');
    expect(error.code).toBe('INSUFFICIENT_DATA');
    expect(error.data?.['required']).toBe(14);
    expect(error.data?.['received']).toBe(13);
  });

  it('should serialize correctly', () => {
    const error = new InsufficientDataError('Need more bars', {
      required: 14,
      received: 3,
      symbol: 'SPY',
    });

    const parsed = JSON.parse(JSON.stringify(error.toJSON()));

    expect(parsed.code).toBe('INSUFFICIENT_DATA');
    expect(parsed.data).toEqual({ required: 14, received: 3, symbol: 'SPY' });
  });
});

describe('MalformedBarError', () => {
  it('should carry the offending index, date and reason', () => {
    const error = new MalformedBarError('Bar high below close', {
      index: 4,
      date: '2025-01-08',
      reason: 'high_below_open_or_close',
    });

    expect(error.name).toBe('MalformedBarError');
    expect(error.code).toBe('MALFORMED_BAR');
    expect(error.data).toEqual({
      index: 4,
      date: '2025-01-08',
      reason: 'high_below_open_or_close',
    });
  });
});

describe('InvalidParameterError', () => {
  it('should carry the parameter name and value', () => {
    const error = new InvalidParameterError('windowSize must be a positive integer', {
      parameter: 'windowSize',
      value: 0,
    });

    expect(error.code).toBe('INVALID_PARAMETER');
    expect(error.data?.['parameter']).toBe('windowSize');
    expect(error.data?.['value']).toBe(0);
  });
});

describe('Provider errors', () => {
  it('should create rate limit error with provider data', () => {
    const error = new ProviderRateLimitError('Rate limit exceeded', {
      provider: 'yahoo',
      retryAfter: 60,
    });

    expect(error.name).toBe('ProviderRateLimitError');
    expect(error.code).toBe('PROVIDER_RATE_LIMIT');
    expect(error.data?.['provider']).toBe('yahoo');
    expect(error.data?.['retryAfter']).toBe(60);
  });

  it('should create symbol resolution error', () => {
    const error = new SymbolResolutionError('Symbol not found', {
      symbol: 'NOPE',
      provider: 'yahoo',
    });

    expect(error.name).toBe('SymbolResolutionError');
    expect(error.code).toBe('SYMBOL_RESOLUTION');
    expect(error.data?.['symbol']).toBe('NOPE');
  });

  it('should create generic provider error with status code', () => {
    const error = new ProviderError('Upstream failure', { provider: 'yahoo', statusCode: 502 });

    expect(error.name).toBe('ProviderError');
    expect(error.code).toBe('PROVIDER_ERROR');
    expect(error.data?.['statusCode']).toBe(502);
  });
});

describe('Type Guards', () => {
  const baseError = new LevelscopeError('TEST', 'message');
  const emptyError = new EmptyInputError('message');
  const insufficientError = new InsufficientDataError('message', { required: 14, received: 2 });
  const malformedError = new MalformedBarError('message', { index: 0, reason: 'non_finite_price' });
  const parameterError = new InvalidParameterError('message', { parameter: 'x', value: -1 });
  const rateLimitError = new ProviderRateLimitError('message', { provider: 'test' });
  const symbolError = new SymbolResolutionError('message', { symbol: 'TEST', provider: 'test' });
  const providerError = new ProviderError('message', { provider: 'test' });
  const nativeError = new Error('native');
  const notError = { code: 'FAKE' };

  it('isLevelscopeError should accept every subclass', () => {
    for (const error of [
      baseError,
      emptyError,
      insufficientError,
      malformedError,
      parameterError,
      rateLimitError,
      symbolError,
      providerError,
    ]) {
      expect(isLevelscopeError(error)).toBe(true);
    }
  });

  it('isLevelscopeError should reject everything else', () => {
    expect(isLevelscopeError(nativeError)).toBe(false);
    expect(isLevelscopeError(notError)).toBe(false);
    expect(isLevelscopeError(null)).toBe(false);
    expect(isLevelscopeError(undefined)).toBe(false);
  });

  it('specific guards should match only their own class', () => {
    expect(isEmptyInputError(emptyError)).toBe(true);
    expect(isEmptyInputError(baseError)).toBe(false);

    expect(isInsufficientDataError(insufficientError)).toBe(true);
    expect(isInsufficientDataError(emptyError)).toBe(false);

    expect(isMalformedBarError(malformedError)).toBe(true);
    expect(isMalformedBarError(parameterError)).toBe(false);

    expect(isInvalidParameterError(parameterError)).toBe(true);
    expect(isInvalidParameterError(malformedError)).toBe(false);

    expect(isProviderRateLimitError(rateLimitError)).toBe(true);
    expect(isProviderRateLimitError(providerError)).toBe(false);

    expect(isSymbolResolutionError(symbolError)).toBe(true);
    expect(isSymbolResolutionError(nativeError)).toBe(false);

    expect(isProviderError(providerError)).toBe(true);
    expect(isProviderError(rateLimitError)).toBe(false);
  });
});
