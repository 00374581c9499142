/**
 * @fileoverview Tests for AsyncLocalStorage request context
 */

import { describe, it, expect } from 'vitest';
import {
  generateRequestId,
  getRequestContext,
  setRequestContext,
  withRequestContext,
} from '../src/request-context.js';

describe('request context', () => {
  it('should generate distinct UUIDs', () => {
    const first = generateRequestId();

    expect(first).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(generateRequestId()).not.toBe(first);
  });

  it('should have no context outside withRequestContext', () => {
    expect(getRequestContext()).toBeUndefined();
    expect(setRequestContext({ symbol: 'AAPL' })).toBe(false);
  });

  it('should propagate the request ID across awaits', async () => {
    const seen = await withRequestContext(async () => {
      await new Promise((resolve) => setTimeout(resolve, 1));
      return getRequestContext()?.request_id;
    }, 'req-test-2');

    expect(seen).toBe('req-test-2');
  });

  it('should generate an ID when none is given and keep extra fields', async () => {
    const context = await withRequestContext(() => getRequestContext(), undefined, {
      operation: 'levels',
    });

    expect(context?.operation).toBe('levels');
    expect(context?.request_id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('should merge fields into the active context', async () => {
    const context = await withRequestContext(() => {
      expect(setRequestContext({ symbol: 'MSFT' })).toBe(true);
      return getRequestContext();
    }, 'req-test-3');

    expect(context).toEqual({ request_id: 'req-test-3', symbol: 'MSFT' });
  });

  it('should isolate concurrent contexts', async () => {
    const ids = await Promise.all(
      ['req-a', 'req-b', 'req-c'].map((id) =>
        withRequestContext(async () => {
          await new Promise((resolve) => setTimeout(resolve, 5));
          return getRequestContext()?.request_id;
        }, id)
      )
    );

    expect(ids).toEqual(['req-a', 'req-b', 'req-c']);
  });
});
