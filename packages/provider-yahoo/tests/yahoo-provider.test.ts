/**
 * @fileoverview Tests for the Yahoo Finance provider.
 *
 * Requests go to an in-process axios adapter; nothing leaves the process.
 */

import { describe, it, expect } from 'vitest';
import { Writable } from 'node:stream';
import {
  InvalidParameterError,
  ProviderError,
  ProviderRateLimitError,
  SymbolResolutionError,
} from '@levelscope/contracts';
import { createLogger } from '@levelscope/logger';
import { YahooProvider } from '../src/yahoo-provider.js';
import { getRetryDelay, isRetryableError } from '../src/errors.js';
import { chartBody, chartError, stubClient } from './chart-fixtures.js';
import type { StubReply } from './chart-fixtures.js';

const range = { symbol: 'AAPL', from: '2025-01-02', to: '2025-01-06' };

const okReply: StubReply = {
  status: 200,
  data: chartBody([
    { date: '2025-01-02', open: 100, high: 102, low: 99, close: 101, volume: 5000 },
    { date: '2025-01-03', open: 101, high: 104, low: 100, close: 103, volume: 6200 },
    { date: '2025-01-06', open: 103, high: 103.5, low: 98, close: 99, volume: 7100 },
  ]),
};

function setup(replies: StubReply[], retries = 2) {
  const { client, requests } = stubClient(replies);
  const sleeps: number[] = [];
  const provider = new YahooProvider({
    httpClient: client,
    retries,
    retryDelayMs: 100,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
  });
  return { provider, requests, sleeps };
}

describe('YahooProvider', () => {
  describe('capabilities', () => {
    it('should report daily bars without authentication', () => {
      const caps = new YahooProvider().capabilities();

      expect(caps).toEqual({
        intervals: ['1d'],
        requiresAuthentication: false,
        historicalDataFrom: '1970-01-01',
      });
    });
  });

  describe('getDailyBars', () => {
    it('should request the inclusive daily range from the chart endpoint', async () => {
      const { provider, requests } = setup([okReply]);

      await provider.getDailyBars({ ...range, symbol: 'aapl' });

      expect(requests).toHaveLength(1);
      expect(requests[0]?.url).toBe('/AAPL');
      expect(requests[0]?.params).toEqual({
        interval: '1d',
        period1: 1735776000, // 2025-01-02T00:00:00Z
        period2: 1736208000, // 2025-01-07T00:00:00Z
        events: 'div,splits',
        includePrePost: false,
      });
    });

    it('should return parsed bars', async () => {
      const { provider } = setup([okReply]);

      const bars = await provider.getDailyBars(range);

      expect(bars.map((bar) => bar.date)).toEqual(['2025-01-02', '2025-01-03', '2025-01-06']);
      expect(bars[2]).toEqual({ date: '2025-01-06', open: 103, high: 103.5, low: 98, close: 99, volume: 7100 });
    });

    it('should map HTTP 404 to SymbolResolutionError without retrying', async () => {
      const { provider, requests } = setup([
        { status: 404, data: chartError('Not Found', 'No data found, symbol may be delisted') },
      ]);

      await expect(provider.getDailyBars({ ...range, symbol: 'NOPE' })).rejects.toThrow(
        SymbolResolutionError
      );
      expect(requests).toHaveLength(1);
    });

    it('should wait for Retry-After on a rate limit and then succeed', async () => {
      const { provider, requests, sleeps } = setup([
        { status: 429, data: 'Too Many Requests', headers: { 'retry-after': '3' } },
        okReply,
      ]);

      const bars = await provider.getDailyBars(range);

      expect(bars).toHaveLength(3);
      expect(requests).toHaveLength(2);
      expect(sleeps).toEqual([3000]);
    });

    it('should back off exponentially on 5xx and give up after the configured retries', async () => {
      const { provider, requests, sleeps } = setup([
        { status: 503, data: '' },
        { status: 502, data: '' },
        { status: 503, data: '' },
      ]);

      const error = await provider.getDailyBars(range).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ProviderError);
      if (error instanceof ProviderError) {
        expect(error.data?.['statusCode']).toBe(503);
      }
      expect(requests).toHaveLength(3);
      expect(sleeps).toEqual([100, 200]);
    });

    it('should surface a rate limit once retries are exhausted', async () => {
      const { provider } = setup([{ status: 429, data: '' }], 0);

      await expect(provider.getDailyBars(range)).rejects.toThrow(ProviderRateLimitError);
    });

    it('should not retry client errors or network failures', async () => {
      const badRequest = setup([{ status: 400, data: '' }]);
      await expect(badRequest.provider.getDailyBars(range)).rejects.toThrow(
        'Yahoo Finance request failed with HTTP 400'
      );
      expect(badRequest.requests).toHaveLength(1);

      const timeout = setup([{ status: 0, networkError: 'timeout of 10000ms exceeded' }]);
      await expect(timeout.provider.getDailyBars(range)).rejects.toThrow(
        'Yahoo Finance request failed: timeout of 10000ms exceeded'
      );
      expect(timeout.requests).toHaveLength(1);
    });

    it('should reject invalid parameters before making a request', async () => {
      const { provider, requests } = setup([okReply]);

      await expect(provider.getDailyBars({ ...range, symbol: '  ' })).rejects.toThrow(InvalidParameterError);
      await expect(provider.getDailyBars({ ...range, from: '2025-1-2' })).rejects.toThrow(InvalidParameterError);
      await expect(provider.getDailyBars({ ...range, from: '2025-02-01' })).rejects.toThrow(
        'Invalid date range: from must be <= to'
      );
      expect(requests).toHaveLength(0);
    });

    it('should log a summary of each load', async () => {
      const lines: string[] = [];
      const stream = new Writable({
        write(chunk: Buffer | string, _encoding, callback) {
          lines.push(chunk.toString());
          callback();
        },
      });
      const logger = createLogger({ level: 'info', json: true, console: false, stream });
      const { client } = stubClient([okReply]);

      await new YahooProvider({ httpClient: client, logger }).getDailyBars(range);
      await new Promise((resolve) => setTimeout(resolve, 20));

      const entry: unknown = JSON.parse(lines[0] ?? '{}');
      expect(entry).toMatchObject({
        message: 'Daily bars loaded',
        component: 'provider-yahoo',
        provider: 'yahoo',
        symbol: 'AAPL',
        count: 3,
        skipped_rows: 0,
      });
    });
  });
});

describe('retry policy', () => {
  it('should treat rate limits and 5xx as retryable', () => {
    expect(isRetryableError(new ProviderRateLimitError('limited', { provider: 'yahoo' }))).toBe(true);
    expect(isRetryableError(new ProviderError('HTTP 500', { provider: 'yahoo', statusCode: 500 }))).toBe(true);
    expect(isRetryableError(new ProviderError('HTTP 400', { provider: 'yahoo', statusCode: 400 }))).toBe(false);
    expect(isRetryableError(new SymbolResolutionError('missing', { symbol: 'X', provider: 'yahoo' }))).toBe(
      false
    );
  });

  it('should prefer Retry-After over exponential backoff', () => {
    const limited = new ProviderRateLimitError('limited', { provider: 'yahoo', retryAfter: 2 });
    const unavailable = new ProviderError('HTTP 503', { provider: 'yahoo', statusCode: 503 });

    expect(getRetryDelay(limited, 3, 1000)).toBe(2000);
    expect(getRetryDelay(unavailable, 0, 1000)).toBe(1000);
    expect(getRetryDelay(unavailable, 2, 1000)).toBe(4000);
  });
});
