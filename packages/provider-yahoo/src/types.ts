/**
 * @fileoverview Yahoo Finance provider types.
 *
 * The chart response is described by zod schemas so that an unexpected payload
 * is rejected at the boundary instead of deep inside the parser.
 *
 * @module @levelscope/provider-yahoo/types
 */

import { z } from 'zod';
import type { AxiosInstance } from 'axios';
import type { DailyBar } from '@levelscope/contracts';
import type { Logger } from '@levelscope/logger';

const nullableSeries = z.array(z.number().nullable());

export const chartQuoteSchema = z.object({
  open: nullableSeries.optional(),
  high: nullableSeries.optional(),
  low: nullableSeries.optional(),
  close: nullableSeries.optional(),
  volume: nullableSeries.optional(),
});

export const chartResultSchema = z.object({
  meta: z.object({
    symbol: z.string().optional(),
    currency: z.string().nullable().optional(),
    exchangeTimezoneName: z.string().optional(),
    /** Exchange offset from UTC in seconds */
    gmtoffset: z.number().optional(),
  }),
  /** Unix seconds; absent when the range holds no trading days */
  timestamp: z.array(z.number()).optional(),
  indicators: z.object({
    quote: z.array(chartQuoteSchema),
  }),
});

export const chartErrorSchema = z.object({
  code: z.string(),
  description: z.string().nullable().optional(),
});

export const chartResponseSchema = z.object({
  chart: z.object({
    result: z.array(chartResultSchema).nullable().optional(),
    error: chartErrorSchema.nullable().optional(),
  }),
});

export type YahooChartQuote = z.infer<typeof chartQuoteSchema>;
export type YahooChartResult = z.infer<typeof chartResultSchema>;
export type YahooChartResponse = z.infer<typeof chartResponseSchema>;

/**
 * Options for YahooProvider configuration.
 */
export interface YahooProviderOptions {
  /**
   * v8 chart endpoint.
   * @default 'https://query1.finance.yahoo.com/v8/finance/chart'
   */
  baseUrl?: string;

  /**
   * Request timeout in milliseconds.
   * @default 10000
   */
  timeout?: number;

  /**
   * Retries after a rate-limit or 5xx failure.
   * @default 2
   */
  retries?: number;

  /**
   * Base backoff; attempt n waits retryDelayMs * 2^n unless the server sends Retry-After.
   * @default 1000
   */
  retryDelayMs?: number;

  /**
   * Pre-configured axios instance. When given, baseUrl and timeout are not applied.
   */
  httpClient?: AxiosInstance;

  logger?: Logger;

  /**
   * Wait between retries.
   * @default setTimeout from node:timers/promises
   */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Result of turning a chart response into daily bars.
 */
export interface ChartParseResult {
  bars: DailyBar[];

  /** Rows dropped because one of open/high/low/close was null */
  skippedRows: number;
}
