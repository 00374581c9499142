/**
 * @fileoverview Parser for Yahoo Finance v8 chart responses.
 *
 * Converts the columnar chart payload into DailyBar rows dated by the exchange's
 * calendar day.
 *
 * @module @levelscope/provider-yahoo/parser
 */

import type { DailyBar, GetDailyBarsParams } from '@levelscope/contracts';
import { ProviderError, SymbolResolutionError } from '@levelscope/contracts';
import { toCalendarDate } from '@levelscope/analysis-kit';
import { chartResponseSchema } from './types.js';
import type { ChartParseResult } from './types.js';
import { PROVIDER_NAME } from './errors.js';

/**
 * Calendar date of a bar timestamp in the exchange's time zone
 *
 * @param timestamp - Unix seconds
 * @param gmtOffset - Exchange offset from UTC in seconds
 */
export function exchangeDate(timestamp: number, gmtOffset: number): string {
  return toCalendarDate(new Date((timestamp + gmtOffset) * 1000));
}

/**
 * Parses a raw chart response into daily bars.
 *
 * - Rows with a null open, high, low or close are skipped and counted
 * - A null volume becomes 0
 * - Rows dated outside [from, to] are dropped
 * - When two rows land on the same date, the later row wins
 * - A response with no timestamps yields no bars
 *
 * @param body - Response body as received
 * @param params - Request the response answers
 * @throws SymbolResolutionError if the chart error code is "Not Found"
 * @throws ProviderError for any other chart error or an unexpected shape
 *
 * @example
 * ```typescript
 * const { bars, skippedRows } = parseChartResponse(response.data, {
 *   symbol: 'AAPL',
 *   from: '2025-01-02',
 *   to: '2025-03-03',
 * });
 * ```
 */
export function parseChartResponse(body: unknown, params: GetDailyBarsParams): ChartParseResult {
  const parsed = chartResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new ProviderError('Unexpected Yahoo Finance response shape', {
      provider: PROVIDER_NAME,
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }

  const { chart } = parsed.data;

  if (chart.error) {
    if (chart.error.code === 'Not Found') {
      throw new SymbolResolutionError(`Symbol not found on Yahoo Finance: ${params.symbol}`, {
        symbol: params.symbol,
        provider: PROVIDER_NAME,
      });
    }
    throw new ProviderError(
      `Yahoo Finance chart error: ${chart.error.description ?? chart.error.code}`,
      { provider: PROVIDER_NAME, chartErrorCode: chart.error.code }
    );
  }

  const result = chart.result?.[0];
  if (!result) {
    throw new ProviderError('Yahoo Finance response missing chart result', {
      provider: PROVIDER_NAME,
    });
  }

  const timestamps = result.timestamp ?? [];
  const quote = result.indicators.quote[0];
  if (timestamps.length > 0 && !quote) {
    throw new ProviderError('Yahoo Finance response missing quote data', {
      provider: PROVIDER_NAME,
    });
  }

  const gmtOffset = result.meta.gmtoffset ?? 0;
  const byDate = new Map<string, DailyBar>();
  let skippedRows = 0;

  timestamps.forEach((timestamp, i) => {
    const open = quote?.open?.[i];
    const high = quote?.high?.[i];
    const low = quote?.low?.[i];
    const close = quote?.close?.[i];

    if (open == null || high == null || low == null || close == null) {
      skippedRows++;
      return;
    }

    const date = exchangeDate(timestamp, gmtOffset);
    if (date < params.from || date > params.to) {
      return;
    }

    byDate.set(date, { date, open, high, low, close, volume: quote?.volume?.[i] ?? 0 });
  });

  const bars = [...byDate.values()].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));

  return { bars, skippedRows };
}
