/**
 * @fileoverview Public API for @levelscope/provider-yahoo.
 *
 * @module @levelscope/provider-yahoo
 * @example
 * ```typescript
 * import { YahooProvider } from '@levelscope/provider-yahoo';
 *
 * const provider = new YahooProvider();
 * const bars = await provider.getDailyBars({ symbol: 'AAPL', from: '2025-01-02', to: '2025-03-03' });
 * ```
 */

export { YahooProvider, YAHOO_CHART_URL } from './yahoo-provider.js';
export { parseChartResponse, exchangeDate } from './parser.js';
export { mapYahooError, isRetryableError, getRetryDelay } from './errors.js';
export { chartResponseSchema } from './types.js';

export type {
  YahooProviderOptions,
  YahooChartResponse,
  YahooChartResult,
  YahooChartQuote,
  ChartParseResult,
} from './types.js';
