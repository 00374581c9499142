/**
 * @fileoverview Yahoo Finance daily-bar loader.
 *
 * Fetches daily OHLCV history from the Yahoo Finance v8 chart API over axios,
 * with parameter validation, error mapping and retry with backoff.
 *
 * @module @levelscope/provider-yahoo
 */

import { setTimeout as delay } from 'node:timers/promises';
import axios, { type AxiosInstance } from 'axios';
import type {
  DailyBar,
  DailyBarsLoader,
  GetDailyBarsParams,
  ProviderCapabilities,
} from '@levelscope/contracts';
import { InvalidParameterError, isLevelscopeError } from '@levelscope/contracts';
import { addCalendarDays, isCalendarDate } from '@levelscope/analysis-kit';
import type { Logger } from '@levelscope/logger';
import { createChildLogger, startTimer } from '@levelscope/logger';
import { parseChartResponse } from './parser.js';
import { PROVIDER_NAME, getRetryDelay, isRetryableError, mapYahooError } from './errors.js';
import type { YahooProviderOptions } from './types.js';

export const YAHOO_CHART_URL = 'https://query1.finance.yahoo.com/v8/finance/chart';

const DEFAULT_TIMEOUT_MS = 10_000;
const DEFAULT_RETRIES = 2;
const DEFAULT_RETRY_DELAY_MS = 1_000;

/**
 * Unix seconds at 00:00 UTC of a calendar date
 */
function startOfDaySeconds(date: string): number {
  return Date.parse(`${date}T00:00:00.000Z`) / 1000;
}

/**
 * Yahoo Finance daily-bar loader.
 *
 * @example
 * ```typescript
 * const provider = new YahooProvider({ retries: 3, logger });
 * const bars = await provider.getDailyBars({ symbol: 'AAPL', from: '2025-01-02', to: '2025-03-03' });
 * ```
 */
export class YahooProvider implements DailyBarsLoader {
  readonly name = PROVIDER_NAME;

  private readonly http: AxiosInstance;
  private readonly retries: number;
  private readonly retryDelayMs: number;
  private readonly logger: Logger | undefined;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: YahooProviderOptions = {}) {
    this.http =
      options.httpClient ??
      axios.create({
        baseURL: options.baseUrl ?? YAHOO_CHART_URL,
        timeout: options.timeout ?? DEFAULT_TIMEOUT_MS,
        headers: { 'User-Agent': 'Mozilla/5.0 (compatible; levelscope/0.1)' },
      });
    this.retries = options.retries ?? DEFAULT_RETRIES;
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.logger = options.logger
      ? createChildLogger(options.logger, { component: 'provider-yahoo', provider: PROVIDER_NAME })
      : undefined;
    this.sleep = options.sleep ?? ((ms: number) => delay(ms));
  }

  capabilities(): ProviderCapabilities {
    return {
      intervals: ['1d'],
      requiresAuthentication: false,
      historicalDataFrom: '1970-01-01',
    };
  }

  /**
   * Load daily bars for [from, to], both ends inclusive.
   *
   * @throws InvalidParameterError for an empty symbol, a malformed date or from > to
   * @throws SymbolResolutionError if Yahoo does not know the symbol
   * @throws ProviderRateLimitError if still rate limited after all retries
   * @throws ProviderError for any other failure
   */
  async getDailyBars(params: GetDailyBarsParams): Promise<DailyBar[]> {
    this.validateParams(params);

    const symbol = params.symbol.trim().toUpperCase();
    const timer = startTimer();

    const body = await this.fetchChart(symbol, {
      interval: '1d',
      period1: startOfDaySeconds(params.from),
      period2: startOfDaySeconds(addCalendarDays(params.to, 1)),
      events: 'div,splits',
      includePrePost: false,
    });

    const { bars, skippedRows } = parseChartResponse(body, { ...params, symbol });

    this.logger?.info('Daily bars loaded', {
      symbol,
      from: params.from,
      to: params.to,
      count: bars.length,
      skipped_rows: skippedRows,
      duration_ms: timer.stop(),
    });

    return bars;
  }

  private validateParams(params: GetDailyBarsParams): void {
    if (typeof params.symbol !== 'string' || params.symbol.trim() === '') {
      throw new InvalidParameterError('Invalid symbol: must be a non-empty string', {
        parameter: 'symbol',
        value: params.symbol,
      });
    }

    for (const key of ['from', 'to'] as const) {
      if (!isCalendarDate(params[key])) {
        throw new InvalidParameterError(`Invalid ${key} date: must be YYYY-MM-DD`, {
          parameter: key,
          value: params[key],
        });
      }
    }

    if (params.from > params.to) {
      throw new InvalidParameterError('Invalid date range: from must be <= to', {
        parameter: 'from',
        value: params.from,
        to: params.to,
      });
    }
  }

  /**
   * GET the chart, retrying rate limits and 5xx responses with backoff.
   */
  private async fetchChart(symbol: string, query: Record<string, string | number | boolean>): Promise<unknown> {
    for (let attempt = 0; ; attempt++) {
      try {
        this.logger?.debug('Requesting chart', { symbol, attempt });
        const response = await this.http.get<unknown>(`/${encodeURIComponent(symbol)}`, {
          params: query,
        });
        return response.data;
      } catch (error) {
        const mapped = mapYahooError(error, symbol);

        if (attempt >= this.retries || !isRetryableError(mapped)) {
          this.logger?.warn('Chart request failed', { symbol, attempt, error_code: errorCode(mapped) });
          throw mapped;
        }

        const waitMs = getRetryDelay(mapped, attempt, this.retryDelayMs);
        this.logger?.warn('Chart request failed, retrying', {
          symbol,
          attempt,
          wait_ms: waitMs,
          error_code: errorCode(mapped),
        });
        await this.sleep(waitMs);
      }
    }
  }
}

function errorCode(error: Error): string {
  return isLevelscopeError(error) ? error.code : error.name;
}
