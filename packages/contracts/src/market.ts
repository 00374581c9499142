/**
 * @fileoverview Market data types and loader contracts.
 *
 * Defines provider-agnostic interfaces for daily OHLCV bars, query
 * parameters, and provider capabilities. All types are pure data
 * structures with no I/O or business logic.
 *
 * @module @levelscope/contracts/market
 */

/**
 * A single daily OHLCV (Open, High, Low, Close, Volume) bar.
 *
 * Represents immutable market data for one trading day.
 *
 * @invariant high >= low
 * @invariant high >= open && high >= close
 * @invariant low <= open && low <= close
 * @invariant volume >= 0
 * @invariant date is a calendar date (YYYY-MM-DD), no time-of-day
 *
 * @example
 * ```typescript
 * const bar: DailyBar = {
 *   date: '2025-01-15',
 *   open: 100.5,
 *   high: 101.25,
 *   low: 100.0,
 *   close: 101.0,
 *   volume: 1500000
 * };
 * ```
 */
export interface DailyBar {
  /** Trading day (YYYY-MM-DD) */
  readonly date: string;

  /** Opening price for the day */
  readonly open: number;

  /** Highest price during the day */
  readonly high: number;

  /** Lowest price during the day */
  readonly low: number;

  /** Closing price for the day */
  readonly close: number;

  /** Shares traded during the day */
  readonly volume: number;
}

/**
 * Parameters for requesting daily bars from a loader.
 *
 * @invariant from <= to
 *
 * @example
 * ```typescript
 * const params: GetDailyBarsParams = {
 *   symbol: 'AAPL',
 *   from: '2025-01-01',
 *   to: '2025-03-02'
 * };
 * ```
 */
export interface GetDailyBarsParams {
  /**
   * Symbol identifier (e.g., 'SPY', 'AAPL').
   * Format may vary by provider; normalization is caller's responsibility.
   */
  symbol: string;

  /** First calendar date of the range (YYYY-MM-DD, inclusive) */
  from: string;

  /** Last calendar date of the range (YYYY-MM-DD, inclusive) */
  to: string;
}

/**
 * Describes what a provider can serve. Callers use it to shape requests.
 */
export interface ProviderCapabilities {
  /** Bar intervals the provider can serve */
  intervals: Array<'1d'>;

  /** Whether API keys/auth are required */
  requiresAuthentication: boolean;

  /** Optional: earliest date with data available (YYYY-MM-DD); requests start no earlier */
  historicalDataFrom?: string;
}

/**
 * A source of daily bars: the Yahoo loader, the fixture loader, or a test stand-in.
 */
export interface DailyBarsLoader {
  /** Provider name used in logs and error payloads */
  readonly name: string;

  /** Fetch daily bars for [from, to], ascending by date */
  getDailyBars(params: GetDailyBarsParams): Promise<DailyBar[]>;

  /** What the loader serves; a loader without it is assumed to serve daily bars from any date */
  capabilities?(): ProviderCapabilities;
}
