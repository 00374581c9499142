/**
 * @fileoverview Result types for significant-candle and unbroken-level analysis.
 *
 * @module @levelscope/contracts/analysis
 */

import type { DailyBar } from './market.js';

/**
 * Direction of an unbroken level.
 * - resistance: a significant bar's high never exceeded afterwards
 * - support: a significant bar's low never undercut afterwards
 */
export type LevelKind = 'resistance' | 'support';

/**
 * A daily bar with its volatility-derived fields.
 *
 * @invariant averageTrueRange is null exactly for the first (windowSize - 1) bars
 * @invariant isSignificant is null exactly where averageTrueRange is null
 */
export interface AnnotatedBar extends DailyBar {
  /** max(high - low, |high - prevClose|, |low - prevClose|); high - low for the first bar */
  readonly trueRange: number;

  /** Trailing simple mean of trueRange over the window, or null during warm-up */
  readonly averageTrueRange: number | null;

  /** trueRange > multiplier * averageTrueRange, or null during warm-up */
  readonly isSignificant: boolean | null;
}

/**
 * A price from a significant bar that no later bar in the window has broken.
 */
export interface Level {
  /** Date of the significant bar the level comes from (YYYY-MM-DD) */
  readonly originDate: string;

  /** The bar's high (resistance) or low (support) */
  readonly price: number;

  readonly kind: LevelKind;
}

/**
 * Levels split by kind, each list in origin-date order.
 */
export interface PartitionedLevels {
  resistance: Level[];
  support: Level[];
}

/**
 * Calendar window an analysis covers (both ends inclusive, YYYY-MM-DD).
 */
export interface AnalysisWindow {
  start: string;
  end: string;
}

/**
 * Parameters an analysis was run with.
 */
export interface AnalysisParameters {
  /** Rolling window for the average true range */
  windowSize: number;

  /** A bar is significant when trueRange > significanceMultiplier * ATR */
  significanceMultiplier: number;
}

/**
 * Complete output of one pipeline invocation.
 *
 * @example
 * ```typescript
 * const result: AnalysisResult = analyzeSeries(bars, { endDate: '2025-03-03' });
 * result.levels.resistance.forEach((level) => console.log(level.originDate, level.price));
 * ```
 */
export interface AnalysisResult {
  /** Ticker the series belongs to, when known */
  symbol?: string;

  window: AnalysisWindow;

  parameters: AnalysisParameters;

  /** Every bar of the series with derived fields */
  bars: AnnotatedBar[];

  /** Bars where isSignificant is true, in date order */
  significantBars: AnnotatedBar[];

  levels: PartitionedLevels;
}
