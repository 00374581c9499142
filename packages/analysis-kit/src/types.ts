/**
 * Core type definitions for analysis-kit package
 * All types are designed to work with pure functions (no I/O, deterministic)
 */

import type { DailyBar } from '@levelscope/contracts';

export type {
  DailyBar,
  AnnotatedBar,
  Level,
  LevelKind,
  PartitionedLevels,
  AnalysisWindow,
  AnalysisParameters,
  AnalysisResult,
} from '@levelscope/contracts';

/**
 * Rolling window for the average true range
 */
export const DEFAULT_ATR_WINDOW = 14;

/**
 * A bar is significant when its true range exceeds this multiple of the ATR
 */
export const DEFAULT_SIGNIFICANCE_MULTIPLIER = 1.2;

/**
 * Calendar days of history loaded before the selected date
 */
export const DEFAULT_LOOKBACK_DAYS = 60;

/**
 * A daily bar after the Volatility Estimator stage, before classification
 */
export interface VolatilityBar extends DailyBar {
  /** True range of this bar */
  readonly trueRange: number;

  /** Trailing mean of trueRange, or null for the first (windowSize - 1) bars */
  readonly averageTrueRange: number | null;
}

/**
 * Options for a full pipeline run
 */
export interface AnalysisOptions {
  /** Rolling ATR window (positive integer) @default 14 */
  windowSize?: number;

  /** Significance threshold multiplier (finite, > 0) @default 1.2 */
  significanceMultiplier?: number;

  /**
   * Last date of the analysis window (YYYY-MM-DD, inclusive).
   * Bars after it are ignored. Defaults to the date of the last bar.
   */
  endDate?: string;

  /** Ticker carried through to the result */
  symbol?: string;
}
