/**
 * @levelscope/analysis-kit
 *
 * Pure-function analytics for daily price series: true range, average true range,
 * significance classification and unbroken support/resistance levels.
 *
 * This package provides deterministic analytics functions with no I/O operations.
 * All functions are pure: same inputs always produce same outputs.
 *
 * @packageDocumentation
 */

// Export types
export type {
  DailyBar,
  AnnotatedBar,
  Level,
  LevelKind,
  PartitionedLevels,
  AnalysisWindow,
  AnalysisParameters,
  AnalysisResult,
  VolatilityBar,
  AnalysisOptions,
} from './types.js';

export {
  DEFAULT_ATR_WINDOW,
  DEFAULT_SIGNIFICANCE_MULTIPLIER,
  DEFAULT_LOOKBACK_DAYS,
} from './types.js';

// Series validation
export { validateSeries } from './validation.js';

// Volatility Estimator
export {
  computeTrueRange,
  computeTrueRanges,
  computeAverageTrueRanges,
  estimateVolatility,
  assertWindowSize,
} from './volatility.js';

// Significance Classifier
export {
  isSignificantRange,
  classifySignificance,
  assertSignificanceMultiplier,
} from './significance.js';

// Level Scanner
export { scanUnbrokenLevels, partitionLevels } from './levels.js';

// Pipeline
export { analyzeSeries } from './pipeline.js';

// Calendar helpers
export { resolveAnalysisWindow } from './window.js';
export { isCalendarDate, assertCalendarDate, addCalendarDays, toCalendarDate } from './dates.js';
