/**
 * Full analysis pipeline: validation → volatility → significance → levels
 */

import { EmptyInputError } from '@levelscope/contracts';
import type { AnalysisOptions, AnalysisResult, DailyBar } from './types.js';
import { DEFAULT_ATR_WINDOW, DEFAULT_SIGNIFICANCE_MULTIPLIER } from './types.js';
import { assertCalendarDate } from './dates.js';
import { assertWindowSize, estimateVolatility } from './volatility.js';
import { assertSignificanceMultiplier, classifySignificance } from './significance.js';
import { partitionLevels, scanUnbrokenLevels } from './levels.js';
import { validateSeries } from './validation.js';

/**
 * Analyze one daily series.
 *
 * Parameters are checked before the series, so a bad windowSize is reported even
 * for an empty input. Bars dated after `endDate` are dropped before the estimator
 * runs; if none remain the call fails with EmptyInputError.
 *
 * The result holds new objects only; the input array and its bars are not modified,
 * and repeated calls with the same input return equal results.
 *
 * @param bars - Series ordered ascending by date
 * @param options - Window size, multiplier, end date and symbol
 * @throws InvalidParameterError, EmptyInputError, MalformedBarError, InsufficientDataError
 *
 * @example
 * ```typescript
 * const result = analyzeSeries(bars, { symbol: 'AAPL', endDate: '2025-03-03' });
 * result.levels.resistance; // [{ originDate, price, kind: 'resistance' }, ...]
 * ```
 */
export function analyzeSeries(
  bars: readonly DailyBar[],
  options: AnalysisOptions = {}
): AnalysisResult {
  const windowSize = options.windowSize ?? DEFAULT_ATR_WINDOW;
  const significanceMultiplier = options.significanceMultiplier ?? DEFAULT_SIGNIFICANCE_MULTIPLIER;

  assertWindowSize(windowSize);
  assertSignificanceMultiplier(significanceMultiplier);
  if (options.endDate !== undefined) {
    assertCalendarDate(options.endDate, 'endDate');
  }

  validateSeries(bars);

  const lastBar = bars[bars.length - 1];
  const endDate = options.endDate ?? lastBar?.date;
  if (endDate === undefined) {
    throw new EmptyInputError('Series contains no bars');
  }

  const inWindow = bars.filter((bar) => bar.date <= endDate);
  const firstBar = inWindow[0];
  if (!firstBar) {
    throw new EmptyInputError(`No bars on or before ${endDate}`, { endDate });
  }

  const volatility = estimateVolatility(inWindow, windowSize);
  const annotated = classifySignificance(volatility, significanceMultiplier);
  const levels = scanUnbrokenLevels(annotated, endDate);

  const result: AnalysisResult = {
    window: { start: firstBar.date, end: endDate },
    parameters: { windowSize, significanceMultiplier },
    bars: annotated,
    significantBars: annotated.filter((bar) => bar.isSignificant === true),
    levels: partitionLevels(levels),
  };

  if (options.symbol !== undefined) {
    result.symbol = options.symbol;
  }

  return result;
}
