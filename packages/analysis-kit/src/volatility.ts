/**
 * Volatility Estimator
 * Per-bar true range and a simple trailing average true range
 */

import { InsufficientDataError, InvalidParameterError } from '@levelscope/contracts';
import type { DailyBar, VolatilityBar } from './types.js';
import { DEFAULT_ATR_WINDOW } from './types.js';
import { validateSeries } from './validation.js';

/**
 * Throw InvalidParameterError unless windowSize is a positive integer
 */
export function assertWindowSize(windowSize: number): void {
  if (!Number.isInteger(windowSize) || windowSize < 1) {
    throw new InvalidParameterError('windowSize must be a positive integer', {
      parameter: 'windowSize',
      value: windowSize,
    });
  }
}

/**
 * True range of a single bar.
 *
 * With a previous close: max(high - low, |high - prevClose|, |low - prevClose|).
 * Without one (the first bar of a series): high - low.
 *
 * @param bar - Bar to measure
 * @param previousClose - Close of the bar before, if any
 *
 * @example
 * ```typescript
 * computeTrueRange({ date: '2025-01-03', open: 104, high: 106, low: 103, close: 105, volume: 0 }, 100);
 * // 6 (gap up: high - previous close)
 * ```
 */
export function computeTrueRange(bar: DailyBar, previousClose?: number): number {
  const span = bar.high - bar.low;

  if (previousClose === undefined) {
    return span;
  }

  return Math.max(span, Math.abs(bar.high - previousClose), Math.abs(bar.low - previousClose));
}

/**
 * True range for every bar, each measured against the close of the bar before it
 */
export function computeTrueRanges(bars: readonly DailyBar[]): number[] {
  return bars.map((bar, i) => computeTrueRange(bar, i > 0 ? bars[i - 1]?.close : undefined));
}

/**
 * Simple trailing average of true range.
 *
 * Index i (i >= windowSize - 1) is the arithmetic mean of trueRanges[i - windowSize + 1 .. i].
 * Each index is summed on its own rather than by a running total, so every value
 * can be checked against its definition. Earlier indices are null.
 *
 * @param trueRanges - True range per bar
 * @param windowSize - Number of bars averaged
 */
export function computeAverageTrueRanges(
  trueRanges: readonly number[],
  windowSize: number
): Array<number | null> {
  assertWindowSize(windowSize);

  return trueRanges.map((_, i) => {
    if (i < windowSize - 1) {
      return null;
    }

    let sum = 0;
    for (let j = i - windowSize + 1; j <= i; j++) {
      sum += trueRanges[j] ?? 0;
    }
    return sum / windowSize;
  });
}

/**
 * Run the Volatility Estimator over a series.
 *
 * Every bar gets a trueRange; averageTrueRange is set from index windowSize - 1 onward
 * and is null before that.
 *
 * @param bars - Series ordered ascending by date
 * @param windowSize - Rolling window (default 14)
 * @returns One VolatilityBar per input bar, in the same order
 * @throws InvalidParameterError if windowSize is not a positive integer
 * @throws EmptyInputError / MalformedBarError if the series is invalid
 * @throws InsufficientDataError if the series has fewer than windowSize bars
 */
export function estimateVolatility(
  bars: readonly DailyBar[],
  windowSize: number = DEFAULT_ATR_WINDOW
): VolatilityBar[] {
  assertWindowSize(windowSize);
  validateSeries(bars);

  if (bars.length < windowSize) {
    throw new InsufficientDataError(
      `Need at least ${windowSize} bars for a ${windowSize}-bar average true range, got ${bars.length}`,
      { required: windowSize, received: bars.length }
    );
  }

  const trueRanges = computeTrueRanges(bars);
  const averages = computeAverageTrueRanges(trueRanges, windowSize);

  return bars.map((bar, i) => ({
    date: bar.date,
    open: bar.open,
    high: bar.high,
    low: bar.low,
    close: bar.close,
    volume: bar.volume,
    trueRange: trueRanges[i] ?? 0,
    averageTrueRange: averages[i] ?? null,
  }));
}
