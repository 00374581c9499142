/**
 * Significance Classifier
 */

import { InvalidParameterError } from '@levelscope/contracts';
import type { AnnotatedBar, VolatilityBar } from './types.js';
import { DEFAULT_SIGNIFICANCE_MULTIPLIER } from './types.js';

/**
 * Throw InvalidParameterError unless the multiplier is a finite number above zero
 */
export function assertSignificanceMultiplier(multiplier: number): void {
  if (!Number.isFinite(multiplier) || multiplier <= 0) {
    throw new InvalidParameterError('significanceMultiplier must be a finite number > 0', {
      parameter: 'significanceMultiplier',
      value: multiplier,
    });
  }
}

/**
 * Strict threshold test: a true range exactly at multiplier * ATR is not significant.
 */
export function isSignificantRange(
  trueRange: number,
  averageTrueRange: number,
  multiplier: number
): boolean {
  return trueRange > multiplier * averageTrueRange;
}

/**
 * Mark each bar as significant or not.
 *
 * Bars still in the ATR warm-up (averageTrueRange null) are left unclassified
 * (isSignificant null) and can never produce a level.
 *
 * @param bars - Output of the Volatility Estimator
 * @param multiplier - Threshold multiple of the ATR (default 1.2)
 * @returns New AnnotatedBar objects; the input is not modified
 */
export function classifySignificance(
  bars: readonly VolatilityBar[],
  multiplier: number = DEFAULT_SIGNIFICANCE_MULTIPLIER
): AnnotatedBar[] {
  assertSignificanceMultiplier(multiplier);

  return bars.map((bar) => ({
    ...bar,
    isSignificant:
      bar.averageTrueRange === null
        ? null
        : isSignificantRange(bar.trueRange, bar.averageTrueRange, multiplier),
  }));
}
