/**
 * Level Scanner
 *
 * Finds significant bars whose extremes were never exceeded by any later bar
 * up to the end of the analysis window.
 */

import type { AnnotatedBar, Level, PartitionedLevels } from './types.js';
import { assertCalendarDate } from './dates.js';

/**
 * Scan significant bars for unbroken resistance and support levels.
 *
 * Only bars dated on or before `endDate` take part, both as candidates and as the
 * later bars that could break a level. A candidate's high is unbroken resistance when
 * no later bar has a strictly higher high; its low is unbroken support when no later
 * bar has a strictly lower low. Touching the level does not break it.
 *
 * The suffix extremes are computed once, so the scan is linear in the number of bars.
 *
 * @param bars - Annotated series ordered ascending by date
 * @param endDate - Inclusive end of the analysis window (YYYY-MM-DD)
 * @returns Levels in origin-date order; resistance before support for the same bar
 *
 * @example
 * ```typescript
 * const levels = scanUnbrokenLevels(classified, '2025-03-31');
 * const { resistance, support } = partitionLevels(levels);
 * ```
 */
export function scanUnbrokenLevels(bars: readonly AnnotatedBar[], endDate: string): Level[] {
  assertCalendarDate(endDate, 'endDate');

  const inWindow = bars.filter((bar) => bar.date <= endDate);
  const n = inWindow.length;

  // suffixMaxHigh[i] / suffixMinLow[i] cover inWindow[i..n-1]
  const suffixMaxHigh = new Array<number>(n);
  const suffixMinLow = new Array<number>(n);
  let maxHigh = Number.NEGATIVE_INFINITY;
  let minLow = Number.POSITIVE_INFINITY;

  for (let i = n - 1; i >= 0; i--) {
    const bar = inWindow[i];
    if (!bar) continue;
    maxHigh = Math.max(maxHigh, bar.high);
    minLow = Math.min(minLow, bar.low);
    suffixMaxHigh[i] = maxHigh;
    suffixMinLow[i] = minLow;
  }

  const levels: Level[] = [];

  for (let i = 0; i < n; i++) {
    const bar = inWindow[i];
    if (!bar || bar.isSignificant !== true) continue;

    const isLast = i === n - 1;
    const laterMaxHigh = suffixMaxHigh[i + 1] ?? Number.NEGATIVE_INFINITY;
    const laterMinLow = suffixMinLow[i + 1] ?? Number.POSITIVE_INFINITY;

    if (isLast || laterMaxHigh <= bar.high) {
      levels.push({ originDate: bar.date, price: bar.high, kind: 'resistance' });
    }

    if (isLast || laterMinLow >= bar.low) {
      levels.push({ originDate: bar.date, price: bar.low, kind: 'support' });
    }
  }

  return levels;
}

/**
 * Split levels by kind, keeping their original order within each group
 */
export function partitionLevels(levels: readonly Level[]): PartitionedLevels {
  return {
    resistance: levels.filter((level) => level.kind === 'resistance'),
    support: levels.filter((level) => level.kind === 'support'),
  };
}
