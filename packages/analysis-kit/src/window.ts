/**
 * Analysis window arithmetic
 */

import { InvalidParameterError } from '@levelscope/contracts';
import type { AnalysisWindow } from './types.js';
import { DEFAULT_LOOKBACK_DAYS } from './types.js';
import { addCalendarDays, assertCalendarDate } from './dates.js';

/**
 * Resolve the calendar window that ends on the selected date.
 *
 * The window spans `lookbackDays` calendar days before the selected date up to
 * and including the selected date itself. Weekends and holidays are not skipped;
 * the loader simply returns no bars for them.
 *
 * @param selectedDate - Last day of the window (YYYY-MM-DD)
 * @param lookbackDays - Calendar days of history (positive integer)
 * @throws InvalidParameterError if the date or lookback is invalid
 *
 * @example
 * ```typescript
 * resolveAnalysisWindow('2025-03-03');
 * // { start: '2025-01-02', end: '2025-03-03' }
 * ```
 */
export function resolveAnalysisWindow(
  selectedDate: string,
  lookbackDays: number = DEFAULT_LOOKBACK_DAYS
): AnalysisWindow {
  assertCalendarDate(selectedDate, 'selectedDate');

  if (!Number.isInteger(lookbackDays) || lookbackDays < 1) {
    throw new InvalidParameterError('lookbackDays must be a positive integer', {
      parameter: 'lookbackDays',
      value: lookbackDays,
    });
  }

  return {
    start: addCalendarDays(selectedDate, -lookbackDays),
    end: selectedDate,
  };
}
