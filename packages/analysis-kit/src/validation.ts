/**
 * Series validation
 * Rejects empty series, malformed bars and broken date ordering before any computation runs
 */

import { EmptyInputError, MalformedBarError } from '@levelscope/contracts';
import type { DailyBar } from './types.js';
import { isCalendarDate } from './dates.js';

/**
 * Tolerance for the open/close checks only; high >= low is checked exactly so a true range is never negative
 */
const PRICE_EPSILON = 1e-9;

/**
 * Validate that bar OHLCV values are consistent
 *
 * @param bar - Price bar to validate
 * @param index - Index in array (for error messages)
 * @throws MalformedBarError if bar has invalid OHLC relationships
 */
function validateBarPrices(bar: DailyBar, index: number): void {
  if (!isCalendarDate(bar.date)) {
    throw new MalformedBarError(`Invalid bar[${index}]: date (${bar.date}) is not YYYY-MM-DD`, {
      index,
      date: bar.date,
      reason: 'invalid_date',
    });
  }

  // Check for NaN, Infinity and non-positive prices
  const prices = [bar.open, bar.high, bar.low, bar.close];
  for (const price of prices) {
    if (!Number.isFinite(price) || price <= 0) {
      throw new MalformedBarError(`Invalid price at bar[${index}]: ${price}`, {
        index,
        date: bar.date,
        reason: 'invalid_price',
      });
    }
  }

  if (!Number.isInteger(bar.volume) || bar.volume < 0) {
    throw new MalformedBarError(`Invalid volume at bar[${index}]: ${bar.volume}`, {
      index,
      date: bar.date,
      reason: 'invalid_volume',
    });
  }

  if (bar.high < bar.low) {
    throw new MalformedBarError(
      `Invalid bar[${index}]: high (${bar.high}) must be >= low (${bar.low})`,
      { index, date: bar.date, reason: 'high_below_low' }
    );
  }

  // High must be >= open, close
  if (bar.high < bar.open - PRICE_EPSILON || bar.high < bar.close - PRICE_EPSILON) {
    throw new MalformedBarError(
      `Invalid bar[${index}]: high (${bar.high}) must be >= open (${bar.open}) and close (${bar.close})`,
      { index, date: bar.date, reason: 'high_below_open_or_close' }
    );
  }

  // Low must be <= open, close
  if (bar.low > bar.open + PRICE_EPSILON || bar.low > bar.close + PRICE_EPSILON) {
    throw new MalformedBarError(
      `Invalid bar[${index}]: low (${bar.low}) must be <= open (${bar.open}) and close (${bar.close})`,
      { index, date: bar.date, reason: 'low_above_open_or_close' }
    );
  }
}

/**
 * Validate a daily series before analysis.
 *
 * **Checks:**
 * - At least one bar
 * - Every bar: calendar date, finite positive prices, non-negative integer volume,
 *   high >= low, high >= open/close, low <= open/close
 * - Dates strictly increasing (no duplicates, no reordering)
 *
 * @param bars - Series ordered ascending by date
 * @throws EmptyInputError if the series has zero bars
 * @throws MalformedBarError for the first bar that breaks an invariant
 */
export function validateSeries(bars: readonly DailyBar[]): void {
  if (bars.length === 0) {
    throw new EmptyInputError('Series contains no bars');
  }

  bars.forEach((bar, i) => validateBarPrices(bar, i));

  for (let i = 1; i < bars.length; i++) {
    const prev = bars[i - 1];
    const curr = bars[i];

    if (!prev || !curr) {
      throw new MalformedBarError(`Invalid bar data: missing bar at index ${prev ? i : i - 1}`, {
        index: prev ? i : i - 1,
        reason: 'missing_bar',
      });
    }

    if (curr.date <= prev.date) {
      throw new MalformedBarError(
        `Bars must be in chronological order: bar[${i}].date (${curr.date}) ` +
          `<= bar[${i - 1}].date (${prev.date})`,
        { index: i, date: curr.date, reason: 'out_of_order' }
      );
    }
  }
}
