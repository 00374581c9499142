/**
 * Calendar date helpers for YYYY-MM-DD strings.
 * Dates are treated as UTC calendar days so arithmetic never crosses a DST boundary.
 */

import { InvalidParameterError } from '@levelscope/contracts';

const CALENDAR_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Check that a string is a real calendar date in YYYY-MM-DD form
 * ('2025-02-30' is rejected).
 */
export function isCalendarDate(value: string): boolean {
  if (!CALENDAR_DATE_PATTERN.test(value)) {
    return false;
  }

  const parsed = new Date(`${value}T00:00:00.000Z`);
  return !isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

/**
 * Throw InvalidParameterError unless the value is a calendar date
 *
 * @param parameter - Name reported in the error payload
 */
export function assertCalendarDate(value: string, parameter: string): void {
  if (!isCalendarDate(value)) {
    throw new InvalidParameterError(`${parameter} must be a YYYY-MM-DD calendar date`, {
      parameter,
      value,
    });
  }
}

/**
 * Shift a calendar date by a whole number of days (negative moves backwards)
 *
 * @example
 * ```typescript
 * addCalendarDays('2025-03-01', -1); // '2025-02-28'
 * ```
 */
export function addCalendarDays(date: string, days: number): string {
  const epochMs = Date.parse(`${date}T00:00:00.000Z`) + days * MS_PER_DAY;
  return new Date(epochMs).toISOString().slice(0, 10);
}

/**
 * Calendar date of a Date instance, in UTC
 */
export function toCalendarDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}
