/**
 * Time-of-day helper functions
 */

import { TIME_CONSTANTS } from '@utils/constants';

const TIME_OF_DAY_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;

/**
 * Parse a local "HH:MM" time into minutes after midnight
 * @param text - Time string, 24h clock
 * @returns Minutes after midnight, or null when malformed
 */
export function parseTimeOfDay(text: string): number | null {
  const match = TIME_OF_DAY_PATTERN.exec(text);
  if (!match) {
    return null;
  }
  return parseInt(match[1], 10) * 60 + parseInt(match[2], 10);
}

/**
 * Minutes after local midnight for a timestamp
 * @param timestampMs - Epoch milliseconds
 * @returns Minute of day (0-1439)
 */
export function minuteOfDay(timestampMs: number): number {
  const date = new Date(timestampMs);
  return date.getHours() * 60 + date.getMinutes();
}

/**
 * Check whether a minute of day falls inside [from, to)
 *
 * A window whose end is before its start wraps midnight,
 * e.g. 22:00-06:00 covers 23:00 and 05:59 but not 06:00.
 *
 * @param minute - Minute of day to test
 * @param fromMinute - Window start (inclusive)
 * @param toMinute - Window end (exclusive)
 * @returns True if inside the window
 */
export function isWithinWindow(minute: number, fromMinute: number, toMinute: number): boolean {
  const m = ((minute % TIME_CONSTANTS.MINUTES_PER_DAY) + TIME_CONSTANTS.MINUTES_PER_DAY) % TIME_CONSTANTS.MINUTES_PER_DAY;

  if (fromMinute === toMinute) {
    return false;
  }

  if (fromMinute < toMinute) {
    return m >= fromMinute && m < toMinute;
  }

  return m >= fromMinute || m < toMinute;
}
