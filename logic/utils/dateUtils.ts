/**
 * Date and Time Utilities
 *
 * Pure functions for date and time calculations.
 */

/**
 * Milliseconds in one hour
 */
export const MILLISECONDS_PER_HOUR = 60 * 60 * 1000;

/**
 * Milliseconds in one minute
 */
export const MILLISECONDS_PER_MINUTE = 60 * 1000;

/**
 * Milliseconds in one second
 */
export const MILLISECONDS_PER_SECOND = 1000;

/**
 * Source of the current time.
 * Passed into every call that depends on "now" so tests can pin it.
 */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

/**
 * Create a clock that always returns the same instant
 * @param timestamp - Unix timestamp in milliseconds
 * @returns Clock pinned to the timestamp
 */
export function fixedClock(timestamp: number): Clock {
  return { now: () => timestamp };
}

/**
 * Truncate a timestamp to the top of its hour
 * @param timestamp - Unix timestamp in milliseconds
 * @returns Timestamp of the hour boundary at or before the input
 */
export function floorToHour(timestamp: number): number {
  return Math.floor(timestamp / MILLISECONDS_PER_HOUR) * MILLISECONDS_PER_HOUR;
}

/**
 * Round a timestamp up to the next hour boundary (unchanged when already aligned)
 * @param timestamp - Unix timestamp in milliseconds
 * @returns Timestamp of the hour boundary at or after the input
 */
export function ceilToHour(timestamp: number): number {
  return Math.ceil(timestamp / MILLISECONDS_PER_HOUR) * MILLISECONDS_PER_HOUR;
}

/**
 * Convert hours (possibly fractional) to whole milliseconds
 * @param hours - Number of hours
 * @returns Milliseconds, rounded to the nearest millisecond
 */
export function hoursToMilliseconds(hours: number): number {
  return Math.round(hours * MILLISECONDS_PER_HOUR);
}

/**
 * Split a duration into whole hours and remaining minutes.
 * Minutes are rounded; 60 rounded minutes carry into the hour count.
 * @param durationMs - Duration in milliseconds
 * @returns Object with hours and minutes
 */
export function splitDuration(durationMs: number): { hours: number; minutes: number } {
  let hours = Math.floor(durationMs / MILLISECONDS_PER_HOUR);
  let minutes = Math.round((durationMs - hours * MILLISECONDS_PER_HOUR) / MILLISECONDS_PER_MINUTE);
  if (minutes === 60) {
    hours += 1;
    minutes = 0;
  }
  return { hours, minutes };
}
