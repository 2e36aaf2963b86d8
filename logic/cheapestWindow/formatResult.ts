import type { SearchFailure } from '../prices/types';
import type { SearchRequest, SearchResult, WindowCandidate } from './types';
import { MILLISECONDS_PER_HOUR, splitDuration } from '../utils/dateUtils';
import { normalizeNegativeZero, roundPrice } from '../utils/numberUtils';

/**
 * Package the winning window into a search result.
 * - Average price is the time-weighted mean over the window
 * - Energy cost is reported only when the request carries a power draw
 * @param candidate - Cheapest window found by the search
 * @param request - Request the window was found for
 * @returns Search result
 */
export function formatSearchResult(candidate: WindowCandidate, request: SearchRequest): SearchResult {
  const durationMs = candidate.end - candidate.start;
  const durationHours = durationMs / MILLISECONDS_PER_HOUR;

  const result: SearchResult = {
    windowStart: candidate.start,
    windowEnd: candidate.end,
    durationMs,
    duration: splitDuration(durationMs),
    totalCost: candidate.totalCost,
    averagePrice: normalizeNegativeZero(candidate.priceHours / durationHours),
  };

  if (request.mode === 'byEnergyAndPower') {
    result.power = request.power;
    result.energyAmount = request.energyAmount;
    result.energyCost = normalizeNegativeZero(candidate.priceHours * request.power);
  } else if (request.power !== undefined) {
    result.power = request.power;
    result.energyAmount = durationHours * request.power;
    result.energyCost = normalizeNegativeZero(candidate.priceHours * request.power);
  }

  return result;
}

/**
 * Format a price with two decimals.
 * Prices that round to zero from below are shown as "0.00".
 * @param value - Price in ct/kWh (or ct)
 * @returns Formatted number without unit
 */
export function formatPrice(value: number): string {
  return roundPrice(value).toFixed(2);
}

/**
 * Format a duration as whole hours and minutes (e.g. "2 h 30 min")
 * @param duration - Hours and minutes
 * @returns Formatted duration
 */
export function formatDuration(duration: { hours: number; minutes: number }): string {
  if (duration.hours === 0) {
    return `${duration.minutes} min`;
  }
  if (duration.minutes === 0) {
    return `${duration.hours} h`;
  }
  return `${duration.hours} h ${duration.minutes} min`;
}

/**
 * Format time for display.
 * - Uses locale and timezone
 * - Falls back to UTC format if locale/timezone is invalid
 * @param date - Date object to format
 * @param locale - Locale string (e.g., 'en-GB', 'de-DE')
 * @param timezone - Timezone string (e.g., 'Europe/Berlin', 'UTC')
 * @returns Formatted time string (e.g., "22:00")
 */
export function formatTime(date: Date, locale: string, timezone: string): string {
  try {
    return date.toLocaleString(locale, {
      timeZone: timezone,
      hour: '2-digit',
      minute: '2-digit',
      hourCycle: 'h23',
    });
  } catch (error: unknown) {
    // Invalid locale or time zone
    return date.toLocaleString('en-US', {
      timeZone: 'UTC',
      hour: '2-digit',
      minute: '2-digit',
      hourCycle: 'h23',
    });
  }
}

/**
 * Format the window of a result as a time range (e.g. "01:00–03:30")
 * @param result - Search result
 * @param locale - Locale string
 * @param timezone - Timezone string
 * @returns Formatted range
 */
export function formatWindow(result: SearchResult, locale: string, timezone: string): string {
  const start = formatTime(new Date(result.windowStart), locale, timezone);
  const end = formatTime(new Date(result.windowEnd), locale, timezone);
  return `${start}–${end}`;
}

/**
 * One-line summary of a result
 * @param result - Search result
 * @param locale - Locale string
 * @param timezone - Timezone string
 * @returns Summary such as "01:00–03:00 (2 h), average 4.50 ct/kWh"
 */
export function describeResult(result: SearchResult, locale: string, timezone: string): string {
  const base = `${formatWindow(result, locale, timezone)} (${formatDuration(result.duration)}), `
    + `average ${formatPrice(result.averagePrice)} ct/kWh`;
  if (result.energyCost === undefined) {
    return base;
  }
  return `${base}, total ${formatPrice(result.energyCost)} ct`;
}

/**
 * User-facing text for a failed search
 * @param failure - Failure returned by the planner
 * @returns Message text
 */
export function describeFailure(failure: SearchFailure): string {
  switch (failure.kind) {
    case 'InsufficientRange':
      return `A minimum time range of ${formatDuration(splitDuration(failure.requiredMs))} is required`;
    case 'EmptyResult':
      return `No result: ${failure.reason}`;
    case 'MalformedData':
      return `Price data could not be read: ${failure.reason}`;
  }
}
