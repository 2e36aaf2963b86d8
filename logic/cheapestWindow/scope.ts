import { DateTime } from 'luxon';

import type { Outcome, PriceSeries } from '../prices/types';
import type { SearchBounds, SearchScope } from './types';
import { minMaxBounds, priceAt } from '../prices/priceSeries';
import { ceilToHour, floorToHour, MILLISECONDS_PER_HOUR } from '../utils/dateUtils';

export const TONIGHT_START_HOUR = 22;
export const TONIGHT_END_HOUR = 6;

/**
 * Start of the interval the instant falls into.
 * Falls back to the top of the hour when the instant is not covered by the series.
 */
function currentIntervalStart(series: PriceSeries, now: number): number {
  return priceAt(series, now)?.start ?? floorToHour(now);
}

/**
 * First interval boundary at or after the instant.
 * Falls back to the next full hour when the instant is not covered by the series.
 */
function nextIntervalBoundary(series: PriceSeries, now: number): number {
  const covering = priceAt(series, now);
  if (covering === undefined) {
    return ceilToHour(now);
  }
  return covering.start === now ? now : covering.end;
}

/**
 * Bounds of "tonight" in the given time zone (22:00 until 06:00 the next morning).
 * - Between 06:00 and 22:00: the coming night
 * - After 22:00: from the next interval boundary until 06:00 tomorrow
 * - Before 06:00: the night in progress, until 06:00 today
 */
function tonightBounds(series: PriceSeries, now: number, timeZone: string): SearchBounds {
  const local = DateTime.fromMillis(now, { zone: timeZone });
  const evening = local.set({ hour: TONIGHT_START_HOUR, minute: 0, second: 0, millisecond: 0 });
  const morning = local.set({ hour: TONIGHT_END_HOUR, minute: 0, second: 0, millisecond: 0 });

  if (now < morning.toMillis()) {
    return { start: nextIntervalBoundary(series, now), end: morning.toMillis() };
  }
  if (now >= evening.toMillis()) {
    return { start: nextIntervalBoundary(series, now), end: morning.plus({ days: 1 }).toMillis() };
  }
  return { start: evening.toMillis(), end: morning.plus({ days: 1 }).toMillis() };
}

/**
 * Unclipped bounds of a scope
 * @param scope - Selected scope
 * @param series - Price series used to find interval boundaries
 * @param now - Current timestamp in milliseconds
 * @param timeZone - IANA time zone for local day boundaries
 * @returns Search bounds before clipping to the series
 */
export function scopeBounds(scope: SearchScope, series: PriceSeries, now: number, timeZone: string): SearchBounds {
  switch (scope.type) {
    case 'tonight':
      return tonightBounds(series, now, timeZone);
    case 'nextHours': {
      return { start: currentIntervalStart(series, now), end: now + scope.hours * MILLISECONDS_PER_HOUR };
    }
    case 'custom':
      return { start: scope.start, end: scope.end };
  }
}

/**
 * Resolve the admissible search range for a scope and check it can hold the window.
 * @param scope - Selected scope
 * @param series - Price series to clip against
 * @param durationMs - Requested window length
 * @param now - Current timestamp in milliseconds
 * @param timeZone - IANA time zone for local day boundaries
 * @returns Clipped bounds, `EmptyResult` for an empty series, or `InsufficientRange`
 */
export function resolveSearchBounds(
  scope: SearchScope,
  series: PriceSeries,
  durationMs: number,
  now: number,
  timeZone: string,
): Outcome<SearchBounds> {
  const available = minMaxBounds(series);
  if (available === undefined) {
    return { ok: false, failure: { kind: 'EmptyResult', reason: 'No prices to search' } };
  }

  const requested = scopeBounds(scope, series, now, timeZone);
  const start = Math.max(requested.start, available.start);
  const end = Math.min(requested.end, available.end);
  const availableMs = Math.max(0, end - start);

  if (availableMs < durationMs) {
    return { ok: false, failure: { kind: 'InsufficientRange', requiredMs: durationMs, availableMs } };
  }

  return { ok: true, value: { start, end } };
}

/**
 * Parse a scope written as `tonight`, `next<N>h` or `custom:<from>/<to>`.
 * Custom bounds are ISO 8601; bounds without an offset are read in `timeZone`.
 * @param text - Scope text
 * @param timeZone - IANA time zone for bounds without an offset
 * @returns Parsed scope, undefined when the text is not understood
 */
export function parseScope(text: string, timeZone: string): SearchScope | undefined {
  const value = text.trim().toLowerCase();
  if (value === 'tonight') {
    return { type: 'tonight' };
  }

  const next = /^next(\d+(?:\.\d+)?)h$/.exec(value);
  if (next) {
    const hours = Number(next[1]);
    return hours > 0 ? { type: 'nextHours', hours } : undefined;
  }

  if (value.startsWith('custom:')) {
    const [from, to] = text.trim().slice('custom:'.length).split('/');
    if (from === undefined || to === undefined) {
      return undefined;
    }
    const start = DateTime.fromISO(from, { zone: timeZone });
    const end = DateTime.fromISO(to, { zone: timeZone });
    if (!start.isValid || !end.isValid || end.toMillis() <= start.toMillis()) {
      return undefined;
    }
    return { type: 'custom', start: start.toMillis(), end: end.toMillis() };
  }

  return undefined;
}
