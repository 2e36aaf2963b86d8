import type { Outcome, PriceSeries, RawPricePoint } from '../prices/types';
import type { Settings } from '../settings/settings';
import type { SearchRequest, SearchResult } from './types';
import { fixedClock, type Clock } from '../utils/dateUtils';
import { buildPriceSeries } from '../prices/priceSeries';
import { regionTimeZone } from '../prices/regions';
import { applyVat } from '../prices/vat';
import { findCheapestWindow } from './findCheapestWindow';
import { formatSearchResult } from './formatResult';
import { resolveSearchBounds } from './scope';
import { resolveDurationMs } from './searchRequest';

/**
 * Run the whole search for one request.
 * Applies VAT, resolves and clips the scope, searches, and formats the winner.
 * Never throws for data conditions; every failure comes back as an outcome.
 * @param series - Current price series (raw prices)
 * @param request - Search request
 * @param settings - Settings providing the region
 * @param clock - Source of "now"
 * @returns The result, `InsufficientRange`, or `EmptyResult` when no admissible window exists
 */
export function planCheapestWindow(
  series: PriceSeries,
  request: SearchRequest,
  settings: Pick<Settings, 'region'>,
  clock: Clock,
): Outcome<SearchResult> {
  const durationMs = resolveDurationMs(request);
  const adjusted = applyVat(series, request.vatEnabled, settings.region);

  const bounds = resolveSearchBounds(request.scope, adjusted, durationMs, clock.now(), regionTimeZone(settings.region));
  if (!bounds.ok) {
    return bounds;
  }

  const candidate = findCheapestWindow(adjusted, bounds.value, durationMs);
  if (candidate === undefined) {
    return { ok: false, failure: { kind: 'EmptyResult', reason: 'No window without missing prices fits the selected range' } };
  }

  return { ok: true, value: formatSearchResult(candidate, request) };
}

/**
 * Same as {@link planCheapestWindow}, starting from raw feed records
 * @param rawPoints - Records as delivered by the price feed
 * @param request - Search request
 * @param settings - Settings providing the region
 * @param clock - Source of "now"
 * @returns The result or the first failure met
 */
export function planCheapestWindowFromFeed(
  rawPoints: ReadonlyArray<RawPricePoint>,
  request: SearchRequest,
  settings: Pick<Settings, 'region'>,
  clock: Clock,
): Outcome<SearchResult> {
  // Filtering and scope resolution must see the same instant
  const now = clock.now();
  const series = buildPriceSeries(rawPoints, now);
  if (!series.ok) {
    return series;
  }
  return planCheapestWindow(series.value, request, settings, fixedClock(now));
}
