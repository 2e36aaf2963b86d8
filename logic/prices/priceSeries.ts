import type { Outcome, PricePoint, PriceSeries, RawPricePoint } from './types';
import { floorToHour, MILLISECONDS_PER_SECOND } from '../utils/dateUtils';

/**
 * Build an immutable series from already validated points.
 * Min and max are taken over the effective prices.
 * @param points - Chronologically ordered price points
 * @param vatMultiplier - Multiplier already applied to `price`
 * @returns Frozen price series
 */
export function createPriceSeries(points: ReadonlyArray<PricePoint>, vatMultiplier: number = 1): PriceSeries {
  let minPrice: number | undefined;
  let maxPrice: number | undefined;
  for (const point of points) {
    if (minPrice === undefined || point.price < minPrice) {
      minPrice = point.price;
    }
    if (maxPrice === undefined || point.price > maxPrice) {
      maxPrice = point.price;
    }
  }

  return Object.freeze({
    points: Object.freeze(points.map((p) => Object.freeze({ ...p }))),
    minPrice: minPrice ?? 0,
    maxPrice: maxPrice ?? 0,
    vatMultiplier,
  });
}

/**
 * Validate raw feed records and build the series of current and future points.
 * - Every record must have finite numbers and end after it starts
 * - Records must be strictly ordered by start and must not overlap (gaps are fine)
 * - Records starting before the current hour are dropped
 * @param rawPoints - Records as delivered by the price feed
 * @param now - Current timestamp in milliseconds
 * @returns The series, or `MalformedData` / `EmptyResult`
 */
export function buildPriceSeries(rawPoints: ReadonlyArray<RawPricePoint>, now: number): Outcome<PriceSeries> {
  const points: Array<PricePoint> = [];

  for (let i = 0; i < rawPoints.length; i++) {
    const raw = rawPoints[i];
    if (!Number.isFinite(raw.startTimestamp) || !Number.isFinite(raw.endTimestamp) || !Number.isFinite(raw.marketprice)) {
      return { ok: false, failure: { kind: 'MalformedData', reason: `Price point ${i} contains a non-numeric value` } };
    }

    const start = raw.startTimestamp * MILLISECONDS_PER_SECOND;
    const end = raw.endTimestamp * MILLISECONDS_PER_SECOND;
    if (end <= start) {
      return { ok: false, failure: { kind: 'MalformedData', reason: `Price point ${i} does not end after it starts` } };
    }

    const previous = points[points.length - 1];
    if (previous !== undefined) {
      if (start <= previous.start) {
        return { ok: false, failure: { kind: 'MalformedData', reason: `Price point ${i} is not in chronological order` } };
      }
      if (start < previous.end) {
        return { ok: false, failure: { kind: 'MalformedData', reason: `Price point ${i} overlaps the previous point` } };
      }
    }

    points.push({ start, end, rawPrice: raw.marketprice, price: raw.marketprice });
  }

  const currentHour = floorToHour(now);
  const retained = points.filter((p) => p.start >= currentHour);
  if (retained.length === 0) {
    return { ok: false, failure: { kind: 'EmptyResult', reason: 'No current or future prices available' } };
  }

  return { ok: true, value: createPriceSeries(retained) };
}

/**
 * Earliest start and latest end of the series
 * @param series - Price series
 * @returns Bounds, or undefined for an empty series
 */
export function minMaxBounds(series: PriceSeries): { start: number; end: number } | undefined {
  const first = series.points[0];
  const last = series.points[series.points.length - 1];
  if (first === undefined || last === undefined) {
    return undefined;
  }
  return { start: first.start, end: last.end };
}

/**
 * Find the point covering an instant
 * @param series - Price series
 * @param instant - Timestamp in milliseconds
 * @returns The point whose [start, end) contains the instant, undefined in a gap or outside the series
 */
export function priceAt(series: PriceSeries, instant: number): PricePoint | undefined {
  return series.points.find((p) => p.start <= instant && instant < p.end);
}

/**
 * Restrict a series to the points lying completely inside [from, to)
 * @param series - Price series
 * @param from - Range start in milliseconds
 * @param to - Range end in milliseconds
 * @returns New series with the same VAT multiplier
 */
export function sliceSeries(series: PriceSeries, from: number, to: number): PriceSeries {
  return createPriceSeries(
    series.points.filter((p) => p.start >= from && p.end <= to),
    series.vatMultiplier,
  );
}
