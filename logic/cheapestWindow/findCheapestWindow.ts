import type { PricePoint, PriceSeries } from '../prices/types';
import type { SearchBounds, WindowCandidate } from './types';
import { MILLISECONDS_PER_HOUR } from '../utils/dateUtils';
import { normalizeNegativeZero } from '../utils/numberUtils';

/**
 * Candidate start instants for a window of the given length.
 * - Every point start inside [bounds.start, bounds.end - durationMs]
 * - The search start itself, even when it is not aligned to an interval
 * @param points - Chronologically ordered points
 * @param bounds - Admissible search range
 * @param durationMs - Window length in milliseconds
 * @returns Ascending, de-duplicated start instants
 */
function candidateStarts(points: ReadonlyArray<PricePoint>, bounds: SearchBounds, durationMs: number): Array<number> {
  const latestStart = bounds.end - durationMs;
  if (latestStart < bounds.start) {
    return [];
  }

  const starts = [bounds.start];
  for (const point of points) {
    if (point.start > bounds.start && point.start <= latestStart) {
      starts.push(point.start);
    }
  }
  return starts;
}

/**
 * Cost of the window [start, end).
 * Each touched interval contributes its price weighted by the share of the interval inside the window.
 * @param points - Chronologically ordered points
 * @param start - Window start in milliseconds
 * @param end - Window end in milliseconds
 * @returns Window costs, or undefined when part of the window has no price (gap or outside the series)
 */
export function evaluateWindow(
  points: ReadonlyArray<PricePoint>,
  start: number,
  end: number,
): { totalCost: number; priceHours: number } | undefined {
  let covered = 0;
  let totalCost = 0;
  let priceHours = 0;

  for (const point of points) {
    if (point.end <= start) {
      continue;
    }
    if (point.start >= end) {
      break;
    }
    const overlap = Math.min(point.end, end) - Math.max(point.start, start);
    covered += overlap;
    totalCost += point.price * (overlap / (point.end - point.start));
    priceHours += point.price * (overlap / MILLISECONDS_PER_HOUR);
  }

  if (covered < end - start) {
    return undefined;
  }

  return {
    totalCost: normalizeNegativeZero(totalCost),
    priceHours: normalizeNegativeZero(priceHours),
  };
}

/**
 * Find the cheapest contiguous window of exactly `durationMs` inside the bounds.
 * - Candidates crossing a gap in the series are skipped
 * - Costs are compared at full precision
 * - On equal cost the earliest start wins
 * @param series - Price series with effective prices
 * @param bounds - Admissible search range, already clipped to the series
 * @param durationMs - Window length in milliseconds
 * @returns The cheapest window, or undefined when no admissible window exists
 */
export function findCheapestWindow(
  series: PriceSeries,
  bounds: SearchBounds,
  durationMs: number,
): WindowCandidate | undefined {
  if (durationMs <= 0) {
    return undefined;
  }

  let best: WindowCandidate | undefined;

  for (const start of candidateStarts(series.points, bounds, durationMs)) {
    const end = start + durationMs;
    const cost = evaluateWindow(series.points, start, end);
    if (cost === undefined) {
      continue;
    }
    if (best === undefined || cost.totalCost < best.totalCost) {
      best = { start, end, ...cost };
    }
  }

  return best;
}
