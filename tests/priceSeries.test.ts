import type { RawPricePoint } from '../logic/prices/types';
import {
  buildPriceSeries,
  createPriceSeries,
  minMaxBounds,
  priceAt,
  sliceSeries,
} from '../logic/prices/priceSeries';

const HOUR = 60 * 60 * 1000;
// 2026-03-10T00:00:00Z
const T0 = Date.UTC(2026, 2, 10, 0, 0, 0);

function hourlyRaw(startMs: number, prices: Array<number>): Array<RawPricePoint> {
  return prices.map((marketprice, i) => ({
    startTimestamp: (startMs + i * HOUR) / 1000,
    endTimestamp: (startMs + (i + 1) * HOUR) / 1000,
    marketprice,
  }));
}

describe('buildPriceSeries', () => {
  test('converts timestamps to milliseconds and keeps raw prices', () => {
    const outcome = buildPriceSeries(hourlyRaw(T0, [4.5, -1.2, 7]), T0);

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.value.points).toEqual([
      { start: T0, end: T0 + HOUR, rawPrice: 4.5, price: 4.5 },
      { start: T0 + HOUR, end: T0 + 2 * HOUR, rawPrice: -1.2, price: -1.2 },
      { start: T0 + 2 * HOUR, end: T0 + 3 * HOUR, rawPrice: 7, price: 7 },
    ]);
    expect(outcome.value.minPrice).toBe(-1.2);
    expect(outcome.value.maxPrice).toBe(7);
    expect(outcome.value.vatMultiplier).toBe(1);
  });

  test('drops points starting before the current hour', () => {
    const now = T0 + 2 * HOUR + 30 * 60 * 1000;
    const outcome = buildPriceSeries(hourlyRaw(T0, [1, 2, 9, 4, 5]), now);

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.value.points.map((p) => p.start)).toEqual([T0 + 2 * HOUR, T0 + 3 * HOUR, T0 + 4 * HOUR]);
    // Past prices do not count towards min and max
    expect(outcome.value.minPrice).toBe(4);
    expect(outcome.value.maxPrice).toBe(9);
  });

  test('keeps the point starting exactly at the current hour', () => {
    const outcome = buildPriceSeries(hourlyRaw(T0, [1, 2]), T0 + HOUR);

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.value.points).toHaveLength(1);
    expect(outcome.value.points[0].start).toBe(T0 + HOUR);
  });

  test('returns EmptyResult when every point is in the past', () => {
    const outcome = buildPriceSeries(hourlyRaw(T0, [1, 2]), T0 + 5 * HOUR);

    expect(outcome).toEqual({
      ok: false,
      failure: { kind: 'EmptyResult', reason: 'No current or future prices available' },
    });
  });

  test('returns EmptyResult for an empty feed', () => {
    const outcome = buildPriceSeries([], T0);
    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.failure.kind).toBe('EmptyResult');
  });

  test('accepts gaps between points', () => {
    const raw = [...hourlyRaw(T0, [1]), ...hourlyRaw(T0 + 3 * HOUR, [2])];
    const outcome = buildPriceSeries(raw, T0);

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.value.points).toHaveLength(2);
  });

  describe('malformed data', () => {
    test('rejects points out of chronological order', () => {
      const raw = [...hourlyRaw(T0 + HOUR, [1]), ...hourlyRaw(T0, [2])];
      expect(buildPriceSeries(raw, T0)).toEqual({
        ok: false,
        failure: { kind: 'MalformedData', reason: 'Price point 1 is not in chronological order' },
      });
    });

    test('rejects duplicate start times', () => {
      const raw = [...hourlyRaw(T0, [1]), ...hourlyRaw(T0, [2])];
      const outcome = buildPriceSeries(raw, T0);
      expect(outcome.ok).toBe(false);
      if (outcome.ok) return;
      expect(outcome.failure.kind).toBe('MalformedData');
    });

    test('rejects overlapping points', () => {
      const raw: Array<RawPricePoint> = [
        { startTimestamp: T0 / 1000, endTimestamp: T0 / 1000 + 7200, marketprice: 1 },
        { startTimestamp: T0 / 1000 + 3600, endTimestamp: T0 / 1000 + 10800, marketprice: 2 },
      ];
      expect(buildPriceSeries(raw, T0)).toEqual({
        ok: false,
        failure: { kind: 'MalformedData', reason: 'Price point 1 overlaps the previous point' },
      });
    });

    test('rejects a point that does not end after it starts', () => {
      const raw: Array<RawPricePoint> = [{ startTimestamp: T0 / 1000, endTimestamp: T0 / 1000, marketprice: 1 }];
      expect(buildPriceSeries(raw, T0)).toEqual({
        ok: false,
        failure: { kind: 'MalformedData', reason: 'Price point 0 does not end after it starts' },
      });
    });

    test('rejects non-numeric prices', () => {
      const raw: Array<RawPricePoint> = [{ startTimestamp: T0 / 1000, endTimestamp: T0 / 1000 + 3600, marketprice: NaN }];
      expect(buildPriceSeries(raw, T0)).toEqual({
        ok: false,
        failure: { kind: 'MalformedData', reason: 'Price point 0 contains a non-numeric value' },
      });
    });

    test('validates past points too', () => {
      const raw = [...hourlyRaw(T0 + HOUR, [1]), ...hourlyRaw(T0, [2]), ...hourlyRaw(T0 + 5 * HOUR, [3])];
      const outcome = buildPriceSeries(raw, T0 + 5 * HOUR);
      expect(outcome.ok).toBe(false);
      if (outcome.ok) return;
      expect(outcome.failure.kind).toBe('MalformedData');
    });
  });

  test('returns a frozen snapshot', () => {
    const outcome = buildPriceSeries(hourlyRaw(T0, [1, 2]), T0);
    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(Object.isFrozen(outcome.value)).toBe(true);
    expect(Object.isFrozen(outcome.value.points)).toBe(true);
    expect(Object.isFrozen(outcome.value.points[0])).toBe(true);
  });
});

describe('series queries', () => {
  const series = createPriceSeries([
    { start: T0, end: T0 + HOUR, rawPrice: 3, price: 3 },
    { start: T0 + HOUR, end: T0 + 2 * HOUR, rawPrice: 5, price: 5 },
    // gap from T0 + 2h to T0 + 3h
    { start: T0 + 3 * HOUR, end: T0 + 4 * HOUR, rawPrice: 1, price: 1 },
  ]);

  test('minMaxBounds returns earliest start and latest end', () => {
    expect(minMaxBounds(series)).toEqual({ start: T0, end: T0 + 4 * HOUR });
  });

  test('minMaxBounds returns undefined for an empty series', () => {
    expect(minMaxBounds(createPriceSeries([]))).toBeUndefined();
  });

  test('createPriceSeries reports zero min and max for an empty series', () => {
    const empty = createPriceSeries([]);
    expect(empty.minPrice).toBe(0);
    expect(empty.maxPrice).toBe(0);
  });

  test('priceAt finds the covering point', () => {
    expect(priceAt(series, T0)?.price).toBe(3);
    expect(priceAt(series, T0 + HOUR + 59 * 60 * 1000)?.price).toBe(5);
  });

  test('priceAt treats the end of a point as exclusive', () => {
    expect(priceAt(series, T0 + HOUR)?.price).toBe(5);
    expect(priceAt(series, T0 + 4 * HOUR)).toBeUndefined();
  });

  test('priceAt returns undefined in a gap or before the series', () => {
    expect(priceAt(series, T0 + 2 * HOUR + 1)).toBeUndefined();
    expect(priceAt(series, T0 - 1)).toBeUndefined();
  });

  test('sliceSeries keeps only points fully inside the range', () => {
    const sliced = sliceSeries(series, T0 + 30 * 60 * 1000, T0 + 4 * HOUR);
    expect(sliced.points.map((p) => p.price)).toEqual([5, 1]);
    expect(sliced.minPrice).toBe(1);
    expect(sliced.maxPrice).toBe(5);
  });
});
