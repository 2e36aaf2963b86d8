import type { SearchResult } from '../logic/cheapestWindow/types';
import {
  describeFailure,
  describeResult,
  formatDuration,
  formatPrice,
  formatSearchResult,
  formatTime,
  formatWindow,
} from '../logic/cheapestWindow/formatResult';

const HOUR = 60 * 60 * 1000;
const MINUTE = 60 * 1000;
// 01:00 in Berlin
const T0 = Date.UTC(2026, 2, 10, 0, 0, 0);
const scope = { type: 'nextHours', hours: 12 } as const;

describe('formatSearchResult', () => {
  const candidate = { start: T0, end: T0 + 2 * HOUR + 30 * MINUTE, totalCost: 10, priceHours: 10 };

  test('adds average price and duration breakdown', () => {
    const result = formatSearchResult(candidate, { mode: 'byDuration', durationMs: 150 * MINUTE, scope, vatEnabled: false });

    expect(result).toEqual({
      windowStart: T0,
      windowEnd: T0 + 150 * MINUTE,
      durationMs: 150 * MINUTE,
      duration: { hours: 2, minutes: 30 },
      totalCost: 10,
      averagePrice: 4,
    });
  });

  test('reports the energy cost for an energy request', () => {
    const result = formatSearchResult(candidate, {
      mode: 'byEnergyAndPower',
      energyAmount: 5,
      power: 2,
      scope,
      vatEnabled: false,
    });

    expect(result.power).toBe(2);
    expect(result.energyAmount).toBe(5);
    expect(result.energyCost).toBe(20);
    expect(result.averagePrice).toBe(4);
  });

  test('derives energy amount and cost when a duration request carries a power', () => {
    const result = formatSearchResult(candidate, {
      mode: 'byDuration',
      durationMs: 150 * MINUTE,
      power: 11,
      scope,
      vatEnabled: false,
    });

    expect(result.energyAmount).toBe(27.5);
    expect(result.energyCost).toBe(110);
  });
});

describe('formatPrice', () => {
  test('rounds to two decimals', () => {
    expect(formatPrice(4.567)).toBe('4.57');
    expect(formatPrice(0)).toBe('0.00');
    expect(formatPrice(-1.234)).toBe('-1.23');
  });

  test('never shows negative zero', () => {
    expect(formatPrice(-0.001)).toBe('0.00');
    expect(formatPrice(-0)).toBe('0.00');
  });
});

describe('formatDuration', () => {
  test('formats hours and minutes', () => {
    expect(formatDuration({ hours: 0, minutes: 45 })).toBe('45 min');
    expect(formatDuration({ hours: 2, minutes: 0 })).toBe('2 h');
    expect(formatDuration({ hours: 1, minutes: 30 })).toBe('1 h 30 min');
  });
});

describe('formatTime', () => {
  test('formats in the given time zone', () => {
    expect(formatTime(new Date(Date.UTC(2026, 2, 10, 21, 0, 0)), 'en-GB', 'Europe/Berlin')).toBe('22:00');
  });

  test('falls back to UTC for an invalid time zone', () => {
    expect(formatTime(new Date(Date.UTC(2026, 2, 10, 21, 0, 0)), 'en-GB', 'Not/AZone')).toBe('21:00');
  });
});

describe('result descriptions', () => {
  const result: SearchResult = {
    windowStart: T0,
    windowEnd: T0 + 2 * HOUR,
    durationMs: 2 * HOUR,
    duration: { hours: 2, minutes: 0 },
    totalCost: 9,
    averagePrice: 4.5,
  };

  test('formatWindow shows the local time range', () => {
    expect(formatWindow(result, 'en-GB', 'Europe/Berlin')).toBe('01:00–03:00');
  });

  test('describeResult summarises window and average price', () => {
    expect(describeResult(result, 'en-GB', 'Europe/Berlin')).toBe('01:00–03:00 (2 h), average 4.50 ct/kWh');
  });

  test('describeResult adds the energy cost when known', () => {
    const withEnergy = { ...result, power: 2, energyAmount: 4, energyCost: 18 };
    expect(describeResult(withEnergy, 'en-GB', 'Europe/Berlin')).toBe('01:00–03:00 (2 h), average 4.50 ct/kWh, total 18.00 ct');
  });

  test('describeFailure names the minimum range', () => {
    expect(describeFailure({ kind: 'InsufficientRange', requiredMs: 3 * HOUR, availableMs: HOUR })).toBe(
      'A minimum time range of 3 h is required',
    );
    expect(describeFailure({ kind: 'InsufficientRange', requiredMs: 90 * MINUTE, availableMs: 0 })).toBe(
      'A minimum time range of 1 h 30 min is required',
    );
  });

  test('describeFailure covers the other failure kinds', () => {
    expect(describeFailure({ kind: 'EmptyResult', reason: 'No price data loaded' })).toBe('No result: No price data loaded');
    expect(describeFailure({ kind: 'MalformedData', reason: 'bad order' })).toBe('Price data could not be read: bad order');
  });
});
