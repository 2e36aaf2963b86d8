/**
 * Tests for Date Utilities
 */

import {
  ceilToHour,
  fixedClock,
  floorToHour,
  hoursToMilliseconds,
  splitDuration,
  MILLISECONDS_PER_HOUR,
  MILLISECONDS_PER_MINUTE,
  MILLISECONDS_PER_SECOND,
} from '../logic/utils/dateUtils';

const T0 = Date.UTC(2026, 2, 10, 14, 0, 0);

describe('Date Utilities', () => {
  describe('Constants', () => {
    test('MILLISECONDS_PER_HOUR is correct', () => {
      expect(MILLISECONDS_PER_HOUR).toBe(3600000);
    });

    test('MILLISECONDS_PER_MINUTE is correct', () => {
      expect(MILLISECONDS_PER_MINUTE).toBe(60000);
    });

    test('MILLISECONDS_PER_SECOND is correct', () => {
      expect(MILLISECONDS_PER_SECOND).toBe(1000);
    });
  });

  describe('fixedClock', () => {
    test('always returns the pinned instant', () => {
      const clock = fixedClock(T0);
      expect(clock.now()).toBe(T0);
      expect(clock.now()).toBe(T0);
    });
  });

  describe('floorToHour', () => {
    test('truncates to the top of the hour', () => {
      expect(floorToHour(T0 + 59 * MILLISECONDS_PER_MINUTE)).toBe(T0);
      expect(floorToHour(T0 + 1)).toBe(T0);
    });

    test('keeps an aligned timestamp', () => {
      expect(floorToHour(T0)).toBe(T0);
    });
  });

  describe('ceilToHour', () => {
    test('rounds up to the next hour', () => {
      expect(ceilToHour(T0 + 1)).toBe(T0 + MILLISECONDS_PER_HOUR);
      expect(ceilToHour(T0 + 30 * MILLISECONDS_PER_MINUTE)).toBe(T0 + MILLISECONDS_PER_HOUR);
    });

    test('keeps an aligned timestamp', () => {
      expect(ceilToHour(T0)).toBe(T0);
    });
  });

  describe('hoursToMilliseconds', () => {
    test('converts whole and fractional hours', () => {
      expect(hoursToMilliseconds(2)).toBe(2 * MILLISECONDS_PER_HOUR);
      expect(hoursToMilliseconds(0.25)).toBe(15 * MILLISECONDS_PER_MINUTE);
    });

    test('rounds to whole milliseconds', () => {
      expect(hoursToMilliseconds(1 / 3)).toBe(20 * MILLISECONDS_PER_MINUTE);
      expect(Number.isInteger(hoursToMilliseconds(7 / 11))).toBe(true);
    });
  });

  describe('splitDuration', () => {
    test('splits into hours and minutes', () => {
      expect(splitDuration(150 * MILLISECONDS_PER_MINUTE)).toEqual({ hours: 2, minutes: 30 });
      expect(splitDuration(45 * MILLISECONDS_PER_MINUTE)).toEqual({ hours: 0, minutes: 45 });
      expect(splitDuration(3 * MILLISECONDS_PER_HOUR)).toEqual({ hours: 3, minutes: 0 });
    });

    test('rounds minutes', () => {
      expect(splitDuration(20 * MILLISECONDS_PER_MINUTE + 29 * MILLISECONDS_PER_SECOND)).toEqual({ hours: 0, minutes: 20 });
      expect(splitDuration(20 * MILLISECONDS_PER_MINUTE + 30 * MILLISECONDS_PER_SECOND)).toEqual({ hours: 0, minutes: 21 });
    });

    test('carries 60 rounded minutes into the hours', () => {
      expect(splitDuration(MILLISECONDS_PER_HOUR + 59 * MILLISECONDS_PER_MINUTE + 45 * MILLISECONDS_PER_SECOND)).toEqual({
        hours: 2,
        minutes: 0,
      });
    });
  });
});
