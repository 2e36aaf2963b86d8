import { DateTime } from 'luxon';

import type { PriceDataSource } from '../priceSource';
import type { RawPricePoint, Region } from '../types';
import { floorToHour, MILLISECONDS_PER_SECOND } from '../../utils/dateUtils';
import { PriceDataError } from '../../utils/errorUtils';

/**
 * aWATTar market data price source.
 * Fetches hourly day-ahead prices from the public aWATTar API for Germany or Austria.
 * Used directly, or as fallback when the price backend is unavailable.
 */

interface AwattarMarketData {
  start_timestamp: number;
  end_timestamp: number;
  marketprice: number;
  unit: string;
}

function isMarketData(value: unknown): value is AwattarMarketData {
  return typeof value === 'object' && value !== null
    && 'start_timestamp' in value && typeof value.start_timestamp === 'number'
    && 'end_timestamp' in value && typeof value.end_timestamp === 'number'
    && 'marketprice' in value && typeof value.marketprice === 'number'
    && 'unit' in value && typeof value.unit === 'string';
}

export interface TimeRange {
  start: number;
  end: number;
}

/**
 * Range from the current hour until the end of tomorrow in local time,
 * so that the next day is complete once it has been published
 * @param now - Current timestamp in milliseconds
 * @param timeZone - IANA time zone of the market
 * @returns Range in milliseconds
 */
export function throughEndOfTomorrow(now: number, timeZone: string): TimeRange {
  const end = DateTime.fromMillis(now, { zone: timeZone }).startOf('day').plus({ days: 2 });
  return { start: floorToHour(now), end: end.toMillis() };
}

export class AwattarPriceSource implements PriceDataSource {
  readonly name = 'aWATTar';
  private readonly baseUrl: string;
  private readonly range?: () => TimeRange;

  /**
   * @param region - Market to fetch
   * @param range - Optional time range in milliseconds, evaluated on every fetch; the API defaults to the next 24 hours
   */
  constructor(region: Region, range?: () => TimeRange) {
    this.baseUrl = `https://api.awattar.${region.toLowerCase()}/v1/marketdata`;
    this.range = range;
  }

  async fetch(): Promise<Array<RawPricePoint>> {
    const range = this.range?.();
    const url = range
      ? `${this.baseUrl}?start=${range.start}&end=${range.end}`
      : this.baseUrl;
    const response = await fetch(url);

    if (!response.ok) {
      throw new PriceDataError(`aWATTar API failed: ${response.status} ${response.statusText}`);
    }

    const json: unknown = await response.json();
    if (typeof json !== 'object' || json === null || !('data' in json) || !Array.isArray(json.data)) {
      throw new PriceDataError('aWATTar API: Invalid response structure', false);
    }

    const entries: Array<RawPricePoint> = [];
    for (const entry of json.data) {
      if (!isMarketData(entry)) {
        throw new PriceDataError('aWATTar API: Invalid market data entry', false);
      }
      if (entry.unit.toLowerCase() !== 'eur/mwh') {
        throw new PriceDataError(`aWATTar API returned unit ${entry.unit}, expected Eur/MWh`, false);
      }

      entries.push({
        startTimestamp: Math.round(entry.start_timestamp / MILLISECONDS_PER_SECOND),
        endTimestamp: Math.round(entry.end_timestamp / MILLISECONDS_PER_SECOND),
        // €/MWh to ct/kWh
        marketprice: entry.marketprice / 10,
      });
    }

    return entries;
  }
}
