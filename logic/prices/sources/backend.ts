import type { PriceDataSource } from '../priceSource';
import type { RawPricePoint, Region } from '../types';
import { PriceDataError } from '../../utils/errorUtils';

/**
 * Price backend data source.
 * Fetches the prepared price list for a region from `{baseUrl}/data/{region}`.
 * Timestamps are Unix seconds, prices are ct/kWh.
 */

interface BackendPriceRecord {
  start_timestamp: number;
  end_timestamp: number;
  marketprice: number;
}

function isBackendPriceRecord(value: unknown): value is BackendPriceRecord {
  return typeof value === 'object' && value !== null
    && 'start_timestamp' in value && typeof value.start_timestamp === 'number'
    && 'end_timestamp' in value && typeof value.end_timestamp === 'number'
    && 'marketprice' in value && typeof value.marketprice === 'number';
}

function readPrices(body: unknown): Array<unknown> | undefined {
  if (typeof body !== 'object' || body === null || !('prices' in body)) {
    return undefined;
  }
  return Array.isArray(body.prices) ? body.prices : undefined;
}

export class BackendPriceSource implements PriceDataSource {
  readonly name = 'backend';
  private readonly url: string;

  constructor(region: Region, baseUrl: string) {
    this.url = `${baseUrl.replace(/\/+$/, '')}/data/${region}`;
  }

  async fetch(): Promise<Array<RawPricePoint>> {
    const response = await fetch(this.url);

    if (!response.ok) {
      throw new PriceDataError(`Price backend failed: ${response.status} ${response.statusText}`);
    }

    const prices = readPrices(await response.json());
    if (prices === undefined) {
      throw new PriceDataError('Price backend: Invalid response structure', false);
    }

    return prices.map((entry, index) => {
      if (!isBackendPriceRecord(entry)) {
        throw new PriceDataError(`Price backend: Invalid price record at index ${index}`, false);
      }
      return {
        startTimestamp: entry.start_timestamp,
        endTimestamp: entry.end_timestamp,
        marketprice: entry.marketprice,
      };
    });
  }
}
