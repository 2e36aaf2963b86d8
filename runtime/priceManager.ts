import { EventEmitter } from 'events';

import type { PriceSeries, RawPricePoint } from '../logic/prices/types';
import type { PriceDataSource } from '../logic/prices/priceSource';
import type { Clock } from '../logic/utils/dateUtils';
import type { Logger } from './logger';
import { buildPriceSeries } from '../logic/prices/priceSeries';
import { formatPrice } from '../logic/cheapestWindow/formatResult';
import { extractErrorMessage, PriceDataError } from '../logic/utils/errorUtils';

/**
 * Price management for fetching prices, building the series, and publishing state
 */

export interface PriceState {
  series?: PriceSeries;
  lastUpdated?: number;
  /** The last fetch failed or returned unusable data */
  dataRetrievalError: boolean;
  /** The last fetch succeeded but contained no current or future prices */
  currentlyNoData: boolean;
  currentlyUpdating: boolean;
  /** Whether fetching again may clear `dataRetrievalError`; false for responses the source cannot use */
  retryable: boolean;
}

const INITIAL_STATE: PriceState = {
  dataRetrievalError: false,
  currentlyNoData: false,
  currentlyUpdating: false,
  retryable: true,
};

/**
 * Holds the latest price snapshot.
 * - One fetch at a time; a refresh requested while one runs gets the running one
 * - State is replaced as a whole and announced with an `update` event
 * - A failed fetch keeps the previous series
 */
export class PriceManager extends EventEmitter {
  private state: Readonly<PriceState> = Object.freeze({ ...INITIAL_STATE });
  private inFlight?: Promise<Readonly<PriceState>>;
  private sources: ReadonlyArray<PriceDataSource>;
  private readonly logger: Logger;
  private readonly clock: Clock;

  /**
   * @param logger - Logger for fetch diagnostics
   * @param sources - Sources tried in order; later ones are fallbacks
   * @param clock - Source of "now" for past-price filtering
   */
  constructor(logger: Logger, sources: ReadonlyArray<PriceDataSource>, clock: Clock) {
    super();
    this.logger = logger;
    this.sources = sources;
    this.clock = clock;
  }

  getState(): Readonly<PriceState> {
    return this.state;
  }

  /**
   * Replace the sources used by the next refresh (e.g. after a region change)
   * @param sources - Sources tried in order
   */
  setSources(sources: ReadonlyArray<PriceDataSource>): void {
    this.sources = sources;
  }

  /**
   * Fetch prices and rebuild the series.
   * Never rejects; failures are reflected in the returned state.
   * @returns State after the refresh
   */
  refresh(): Promise<Readonly<PriceState>> {
    if (this.inFlight) {
      this.logger.log('[PRICES] Refresh already running, ignoring trigger');
      return this.inFlight;
    }
    this.inFlight = this.runRefresh().finally(() => {
      this.inFlight = undefined;
    });
    return this.inFlight;
  }

  private async runRefresh(): Promise<Readonly<PriceState>> {
    this.replaceState({ ...this.state, currentlyUpdating: true, dataRetrievalError: false });

    let rawPoints: Array<RawPricePoint>;
    try {
      rawPoints = await this.fetchWithFallback();
    } catch (error: unknown) {
      const retryable = !(error instanceof PriceDataError) || error.retryable;
      this.logger.error('[PRICES] Failed to fetch prices:', extractErrorMessage(error));
      return this.replaceState({ ...this.state, dataRetrievalError: true, currentlyUpdating: false, retryable });
    }

    const now = this.clock.now();
    const outcome = buildPriceSeries(rawPoints, now);
    if (!outcome.ok) {
      const { failure } = outcome;
      if (failure.kind === 'EmptyResult') {
        this.logger.log('[PRICES] No prices can be shown, because either there are none or they are outdated');
        return this.replaceState({ ...this.state, currentlyNoData: true, currentlyUpdating: false, retryable: true });
      }
      this.logger.error('[PRICES] Price data rejected:', failure.kind === 'MalformedData' ? failure.reason : failure.kind);
      return this.replaceState({ ...this.state, dataRetrievalError: true, currentlyUpdating: false, retryable: false });
    }

    const series = outcome.value;
    const dropped = rawPoints.length - series.points.length;
    this.logger.log(
      `[PRICES] Updated price series: ${series.points.length} points (${dropped} past points dropped), `
      + `min ${formatPrice(series.minPrice)} ct/kWh, max ${formatPrice(series.maxPrice)} ct/kWh`,
    );

    return this.replaceState({
      series,
      lastUpdated: now,
      dataRetrievalError: false,
      currentlyNoData: false,
      currentlyUpdating: false,
      retryable: true,
    });
  }

  /**
   * Try each source in order until one succeeds
   * @returns Records from the first source that answered
   * @throws The error of the last source when all fail
   */
  private async fetchWithFallback(): Promise<Array<RawPricePoint>> {
    let lastError: unknown = new Error('No price sources configured');
    for (let i = 0; i < this.sources.length; i++) {
      const source = this.sources[i];
      try {
        return await source.fetch();
      } catch (error: unknown) {
        lastError = error;
        const next = this.sources[i + 1];
        if (next) {
          this.logger.log(
            `[PRICES] ${source.name} failed (${extractErrorMessage(error)}), falling back to ${next.name}`,
          );
        }
      }
    }
    throw lastError;
  }

  private replaceState(next: PriceState): Readonly<PriceState> {
    this.state = Object.freeze(next);
    this.emit('update', this.state);
    return this.state;
  }
}
