#!/usr/bin/env node
'use strict';

import type { Outcome } from './logic/prices/types';
import type { PriceDataSource } from './logic/prices/priceSource';
import type { SearchRequest, SearchResult } from './logic/cheapestWindow/types';
import type { Settings } from './logic/settings/settings';
import type { AppConfig } from './runtime/config';
import type { Logger } from './runtime/logger';
import type { PriceBelowNotification } from './logic/notifications/priceBelowNotification';
import { AwattarPriceSource, throughEndOfTomorrow } from './logic/prices/sources/awattar';
import { BackendPriceSource } from './logic/prices/sources/backend';
import { regionTimeZone } from './logic/prices/regions';
import { planCheapestWindow } from './logic/cheapestWindow/planCheapestWindow';
import { describeFailure, describeResult } from './logic/cheapestWindow/formatResult';
import { evaluatePriceBelowNotification, formatNotificationBody } from './logic/notifications/priceBelowNotification';
import { MILLISECONDS_PER_MINUTE, systemClock, type Clock } from './logic/utils/dateUtils';
import { extractErrorMessage } from './logic/utils/errorUtils';
import { loadConfig, loadEnvFile } from './runtime/config';
import { createConsoleLogger } from './runtime/logger';
import { PriceManager } from './runtime/priceManager';
import { SettingsStore } from './runtime/settingsStore';

export interface AppOptions {
  logger?: Logger;
  clock?: Clock;
  /** Builds the ordered source list for a region; defaults to backend (if configured) then aWATTar */
  createSources?: (settings: Readonly<Settings>) => ReadonlyArray<PriceDataSource>;
}

/**
 * Default sources for a region: the price backend when a base URL is configured,
 * with the aWATTar API as fallback, asked for prices until the end of tomorrow
 */
export function defaultSources(region: Settings['region'], baseUrl?: string, clock: Clock = systemClock): Array<PriceDataSource> {
  const sources: Array<PriceDataSource> = [];
  if (baseUrl) {
    sources.push(new BackendPriceSource(region, baseUrl));
  }
  sources.push(new AwattarPriceSource(region, () => throughEndOfTomorrow(clock.now(), regionTimeZone(region))));
  return sources;
}

/**
 * Settings derived from the environment configuration
 */
export function settingsFromConfig(config: AppConfig): Partial<Settings> {
  return {
    region: config.region,
    vatEnabled: config.vatEnabled,
    power: config.powerKw ?? 0,
    lastDurationMs: (config.durationMinutes ?? 0) * MILLISECONDS_PER_MINUTE,
    lastEnergyAmount: config.energyKwh ?? 0,
    notification: {
      priceDropsBelowValueNotification: config.priceBelow !== undefined,
      priceBelowValue: config.priceBelow ?? 0,
    },
  };
}

/**
 * Search request for the last values stored in the settings
 */
export function requestFromSettings(settings: Readonly<Settings>, scope: SearchRequest['scope']): SearchRequest {
  if (settings.lastEnergyAmount > 0 && settings.power > 0) {
    return {
      mode: 'byEnergyAndPower',
      energyAmount: settings.lastEnergyAmount,
      power: settings.power,
      scope,
      vatEnabled: settings.vatEnabled,
    };
  }
  return {
    mode: 'byDuration',
    durationMs: settings.lastDurationMs,
    scope,
    vatEnabled: settings.vatEnabled,
    ...(settings.power > 0 ? { power: settings.power } : {}),
  };
}

export class SpotWindowApp {
  readonly settings: SettingsStore;
  readonly prices: PriceManager;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly createSources: (settings: Readonly<Settings>) => ReadonlyArray<PriceDataSource>;

  constructor(initialSettings: Partial<Settings>, options: AppOptions & { baseUrl?: string } = {}) {
    this.logger = options.logger ?? createConsoleLogger('SpotWindowApp');
    this.clock = options.clock ?? systemClock;
    this.createSources = options.createSources
      ?? ((settings) => defaultSources(settings.region, options.baseUrl, this.clock));
    this.settings = new SettingsStore(initialSettings);
    this.prices = new PriceManager(this.logger, this.createSources(this.settings.snapshot()), this.clock);
  }

  /**
   * onInit is called once after construction; loads the first price series.
   */
  async onInit(): Promise<void> {
    this.log('SpotWindowApp has been initialized');

    // Listen for settings changes
    this.settings.on('set', this.onSettingsChanged.bind(this));

    await this.prices.refresh();
  }

  /**
   * Handle settings changes
   * A region change swaps the price sources and reloads prices
   */
  onSettingsChanged(key: keyof Settings): void {
    this.log(`[SETTINGS] ${key} changed`);

    if (key === 'region') {
      this.prices.setSources(this.createSources(this.settings.snapshot()));
      this.prices.refresh().catch((error: unknown) => {
        this.error('[SETTINGS] Price reload after region change failed:', extractErrorMessage(error));
      });
    }
  }

  /**
   * Find the cheapest window on the current price series
   * @param request - Search request
   * @returns Result or failure; `EmptyResult` when no prices are loaded yet
   */
  findCheapestWindow(request: SearchRequest): Outcome<SearchResult> {
    const { series } = this.prices.getState();
    if (!series) {
      return { ok: false, failure: { kind: 'EmptyResult', reason: 'No price data loaded' } };
    }

    const settings = this.settings.snapshot();
    const outcome = planCheapestWindow(series, request, settings, this.clock);
    const timezone = regionTimeZone(settings.region);
    if (outcome.ok) {
      this.log(`[SEARCH] Cheapest window: ${describeResult(outcome.value, 'en-GB', timezone)}`);
    } else {
      this.log(`[SEARCH] ${describeFailure(outcome.failure)}`);
    }
    return outcome;
  }

  /**
   * Evaluate the price-below notification against tomorrow's prices
   * @returns Payload to deliver, or undefined when nothing should be sent
   */
  checkPriceBelowNotification(): PriceBelowNotification | undefined {
    const { series } = this.prices.getState();
    if (!series) {
      return undefined;
    }

    const settings = this.settings.snapshot();
    const payload = evaluatePriceBelowNotification(series, settings.notification, settings, this.clock.now());
    if (payload) {
      this.log(`[NOTIFY] ${formatNotificationBody(payload, regionTimeZone(settings.region))}`);
    }
    return payload;
  }

  log(...args: unknown[]): void {
    this.logger.log(...args);
  }

  error(...args: unknown[]): void {
    this.logger.error(...args);
  }
}

/**
 * Run one search with the configuration from the environment and print the result
 * @param env - Environment to read the configuration from
 * @returns Process exit code
 */
export async function main(env: NodeJS.ProcessEnv = process.env): Promise<number> {
  const config = loadConfig(env);
  const app = new SpotWindowApp(settingsFromConfig(config), { baseUrl: config.baseUrl });
  await app.onInit();

  const state = app.prices.getState();
  if (state.dataRetrievalError) {
    if (!state.retryable) {
      app.error('[PRICES] The price source answered with data that cannot be used, fetching again will not help');
    }
    return 2;
  }

  const outcome = app.findCheapestWindow(requestFromSettings(app.settings.snapshot(), config.scope));
  app.checkPriceBelowNotification();
  return outcome.ok ? 0 : 1;
}

if (require.main === module) {
  loadEnvFile();
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(extractErrorMessage(error));
      process.exitCode = 1;
    });
}
