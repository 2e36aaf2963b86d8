import dotenv from 'dotenv';

import type { Region } from '../logic/prices/types';
import type { SearchScope } from '../logic/cheapestWindow/types';
import { parseScope } from '../logic/cheapestWindow/scope';
import { isRegion, regionTimeZone } from '../logic/prices/regions';
import { ConfigError } from '../logic/utils/errorUtils';

export interface AppConfig {
  region: Region;
  /** Price backend base URL; without one the aWATTar API is used directly */
  baseUrl?: string;
  vatEnabled: boolean;
  /** kW */
  powerKw?: number;
  durationMinutes?: number;
  /** kWh; when set the search runs by energy amount and power */
  energyKwh?: number;
  scope: SearchScope;
  /** ct/kWh threshold for the price-below notification */
  priceBelow?: number;
}

/**
 * Load a `.env` file into `process.env` without overriding variables already set
 * @param path - Optional path to the file (defaults to `.env` in the working directory)
 */
export function loadEnvFile(path?: string): void {
  dotenv.config({ path, override: false });
}

function readNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = Number(raw.trim().replace(',', '.'));
  if (!Number.isFinite(value)) {
    throw new ConfigError(key, `expected a number, got "${raw}"`);
  }
  return value;
}

function readPositiveNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const value = readNumber(env, key);
  if (value !== undefined && value <= 0) {
    throw new ConfigError(key, `expected a positive number, got "${env[key]}"`);
  }
  return value;
}

function readBoolean(env: NodeJS.ProcessEnv, key: string, defaultValue: boolean): boolean {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return defaultValue;
  }
  const value = raw.trim().toLowerCase();
  if (value === 'true' || value === '1' || value === 'yes') {
    return true;
  }
  if (value === 'false' || value === '0' || value === 'no') {
    return false;
  }
  throw new ConfigError(key, `expected true or false, got "${raw}"`);
}

/**
 * Read and validate the app configuration from environment variables.
 * - `SPOTWINDOW_REGION`: DE or AT (default DE)
 * - `SPOTWINDOW_BASE_URL`: price backend; optional
 * - `SPOTWINDOW_VAT`: include VAT (default true)
 * - `SPOTWINDOW_DURATION_MINUTES` or `SPOTWINDOW_ENERGY_KWH` with `SPOTWINDOW_POWER_KW`
 * - `SPOTWINDOW_SCOPE`: tonight, next<N>h or custom:<from>/<to> (default next24h)
 * - `SPOTWINDOW_PRICE_BELOW`: notification threshold in ct/kWh, may be zero or negative; optional
 * @param env - Environment to read from
 * @returns Validated configuration
 * @throws ConfigError when a variable is missing or invalid
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const regionRaw = (env.SPOTWINDOW_REGION ?? 'DE').trim().toUpperCase();
  if (!isRegion(regionRaw)) {
    throw new ConfigError('SPOTWINDOW_REGION', `unsupported region "${regionRaw}", expected DE or AT`);
  }
  const region = regionRaw;

  const scopeRaw = env.SPOTWINDOW_SCOPE ?? 'next24h';
  const scope = parseScope(scopeRaw, regionTimeZone(region));
  if (scope === undefined) {
    throw new ConfigError('SPOTWINDOW_SCOPE', `unsupported scope "${scopeRaw}"`);
  }

  const powerKw = readPositiveNumber(env, 'SPOTWINDOW_POWER_KW');
  const durationMinutes = readPositiveNumber(env, 'SPOTWINDOW_DURATION_MINUTES');
  const energyKwh = readPositiveNumber(env, 'SPOTWINDOW_ENERGY_KWH');

  if (energyKwh !== undefined && powerKw === undefined) {
    throw new ConfigError('SPOTWINDOW_POWER_KW', 'required when SPOTWINDOW_ENERGY_KWH is set');
  }
  if (energyKwh === undefined && durationMinutes === undefined) {
    throw new ConfigError('SPOTWINDOW_DURATION_MINUTES', 'set a duration or an energy amount');
  }

  const baseUrl = env.SPOTWINDOW_BASE_URL?.trim();

  return {
    region,
    baseUrl: baseUrl === '' ? undefined : baseUrl,
    vatEnabled: readBoolean(env, 'SPOTWINDOW_VAT', true),
    powerKw,
    durationMinutes,
    energyKwh,
    scope,
    priceBelow: readNumber(env, 'SPOTWINDOW_PRICE_BELOW'),
  };
}
