import type { Region } from './types';

const REGION_TIME_ZONES: Record<Region, string> = {
  DE: 'Europe/Berlin',
  AT: 'Europe/Vienna',
};

// Numeric identifiers as stored by older settings records
const REGION_IDENTIFIERS: Record<number, Region> = {
  0: 'DE',
  1: 'AT',
};

/**
 * Check whether a value is a supported region code
 * @param value - Value to check
 * @returns True for 'DE' or 'AT'
 */
export function isRegion(value: unknown): value is Region {
  return value === 'DE' || value === 'AT';
}

/**
 * IANA time zone used for local day boundaries of a region
 * @param region - Region code
 * @returns Time zone name
 */
export function regionTimeZone(region: Region): string {
  return REGION_TIME_ZONES[region];
}

/**
 * Map a stored numeric region identifier to a region code.
 * Unknown identifiers map to Germany.
 * @param identifier - Stored identifier
 * @returns Region code
 */
export function regionFromIdentifier(identifier: number): Region {
  return REGION_IDENTIFIERS[identifier] ?? 'DE';
}
