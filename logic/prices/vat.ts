import type { PriceSeries, Region } from './types';
import { createPriceSeries } from './priceSeries';

/**
 * VAT multipliers per region.
 */
const VAT_MULTIPLIERS: Record<Region, number> = {
  DE: 1.19,
  AT: 1.2,
};

/**
 * Get VAT multiplier for a region
 * @param region - Region code
 * @returns Multiplier applied to raw prices when VAT is enabled
 */
export function vatMultiplier(region: Region): number {
  return VAT_MULTIPLIERS[region];
}

/**
 * Price used for cost calculations.
 * Negative prices are scaled like positive ones.
 * @param rawPrice - Published price in ct/kWh
 * @param vatEnabled - Whether VAT should be included
 * @param region - Region the price belongs to
 * @returns Effective price in ct/kWh
 */
export function effectivePrice(rawPrice: number, vatEnabled: boolean, region: Region): number {
  return vatEnabled ? rawPrice * vatMultiplier(region) : rawPrice;
}

/**
 * Derive a new series whose effective prices include (or exclude) VAT.
 * Always starts from `rawPrice`, so applying twice does not compound.
 * @param series - Source series
 * @param vatEnabled - Whether VAT should be included
 * @param region - Region the prices belong to
 * @returns New series with recomputed min and max
 */
export function applyVat(series: PriceSeries, vatEnabled: boolean, region: Region): PriceSeries {
  const multiplier = vatEnabled ? vatMultiplier(region) : 1;
  return createPriceSeries(
    series.points.map((p) => ({ ...p, price: effectivePrice(p.rawPrice, vatEnabled, region) })),
    multiplier,
  );
}
