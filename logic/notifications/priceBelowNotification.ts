import { DateTime } from 'luxon';

import type { PriceSeries, Region } from '../prices/types';
import type { NotificationSetting } from '../settings/settings';
import { findCheapestWindow } from '../cheapestWindow/findCheapestWindow';
import { formatPrice, formatTime } from '../cheapestWindow/formatResult';
import { minMaxBounds, sliceSeries } from '../prices/priceSeries';
import { regionTimeZone } from '../prices/regions';
import { applyVat } from '../prices/vat';

export interface PriceBelowNotification {
  /** ct/kWh */
  thresholdPrice: number;
  /** ct/kWh */
  cheapestHourPrice: number;
  cheapestHourStart: number;
}

/**
 * Decide whether tomorrow's prices warrant a "price drops below" notification.
 * - Only points lying fully within tomorrow (local time of the region) are considered
 * - Nothing is sent until tomorrow is covered completely and without gaps
 * - The cheapest single interval is found with the same window search used for planning
 * - The cheapest price must be strictly below the threshold
 * @param series - Price series containing tomorrow's prices
 * @param setting - User notification setting
 * @param options - Region and VAT flag the threshold is expressed in
 * @param now - Current timestamp in milliseconds
 * @returns Notification payload, or undefined when nothing should be sent
 */
export function evaluatePriceBelowNotification(
  series: PriceSeries,
  setting: NotificationSetting,
  options: { region: Region; vatEnabled: boolean },
  now: number,
): PriceBelowNotification | undefined {
  if (!setting.priceDropsBelowValueNotification) {
    return undefined;
  }

  const tomorrowStart = DateTime.fromMillis(now, { zone: regionTimeZone(options.region) })
    .startOf('day')
    .plus({ days: 1 });
  const tomorrowEnd = tomorrowStart.plus({ days: 1 });

  const tomorrow = sliceSeries(
    applyVat(series, options.vatEnabled, options.region),
    tomorrowStart.toMillis(),
    tomorrowEnd.toMillis(),
  );
  const bounds = minMaxBounds(tomorrow);
  const first = tomorrow.points[0];
  if (bounds === undefined || first === undefined) {
    return undefined;
  }
  // Tomorrow must be published in full, without gaps
  const covered = tomorrow.points.reduce((sum, p) => sum + (p.end - p.start), 0);
  if (
    bounds.start !== tomorrowStart.toMillis()
    || bounds.end !== tomorrowEnd.toMillis()
    || covered !== bounds.end - bounds.start
  ) {
    return undefined;
  }

  const cheapest = findCheapestWindow(tomorrow, bounds, first.end - first.start);
  if (cheapest === undefined || cheapest.totalCost >= setting.priceBelowValue) {
    return undefined;
  }

  return {
    thresholdPrice: setting.priceBelowValue,
    cheapestHourPrice: cheapest.totalCost,
    cheapestHourStart: cheapest.start,
  };
}

/**
 * Plain-text notification body
 * @param payload - Notification payload
 * @param timezone - Timezone used to show the start time
 * @param locale - Locale string
 * @returns Message such as "Tomorrow at 03:00 the price drops to 1.20 ct/kWh (below 5.00 ct/kWh)."
 */
export function formatNotificationBody(
  payload: PriceBelowNotification,
  timezone: string,
  locale: string = 'en-GB',
): string {
  const time = formatTime(new Date(payload.cheapestHourStart), locale, timezone);
  return `Tomorrow at ${time} the price drops to ${formatPrice(payload.cheapestHourPrice)} ct/kWh `
    + `(below ${formatPrice(payload.thresholdPrice)} ct/kWh).`;
}
