import type { Region } from '../prices/types';

export interface NotificationSetting {
  priceDropsBelowValueNotification: boolean;
  /** Threshold in ct/kWh */
  priceBelowValue: number;
}

/**
 * User settings passed explicitly into every search.
 */
export interface Settings {
  region: Region;
  vatEnabled: boolean;
  /** Power draw in kW, 0 when unknown */
  power: number;
  /** Last duration entered, milliseconds (0 when never entered) */
  lastDurationMs: number;
  /** Last energy amount entered, kWh (0 when never entered) */
  lastEnergyAmount: number;
  notification: NotificationSetting;
}

export const DEFAULT_NOTIFICATION_SETTING: NotificationSetting = {
  priceDropsBelowValueNotification: false,
  priceBelowValue: 0,
};

export const DEFAULT_SETTINGS: Settings = {
  region: 'DE',
  vatEnabled: true,
  power: 0,
  lastDurationMs: 0,
  lastEnergyAmount: 0,
  notification: DEFAULT_NOTIFICATION_SETTING,
};
