/**
 * Common interface for price data sources.
 * All price sources must return data in this format for consistency.
 */

import type { RawPricePoint } from './types';

export interface PriceDataSource {
  /** Short name used in log messages */
  readonly name: string;

  /**
   * Fetch price data from the source.
   * @returns Price records ordered as delivered by the source
   */
  fetch(): Promise<Array<RawPricePoint>>;
}
