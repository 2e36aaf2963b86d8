/**
 * Price feed record as delivered by the backend.
 * Timestamps are Unix seconds, `marketprice` is ct/kWh and may be negative.
 */
export interface RawPricePoint {
  startTimestamp: number;
  endTimestamp: number;
  marketprice: number;
}

export interface PricePoint {
  /** Interval start, Unix milliseconds */
  start: number;
  /** Interval end (exclusive), Unix milliseconds */
  end: number;
  /** Price as published, ct/kWh */
  rawPrice: number;
  /** Price used for cost calculations (raw price with VAT when enabled), ct/kWh */
  price: number;
}

/**
 * Immutable snapshot of future price points.
 * Replaced as a whole on every refresh, never mutated.
 */
export interface PriceSeries {
  readonly points: ReadonlyArray<PricePoint>;
  readonly minPrice: number;
  readonly maxPrice: number;
  readonly vatMultiplier: number;
}

export type Region = 'DE' | 'AT';


export type SearchFailure =
  | { kind: 'MalformedData'; reason: string }
  | { kind: 'EmptyResult'; reason: string }
  | { kind: 'InsufficientRange'; requiredMs: number; availableMs: number };

export type Outcome<T> =
  | { ok: true; value: T }
  | { ok: false; failure: SearchFailure };
