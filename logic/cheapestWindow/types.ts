export type SearchScope =
  | { type: 'tonight' }
  | { type: 'nextHours'; hours: number }
  | { type: 'custom'; start: number; end: number };

interface SearchRequestBase {
  scope: SearchScope;
  vatEnabled: boolean;
}

export interface DurationSearchRequest extends SearchRequestBase {
  mode: 'byDuration';
  durationMs: number;
  /** Optional power draw in kW, used only to report the energy cost */
  power?: number;
}

export interface EnergySearchRequest extends SearchRequestBase {
  mode: 'byEnergyAndPower';
  /** kWh */
  energyAmount: number;
  /** kW */
  power: number;
}

export type SearchRequest = DurationSearchRequest | EnergySearchRequest;

export interface SearchBounds {
  start: number;
  end: number;
}

/**
 * Admissible window found by the search, before formatting.
 * `totalCost` sums price × covered fraction of each touched interval,
 * `priceHours` sums price × covered hours.
 */
export interface WindowCandidate {
  start: number;
  end: number;
  totalCost: number;
  priceHours: number;
}

export interface SearchResult {
  windowStart: number;
  windowEnd: number;
  durationMs: number;
  duration: { hours: number; minutes: number };
  totalCost: number;
  /** Time-weighted mean effective price over the window, ct/kWh */
  averagePrice: number;
  power?: number;
  energyAmount?: number;
  /** Cost of drawing `power` over the window, ct */
  energyCost?: number;
}
