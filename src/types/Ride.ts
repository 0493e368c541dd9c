/**
 * Core types for ride price comparison
 * These are provider agnostic; provider payloads stay inside their adapters
 */

export const VEHICLE_CLASSES = ['standard', 'premium', 'shared', 'xl'] as const;

export type VehicleClass = (typeof VEHICLE_CLASSES)[number];

export interface Coordinates {
  latitude: number;
  longitude: number;
}

export interface RideRequest {
  readonly pickup: Readonly<Coordinates>;
  readonly dropoff: Readonly<Coordinates>;
  readonly vehicleClass: VehicleClass;
}

/**
 * Fields every adapter extracts from its own raw quote
 * Amounts are in major units of the provider's currency
 */
export interface QuoteFields {
  amount: number;
  currency: string;
  upperAmount?: number;
  durationSeconds?: number;
}

export type EstimateSource = 'live' | 'simulated';

export interface ViableEstimate {
  provider: string;
  viable: true;
  source: EstimateSource;
  /** Integer amount in minor units of the comparison currency */
  amountMinor: number;
  /** Decimal rendering of amountMinor, e.g. "18.50" */
  amount: string;
  currency: string;
  upperAmountMinor?: number;
  durationSeconds?: number;
  /** 1 for live quotes, discounted for simulated ones */
  confidence: number;
  note?: string;
}

export interface NonViableEstimate {
  provider: string;
  viable: false;
  source: EstimateSource;
  currency: string;
  reason: string;
}

export type NormalizedEstimate = ViableEstimate | NonViableEstimate;

export type ProviderState = 'pending' | 'live_succeeded' | 'simulated' | 'non_viable';

export interface ProviderResolution {
  provider: string;
  state: Exclude<ProviderState, 'pending'>;
  estimate: NormalizedEstimate;
}

/** Which rule picked the winner among viable estimates */
export type DecisionRule =
  | 'lowest_amount'
  | 'live_over_simulated'
  | 'registry_priority'
  | 'registry_order';

export interface SelectedComparison {
  status: 'selected';
  request: RideRequest;
  currency: string;
  estimates: NormalizedEstimate[];
  winner: ViableEstimate;
  decidedBy: DecisionRule;
}

export interface NoViableProviderComparison {
  status: 'no_viable_provider';
  request: RideRequest;
  currency: string;
  estimates: NormalizedEstimate[];
  winner: null;
}

export type ComparisonResult = SelectedComparison | NoViableProviderComparison;
