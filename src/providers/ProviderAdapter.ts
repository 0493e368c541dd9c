import axios from 'axios';
import type { QuoteFields, RideRequest } from '../types/Ride';

/**
 * Provider capability
 * Every ride-hailing provider is plugged in by implementing one of the two
 * variants below; there is no base class to extend.
 */

// =============================================================================
// Outcomes
// =============================================================================

export const ADAPTER_FAILURES = ['access_denied', 'unavailable', 'no_coverage'] as const;

export type AdapterFailure = (typeof ADAPTER_FAILURES)[number];

export type AdapterOutcome<TRaw> =
  | { ok: true; quote: TRaw }
  | { ok: false; failure: AdapterFailure; reason: string };

export function quoted<TRaw>(quote: TRaw): AdapterOutcome<TRaw> {
  return { ok: true, quote };
}

export function failed<TRaw>(failure: AdapterFailure, reason: string): AdapterOutcome<TRaw> {
  return { ok: false, failure, reason };
}

/**
 * Check a value an adapter handed back against the outcome shape
 */
export function isAdapterOutcome(value: unknown): value is AdapterOutcome<unknown> {
  if (typeof value !== 'object' || value === null || !('ok' in value)) {
    return false;
  }
  if (value.ok === true) {
    return 'quote' in value;
  }
  if (value.ok !== false || !('failure' in value) || !('reason' in value) || typeof value.reason !== 'string') {
    return false;
  }
  const { failure } = value;
  return ADAPTER_FAILURES.some((known) => known === failure);
}

// =============================================================================
// Simulation pricing
// =============================================================================

/**
 * Parameters of a provider's fallback pricing table
 * Money values are in major units of `currency`
 */
export interface SimulationPricing {
  currency: string;
  baseFare: number;
  perKm: number;
  perMinute: number;
  minimumFare: number;
  averageSpeedKmh: number;
  /** Classes missing here are not simulated for this provider */
  classMultipliers: Partial<Record<RideRequest['vehicleClass'], number>>;
}

export interface SimulatedFare {
  amount: number;
  currency: string;
  durationSeconds?: number;
}

/**
 * Computes a substitute fare when no live quote can be had.
 * Returning null means the provider cannot serve the request at all.
 */
export type SimulationHeuristic = (
  request: RideRequest,
  pricing: SimulationPricing
) => SimulatedFare | null;

// =============================================================================
// Adapter variants
// =============================================================================

interface ProviderAdapterBase {
  readonly name: string;
  /** Higher wins ties between equal amounts */
  readonly priority: number;
  /** Overrides the default distance-and-time heuristic */
  readonly heuristic?: SimulationHeuristic;
}

export interface LiveProviderAdapter<TRaw = unknown> extends ProviderAdapterBase {
  readonly mode: 'live';
  readonly timeoutMs: number;
  /** Fallback pricing; without it a failed live attempt is non-viable */
  readonly simulation?: SimulationPricing;

  /**
   * Ask the provider for a quote. Must resolve with a typed outcome instead of
   * rejecting, and must honour `signal`.
   */
  requestQuote(request: RideRequest, signal: AbortSignal): Promise<AdapterOutcome<TRaw>>;

  /** Extract comparable fields from this provider's payload; may throw on bad data */
  parseQuote(raw: TRaw): QuoteFields;
}

export interface SimulationOnlyProviderAdapter extends ProviderAdapterBase {
  readonly mode: 'simulation-only';
  readonly simulation: SimulationPricing;
}

export type ProviderAdapter = LiveProviderAdapter | SimulationOnlyProviderAdapter;

// =============================================================================
// HTTP error classification
// =============================================================================

/**
 * Map an HTTP client error to an adapter failure.
 * Statuses listed in `noCoverageStatuses` mean the provider answered but does
 * not serve this request.
 */
export function classifyHttpError(
  error: unknown,
  noCoverageStatuses: readonly number[] = [404, 422]
): { failure: AdapterFailure; reason: string } {
  if (axios.isCancel(error)) {
    return { failure: 'unavailable', reason: 'request aborted' };
  }

  if (!axios.isAxiosError(error)) {
    return {
      failure: 'unavailable',
      reason: error instanceof Error ? error.message : String(error),
    };
  }

  const status = error.response?.status;

  if (status === undefined) {
    // Timeout or network failure
    return { failure: 'unavailable', reason: error.code ? `${error.code}: ${error.message}` : error.message };
  }

  if (status === 401 || status === 403) {
    return { failure: 'access_denied', reason: `HTTP ${status}` };
  }

  if (noCoverageStatuses.includes(status)) {
    return { failure: 'no_coverage', reason: `HTTP ${status}` };
  }

  return { failure: 'unavailable', reason: `HTTP ${status}` };
}
