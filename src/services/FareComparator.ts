import type { ComparisonResult, ProviderResolution, RideRequest } from '../types/Ride';
import { createLogger } from '../utils/logger';
import { assertValidRideRequest } from '../utils/rideRequest';
import { decide } from './DecisionEngine';
import type { ProviderRegistry } from './ProviderRegistry';
import { ResilienceController } from './ResilienceController';
import type { ResilienceOptions } from './ResilienceController';

export interface CompareOptions {
  /** Aborting cancels the comparison; no partial result is returned */
  signal?: AbortSignal;
}

/**
 * Entry point of the comparison pipeline:
 * validate → resolve every provider → decide
 *
 * Holds configuration only; every call is independent of the others.
 */
export class FareComparator {
  private readonly logger = createLogger({ component: 'FareComparator' });
  private readonly controller: ResilienceController;

  constructor(
    private readonly registry: ProviderRegistry,
    private readonly options: ResilienceOptions
  ) {
    this.controller = new ResilienceController(registry, options);
  }

  /**
   * @throws InvalidRequestError before any provider is contacted
   * @throws ComparisonCancelledError when the caller aborts
   */
  async compare(request: RideRequest, options: CompareOptions = {}): Promise<ComparisonResult> {
    assertValidRideRequest(request);

    this.logger.debug({ providers: this.registry.size(), vehicleClass: request.vehicleClass }, 'Starting comparison');

    const resolutions = await this.controller.collect(request, options.signal);
    const result = decide(
      request,
      this.options.policy.currency.code,
      resolutions.map((resolution) => resolution.estimate),
      this.registry
    );

    this.logger.info({
      states: summarizeStates(resolutions),
      status: result.status,
      winner: result.winner?.provider,
      amount: result.winner?.amount,
      source: result.winner?.source,
    }, result.status === 'selected' ? '✓ Comparison complete' : '○ No viable provider');

    return result;
  }

  getRegistry(): ProviderRegistry {
    return this.registry;
  }
}

function summarizeStates(resolutions: ProviderResolution[]): Record<string, ProviderResolution['state']> {
  return Object.fromEntries(resolutions.map((resolution) => [resolution.provider, resolution.state]));
}
