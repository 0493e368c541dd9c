import { failed, isAdapterOutcome } from '../providers/ProviderAdapter';
import type {
  AdapterOutcome,
  LiveProviderAdapter,
  ProviderAdapter,
  SimulationHeuristic,
} from '../providers/ProviderAdapter';
import type { ProviderResolution, RideRequest } from '../types/Ride';
import { ComparisonCancelledError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { distanceTimeHeuristic } from './FareSimulator';
import { nonViableEstimate, normalizeQuote, normalizeSimulatedFare, SIMULATED_NOTE } from './Normalizer';
import type { NormalizationPolicy } from './Normalizer';
import type { ProviderRegistry } from './ProviderRegistry';

export interface ResilienceOptions {
  policy: NormalizationPolicy;
  /** Budget for a whole comparison; slower providers fall back to simulation */
  deadlineMs: number;
  /** Used for adapters that bring no heuristic of their own */
  heuristic?: SimulationHeuristic;
}

/**
 * Drives every registered provider through one comparison.
 *
 * Each provider ends in exactly one state:
 * - live_succeeded: live quote normalized
 * - simulated: live access denied, unavailable, timed out or crashed, or the
 *   provider is simulation-only
 * - non_viable: no coverage, malformed quote, or nothing to simulate with
 *
 * Providers run concurrently and are joined before anything is returned.
 */
export class ResilienceController {
  private readonly logger = createLogger({ component: 'ResilienceController' });
  private readonly heuristic: SimulationHeuristic;

  constructor(
    private readonly registry: ProviderRegistry,
    private readonly options: ResilienceOptions
  ) {
    this.heuristic = options.heuristic ?? distanceTimeHeuristic;
  }

  /**
   * Resolve every provider for one request, in registry order
   * @throws ComparisonCancelledError when `signal` aborts first
   */
  async collect(request: RideRequest, signal?: AbortSignal): Promise<ProviderResolution[]> {
    if (signal?.aborted) {
      throw new ComparisonCancelledError();
    }

    const deadlineAt = Date.now() + this.options.deadlineMs;
    const inFlight = new AbortController();
    const tasks = Promise.all(
      this.registry.list().map((adapter) => this.resolve(adapter, request, deadlineAt, inFlight.signal))
    );

    if (!signal) {
      return tasks;
    }

    const cancellation = rejectOnAbort(signal, () => {
      this.logger.info('Comparison cancelled, abandoning in-flight providers');
      inFlight.abort();
    });

    try {
      return await Promise.race([tasks, cancellation.promise]);
    } finally {
      cancellation.dispose();
    }
  }

  /**
   * Never rejects: a fault anywhere in the provider's path is simulated over
   */
  private async resolve(
    adapter: ProviderAdapter,
    request: RideRequest,
    deadlineAt: number,
    signal: AbortSignal
  ): Promise<ProviderResolution> {
    try {
      return await this.resolveProvider(adapter, request, deadlineAt, signal);
    } catch (error) {
      this.logger.error({ provider: adapter.name, error }, 'Provider resolution failed');
      const message = error instanceof Error ? error.message : String(error);
      return this.simulate(adapter, request, `unavailable: adapter fault: ${message}`);
    }
  }

  private async resolveProvider(
    adapter: ProviderAdapter,
    request: RideRequest,
    deadlineAt: number,
    signal: AbortSignal
  ): Promise<ProviderResolution> {
    if (adapter.mode === 'simulation-only') {
      return this.simulate(adapter, request, 'simulation-only provider');
    }

    const outcome = await this.attempt(adapter, request, deadlineAt, signal);

    if (outcome.ok) {
      const estimate = normalizeQuote(adapter, outcome.quote, this.options.policy);
      if (!estimate.viable) {
        this.logger.warn({ provider: adapter.name, reason: estimate.reason }, 'Live quote rejected');
        return { provider: adapter.name, state: 'non_viable', estimate };
      }
      this.logger.debug({ provider: adapter.name, amount: estimate.amount }, 'Live quote received');
      return { provider: adapter.name, state: 'live_succeeded', estimate };
    }

    if (outcome.failure === 'no_coverage') {
      this.logger.info({ provider: adapter.name, reason: outcome.reason }, 'Provider does not cover this request');
      return {
        provider: adapter.name,
        state: 'non_viable',
        estimate: nonViableEstimate(adapter.name, 'live', this.options.policy, `no coverage: ${outcome.reason}`),
      };
    }

    this.logger.warn({ provider: adapter.name, failure: outcome.failure, reason: outcome.reason }, 'Live quote failed, falling back to simulation');
    return this.simulate(adapter, request, `${outcome.failure}: ${outcome.reason}`);
  }

  /**
   * One live attempt, bounded by the adapter timeout and the request deadline.
   * Never rejects.
   */
  private async attempt(
    adapter: LiveProviderAdapter,
    request: RideRequest,
    deadlineAt: number,
    parent: AbortSignal
  ): Promise<AdapterOutcome<unknown>> {
    const remaining = Math.max(0, deadlineAt - Date.now());
    const budgetMs = Math.min(adapter.timeoutMs, remaining);
    const expiry = budgetMs < adapter.timeoutMs
      ? `request deadline reached after ${budgetMs}ms`
      : `timed out after ${budgetMs}ms`;

    const controller = new AbortController();
    const abortFromParent = () => controller.abort();
    parent.addEventListener('abort', abortFromParent, { once: true });

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<AdapterOutcome<unknown>>((resolve) => {
      timer = setTimeout(() => {
        // Settle before aborting so the expiry wins the race
        resolve(failed('unavailable', expiry));
        controller.abort();
      }, budgetMs);
    });

    try {
      const outcome: unknown = await Promise.race([adapter.requestQuote(request, controller.signal), timedOut]);
      if (!isAdapterOutcome(outcome)) {
        this.logger.error({ provider: adapter.name, outcome }, 'Adapter returned an invalid outcome');
        return failed('unavailable', 'adapter fault: invalid outcome from requestQuote');
      }
      return outcome;
    } catch (error) {
      this.logger.error({ provider: adapter.name, error }, 'Adapter fault');
      const message = error instanceof Error ? error.message : String(error);
      return failed('unavailable', `adapter fault: ${message}`);
    } finally {
      clearTimeout(timer);
      parent.removeEventListener('abort', abortFromParent);
    }
  }

  private simulate(adapter: ProviderAdapter, request: RideRequest, trigger: string): ProviderResolution {
    const { policy } = this.options;
    const nonViable = (reason: string): ProviderResolution => ({
      provider: adapter.name,
      state: 'non_viable',
      estimate: nonViableEstimate(adapter.name, 'simulated', policy, reason),
    });

    if (!adapter.simulation) {
      return nonViable(`${trigger}; no simulation pricing configured`);
    }

    const heuristic = adapter.heuristic ?? this.heuristic;
    let fare: ReturnType<SimulationHeuristic>;
    try {
      fare = heuristic(request, adapter.simulation);
    } catch (error) {
      this.logger.error({ provider: adapter.name, error }, 'Simulation heuristic failed');
      const message = error instanceof Error ? error.message : String(error);
      return nonViable(`${trigger}; simulation failed: ${message}`);
    }

    if (!fare) {
      return nonViable(`${trigger}; no simulated fare for ${request.vehicleClass}`);
    }

    const estimate = normalizeSimulatedFare(adapter.name, fare, policy);
    if (!estimate.viable) {
      return { provider: adapter.name, state: 'non_viable', estimate };
    }

    this.logger.debug({ provider: adapter.name, amount: estimate.amount, trigger }, 'Simulated estimate');
    return {
      provider: adapter.name,
      state: 'simulated',
      estimate: { ...estimate, note: `${SIMULATED_NOTE} (${trigger})` },
    };
  }
}

function rejectOnAbort(signal: AbortSignal, onAbort: () => void): { promise: Promise<never>; dispose: () => void } {
  let dispose = () => {};
  const promise = new Promise<never>((_resolve, reject) => {
    const listener = () => {
      onAbort();
      reject(new ComparisonCancelledError());
    };
    signal.addEventListener('abort', listener, { once: true });
    dispose = () => signal.removeEventListener('abort', listener);
  });
  return { promise, dispose: () => dispose() };
}
