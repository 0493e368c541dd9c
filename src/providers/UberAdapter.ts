import axios from 'axios';
import type { QuoteFields, RideRequest, VehicleClass } from '../types/Ride';
import { createLogger } from '../utils/logger';
import { classifyHttpError, failed, quoted } from './ProviderAdapter';
import type {
  AdapterOutcome,
  LiveProviderAdapter,
  SimulationHeuristic,
  SimulationPricing,
} from './ProviderAdapter';

/**
 * Uber price estimates
 * https://developer.uber.com/docs/riders/references/api/v1.2/estimates-price-get
 */

// =============================================================================
// Types
// =============================================================================

export interface UberPriceEstimate {
  product_id: string;
  display_name: string;
  localized_display_name?: string;
  currency_code: string;
  estimate: string;
  /** null for metered products */
  low_estimate: number | null;
  high_estimate: number | null;
  surge_multiplier?: number;
  duration?: number;
  distance?: number;
}

interface UberPriceResponse {
  prices: UberPriceEstimate[];
}

export interface UberAdapterConfig {
  serverToken?: string;
  baseUrl?: string;
  timeoutMs?: number;
  priority?: number;
  simulation?: SimulationPricing;
  heuristic?: SimulationHeuristic;
}

// Product display names (lowercased, spaces removed) per vehicle class
const PRODUCTS_BY_CLASS: Record<VehicleClass, string[]> = {
  standard: ['uberx'],
  shared: ['uberpool', 'uberxshare', 'share'],
  premium: ['uberblack', 'black'],
  xl: ['uberxl'],
};

// =============================================================================
// Uber Adapter Implementation
// =============================================================================

export class UberAdapter implements LiveProviderAdapter<UberPriceEstimate> {
  readonly mode = 'live';
  readonly name = 'uber';
  readonly priority: number;
  readonly timeoutMs: number;
  readonly simulation?: SimulationPricing;
  readonly heuristic?: SimulationHeuristic;
  private readonly serverToken: string;
  private readonly baseUrl: string;
  private readonly logger = createLogger({ component: 'UberAdapter' });

  constructor(config: UberAdapterConfig = {}) {
    this.serverToken = config.serverToken ?? '';
    this.baseUrl = config.baseUrl ?? 'https://api.uber.com';
    this.timeoutMs = config.timeoutMs ?? 5000;
    this.priority = config.priority ?? 0;
    this.simulation = config.simulation;
    this.heuristic = config.heuristic;
  }

  async requestQuote(request: RideRequest, signal: AbortSignal): Promise<AdapterOutcome<UberPriceEstimate>> {
    if (!this.serverToken) {
      return failed('access_denied', 'no Uber server token configured');
    }

    try {
      this.logger.debug({ vehicleClass: request.vehicleClass }, 'Requesting Uber price estimates...');

      const response = await axios.get<UberPriceResponse>(`${this.baseUrl}/v1.2/estimates/price`, {
        params: {
          start_latitude: request.pickup.latitude,
          start_longitude: request.pickup.longitude,
          end_latitude: request.dropoff.latitude,
          end_longitude: request.dropoff.longitude,
        },
        headers: {
          Authorization: `Token ${this.serverToken}`,
          'Accept-Language': 'en_US',
        },
        timeout: this.timeoutMs,
        signal,
      });

      const prices = response.data?.prices;
      if (!Array.isArray(prices) || prices.length === 0) {
        return failed('no_coverage', 'no Uber products at pickup location');
      }

      const product = this.findProduct(prices, request.vehicleClass);
      if (!product) {
        return failed('no_coverage', `no Uber product for ${request.vehicleClass}`);
      }

      this.logger.debug({ product: product.display_name, estimate: product.estimate }, 'Uber estimate received');
      return quoted(product);
    } catch (error) {
      const { failure, reason } = classifyHttpError(error);
      if (axios.isAxiosError(error)) {
        this.logger.error({
          error: error.message,
          status: error.response?.status,
        }, 'Uber API error');
      } else {
        this.logger.error({ error }, 'Error fetching Uber estimates');
      }
      return failed(failure, reason);
    }
  }

  parseQuote(raw: UberPriceEstimate): QuoteFields {
    if (raw.low_estimate === null || raw.low_estimate === undefined) {
      throw new Error(`${raw.display_name} has no fixed estimate (${raw.estimate})`);
    }

    return {
      amount: Number(raw.low_estimate),
      currency: raw.currency_code,
      upperAmount: raw.high_estimate ?? undefined,
      durationSeconds: raw.duration,
    };
  }

  private findProduct(prices: UberPriceEstimate[], vehicleClass: VehicleClass): UberPriceEstimate | undefined {
    const wanted = PRODUCTS_BY_CLASS[vehicleClass];
    return prices.find((price) =>
      wanted.includes((price.display_name ?? '').toLowerCase().replace(/\s+/g, ''))
    );
  }
}
