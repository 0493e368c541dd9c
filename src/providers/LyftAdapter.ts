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
 * Lyft cost estimates
 * https://developer.lyft.com/reference/cost-estimates
 */

// =============================================================================
// Types
// =============================================================================

export interface LyftCostEstimate {
  ride_type: string;
  display_name: string;
  currency: string;
  estimated_cost_cents_min: number | null;
  estimated_cost_cents_max?: number | null;
  estimated_duration_seconds?: number;
  estimated_distance_miles?: number;
  primetime_percentage?: string;
  is_valid_estimate: boolean;
}

interface LyftCostResponse {
  cost_estimates: LyftCostEstimate[];
}

interface LyftTokenResponse {
  access_token: string;
  token_type: string;
  expires_in: number;
}

export interface LyftAdapterConfig {
  clientId?: string;
  clientSecret?: string;
  baseUrl?: string;
  timeoutMs?: number;
  priority?: number;
  simulation?: SimulationPricing;
  heuristic?: SimulationHeuristic;
}

const RIDE_TYPES: Record<VehicleClass, string> = {
  standard: 'lyft',
  shared: 'lyft_shared',
  premium: 'lyft_lux',
  xl: 'lyft_plus',
};

// Refresh the access token this long before Lyft says it expires
const TOKEN_EXPIRY_MARGIN_MS = 60_000;

// =============================================================================
// Lyft Adapter Implementation
// =============================================================================

export class LyftAdapter implements LiveProviderAdapter<LyftCostEstimate> {
  readonly mode = 'live';
  readonly name = 'lyft';
  readonly priority: number;
  readonly timeoutMs: number;
  readonly simulation?: SimulationPricing;
  readonly heuristic?: SimulationHeuristic;
  private readonly clientId: string;
  private readonly clientSecret: string;
  private readonly baseUrl: string;
  private readonly logger = createLogger({ component: 'LyftAdapter' });
  private accessToken: { value: string; expiresAt: number } | null = null;

  constructor(config: LyftAdapterConfig = {}) {
    this.clientId = config.clientId ?? '';
    this.clientSecret = config.clientSecret ?? '';
    this.baseUrl = config.baseUrl ?? 'https://api.lyft.com';
    this.timeoutMs = config.timeoutMs ?? 5000;
    this.priority = config.priority ?? 0;
    this.simulation = config.simulation;
    this.heuristic = config.heuristic;
  }

  async requestQuote(request: RideRequest, signal: AbortSignal): Promise<AdapterOutcome<LyftCostEstimate>> {
    if (!this.clientId || !this.clientSecret) {
      return failed('access_denied', 'no Lyft client credentials configured');
    }

    const rideType = RIDE_TYPES[request.vehicleClass];

    try {
      const token = await this.getAccessToken(signal);

      this.logger.debug({ rideType }, 'Requesting Lyft cost estimate...');

      const response = await axios.get<LyftCostResponse>(`${this.baseUrl}/v1/cost`, {
        params: {
          start_lat: request.pickup.latitude,
          start_lng: request.pickup.longitude,
          end_lat: request.dropoff.latitude,
          end_lng: request.dropoff.longitude,
          ride_type: rideType,
        },
        headers: { Authorization: `Bearer ${token}` },
        timeout: this.timeoutMs,
        signal,
      });

      const estimate = response.data?.cost_estimates?.find((entry) => entry.ride_type === rideType);
      if (!estimate || !estimate.is_valid_estimate) {
        return failed('no_coverage', `no valid Lyft estimate for ${rideType}`);
      }

      return quoted(estimate);
    } catch (error) {
      if (axios.isAxiosError(error)) {
        this.logger.error({
          error: error.message,
          status: error.response?.status,
        }, 'Lyft API error');

        if (error.response?.status === 401) {
          this.accessToken = null;
        }
        if (errorCode(error.response?.data) === 'no_service_in_area') {
          return failed('no_coverage', 'no_service_in_area');
        }
      } else {
        this.logger.error({ error }, 'Error fetching Lyft estimate');
      }

      const { failure, reason } = classifyHttpError(error);
      return failed(failure, reason);
    }
  }

  parseQuote(raw: LyftCostEstimate): QuoteFields {
    if (raw.estimated_cost_cents_min === null || raw.estimated_cost_cents_min === undefined) {
      throw new Error(`${raw.ride_type} has no cost estimate`);
    }

    return {
      amount: raw.estimated_cost_cents_min / 100,
      currency: raw.currency,
      upperAmount: typeof raw.estimated_cost_cents_max === 'number' ? raw.estimated_cost_cents_max / 100 : undefined,
      durationSeconds: raw.estimated_duration_seconds,
    };
  }

  /**
   * Client-credentials token, reused until shortly before it expires
   */
  private async getAccessToken(signal: AbortSignal): Promise<string> {
    if (this.accessToken && this.accessToken.expiresAt > Date.now()) {
      return this.accessToken.value;
    }

    const response = await axios.post<LyftTokenResponse>(
      `${this.baseUrl}/oauth/token`,
      { grant_type: 'client_credentials', scope: 'public' },
      {
        auth: { username: this.clientId, password: this.clientSecret },
        timeout: this.timeoutMs,
        signal,
      }
    );

    const { access_token: value, expires_in: expiresIn } = response.data;
    this.accessToken = {
      value,
      expiresAt: Date.now() + expiresIn * 1000 - TOKEN_EXPIRY_MARGIN_MS,
    };
    this.logger.debug({ expiresIn }, 'Obtained Lyft access token');

    return value;
  }
}

function errorCode(data: unknown): string | undefined {
  if (typeof data === 'object' && data !== null && 'error' in data && typeof data.error === 'string') {
    return data.error;
  }
  return undefined;
}
