import type { SimulationPricing } from '../providers/ProviderAdapter';

/**
 * Fallback pricing tables, approximate US city rates
 * Used only when a live quote cannot be had
 */

export const UBER_PRICING: SimulationPricing = {
  currency: 'USD',
  baseFare: 2.55,
  perKm: 0.81,
  perMinute: 0.35,
  minimumFare: 8,
  averageSpeedKmh: 24,
  classMultipliers: { standard: 1, shared: 0.8, xl: 1.6, premium: 2.4 },
};

export const LYFT_PRICING: SimulationPricing = {
  currency: 'USD',
  baseFare: 2.3,
  perKm: 0.78,
  perMinute: 0.33,
  minimumFare: 7.5,
  averageSpeedKmh: 24,
  classMultipliers: { standard: 1, shared: 0.8, xl: 1.55, premium: 2.3 },
};

// Demo has no shared rides
export const DEMO_PRICING: SimulationPricing = {
  currency: 'USD',
  baseFare: 3,
  perKm: 0.9,
  perMinute: 0.3,
  minimumFare: 9,
  averageSpeedKmh: 25,
  classMultipliers: { standard: 1, xl: 1.5, premium: 2.2 },
};

/** Units of USD per unit of each currency */
export const USD_EXCHANGE_RATES: Record<string, number> = {
  USD: 1,
  CAD: 0.73,
  EUR: 1.08,
  GBP: 1.27,
  AUD: 0.66,
  INR: 0.012,
};
