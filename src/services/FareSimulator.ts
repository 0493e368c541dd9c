import type { SimulationHeuristic } from '../providers/ProviderAdapter';
import { distanceKm } from '../utils/geo';

/** Great-circle distance understates street distance by roughly this much */
export const ROAD_DISTANCE_FACTOR = 1.3;

/**
 * Default fallback pricing: base fare plus distance and time charges, scaled
 * by the vehicle class multiplier and floored at the minimum fare.
 */
export const distanceTimeHeuristic: SimulationHeuristic = (request, pricing) => {
  const multiplier = pricing.classMultipliers[request.vehicleClass];
  if (multiplier === undefined) {
    return null;
  }

  const roadKm = distanceKm(request.pickup, request.dropoff) * ROAD_DISTANCE_FACTOR;
  const minutes = pricing.averageSpeedKmh > 0 ? (roadKm / pricing.averageSpeedKmh) * 60 : 0;

  const metered = pricing.baseFare + pricing.perKm * roadKm + pricing.perMinute * minutes;
  const amount = Math.max(metered * multiplier, pricing.minimumFare);

  return {
    amount,
    currency: pricing.currency,
    durationSeconds: Math.round(minutes * 60),
  };
};
