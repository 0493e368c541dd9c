import { VEHICLE_CLASSES } from '../types/Ride';
import type { Coordinates, RideRequest, VehicleClass } from '../types/Ride';
import { coordinateIssues } from './geo';
import { InvalidRequestError } from './errors';

export function isVehicleClass(value: unknown): value is VehicleClass {
  return typeof value === 'string' && VEHICLE_CLASSES.some((vehicleClass) => vehicleClass === value);
}

/**
 * Check a request that arrived from outside the core
 * @throws InvalidRequestError listing every problem found
 */
export function assertValidRideRequest(request: unknown): asserts request is RideRequest {
  if (typeof request !== 'object' || request === null) {
    throw new InvalidRequestError(['request must be an object']);
  }

  const issues = [
    ...coordinateIssues('pickup', 'pickup' in request ? request.pickup : undefined),
    ...coordinateIssues('dropoff', 'dropoff' in request ? request.dropoff : undefined),
  ];

  const vehicleClass = 'vehicleClass' in request ? request.vehicleClass : undefined;
  if (!isVehicleClass(vehicleClass)) {
    issues.push(`unrecognized vehicle class '${String(vehicleClass)}' (expected one of ${VEHICLE_CLASSES.join(', ')})`);
  }

  if (issues.length > 0) {
    throw new InvalidRequestError(issues);
  }
}

/**
 * Build an immutable RideRequest
 */
export function createRideRequest(input: {
  pickup: Coordinates;
  dropoff: Coordinates;
  vehicleClass: string;
}): RideRequest {
  assertValidRideRequest(input);

  return Object.freeze({
    pickup: Object.freeze({ latitude: input.pickup.latitude, longitude: input.pickup.longitude }),
    dropoff: Object.freeze({ latitude: input.dropoff.latitude, longitude: input.dropoff.longitude }),
    vehicleClass: input.vehicleClass,
  });
}

// Free-text needs accepted by the text endpoint
const VEHICLE_NEED_ALIASES: Record<string, VehicleClass> = {
  cheapest: 'standard',
  standard: 'standard',
  economy: 'standard',
  x: 'standard',
  shared: 'shared',
  pool: 'shared',
  xl: 'xl',
  suv: 'xl',
  '6 seats': 'xl',
  '6-seats': 'xl',
  black: 'premium',
  lux: 'premium',
  premium: 'premium',
};

/**
 * Map a free-text vehicle need ("cheapest", "XL", "black", "6 seats") to a class
 * Returns null when the need is not recognized
 */
export function parseVehicleNeed(need: string | undefined): VehicleClass | null {
  const key = (need ?? '').trim().toLowerCase().replace(/\s+/g, ' ');
  if (key === '') {
    return 'standard';
  }
  return VEHICLE_NEED_ALIASES[key] ?? null;
}
