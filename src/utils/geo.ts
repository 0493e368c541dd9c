import type { Coordinates } from '../types/Ride';

const EARTH_RADIUS_KM = 6371;

function toRadians(deg: number): number {
  return deg * (Math.PI / 180);
}

/**
 * Great-circle distance between two points (haversine)
 */
export function distanceKm(from: Coordinates, to: Coordinates): number {
  const dLat = toRadians(to.latitude - from.latitude);
  const dLon = toRadians(to.longitude - from.longitude);
  const a =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos(toRadians(from.latitude)) * Math.cos(toRadians(to.latitude)) *
    Math.sin(dLon / 2) * Math.sin(dLon / 2);
  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
  return EARTH_RADIUS_KM * c;
}

/**
 * Returns the problems with a coordinate pair, empty when it is usable
 */
export function coordinateIssues(label: string, value: unknown): string[] {
  if (typeof value !== 'object' || value === null) {
    return [`${label} coordinates are missing`];
  }

  const issues: string[] = [];
  const latitude = 'latitude' in value ? value.latitude : undefined;
  const longitude = 'longitude' in value ? value.longitude : undefined;

  if (typeof latitude !== 'number' || !Number.isFinite(latitude)) {
    issues.push(`${label} latitude must be a finite number`);
  } else if (latitude < -90 || latitude > 90) {
    issues.push(`${label} latitude ${latitude} is outside [-90, 90]`);
  }

  if (typeof longitude !== 'number' || !Number.isFinite(longitude)) {
    issues.push(`${label} longitude must be a finite number`);
  } else if (longitude < -180 || longitude > 180) {
    issues.push(`${label} longitude ${longitude} is outside [-180, 180]`);
  }

  return issues;
}
