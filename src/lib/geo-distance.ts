/**
 * Geo Distance
 *
 * Great-circle distance between coordinates and coordinate helpers.
 */

import type { Coordinates } from "@/types/places";

export const EARTH_RADIUS_KM = 6371.2;

function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

function haversine(theta: number): number {
  return (1 - Math.cos(theta)) / 2;
}

/**
 * Haversine distance between two coordinates in kilometers
 */
export function calculateDistance(a: Coordinates, b: Coordinates): number {
  const φ1 = toRadians(a.latitude);
  const φ2 = toRadians(b.latitude);
  const Δφ = φ2 - φ1;
  const Δλ = toRadians(b.longitude) - toRadians(a.longitude);

  const h = haversine(Δφ) + Math.cos(φ1) * Math.cos(φ2) * haversine(Δλ);

  // Rounding can push h a hair above 1 for antipodal points
  return 2 * EARTH_RADIUS_KM * Math.asin(Math.sqrt(Math.min(1, h)));
}

/**
 * Build validated coordinates; throws when out of range
 */
export function createCoordinates(latitude: number, longitude: number): Coordinates {
  if (!Number.isFinite(latitude) || latitude < -90 || latitude > 90) {
    throw new Error("The latitude of the coordinate point must be between -90 and 90 degrees.");
  }
  if (!Number.isFinite(longitude) || longitude < -180 || longitude > 180) {
    throw new Error("The longitude of the coordinate point must be between -180 and 180 degrees.");
  }
  return Object.freeze({ latitude, longitude });
}

export function formatCoordinates(coordinates: Coordinates): string {
  return `${coordinates.latitude},${coordinates.longitude}`;
}

/**
 * Total length of a path visiting the coordinates in order
 */
export function pathLength(points: Coordinates[]): number {
  let total = 0;
  for (let i = 0; i < points.length - 1; i++) {
    total += calculateDistance(points[i], points[i + 1]);
  }
  return total;
}
