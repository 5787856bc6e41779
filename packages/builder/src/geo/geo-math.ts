/**
 * Spherical-earth distance and interpolation primitives.
 *
 * All coordinates are exchanged in degrees; conversion to radians happens
 * here and nowhere else. Distances are kilometers.
 */

import type { Coordinate } from "@roadgrid/types";

/** Mean Earth radius in km */
export const EARTH_RADIUS_KM = 6371;

/** Decimal places used when comparing computed distances */
export const DISTANCE_PRECISION = 6;

const DEG_TO_RAD = Math.PI / 180;

/**
 * Round to a fixed number of decimal places.
 */
export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/**
 * Great-circle distance between two coordinates using the Haversine formula.
 *
 * Latitude and longitude deltas are plain differences; there is no wrap
 * across the antimeridian, so inputs spanning ±180° are out of range.
 *
 * @returns Distance in kilometers
 */
export function haversineDistance(a: Coordinate, b: Coordinate): number {
  const lat1 = a.lat * DEG_TO_RAD;
  const lat2 = b.lat * DEG_TO_RAD;
  const dLat = (b.lat - a.lat) * DEG_TO_RAD;
  const dLon = (b.lon - a.lon) * DEG_TO_RAD;

  const sinDLat = Math.sin(dLat / 2);
  const sinDLon = Math.sin(dLon / 2);

  const c =
    sinDLat * sinDLat + Math.cos(lat2) * Math.cos(lat1) * sinDLon * sinDLon;

  return 2 * Math.atan2(Math.sqrt(c), Math.sqrt(1 - c)) * EARTH_RADIUS_KM;
}

/**
 * Point at `ratio` of the way from `start` to `end`.
 *
 * Linear in degree space, not along the geodesic. Good for the short hops
 * between neighbouring road nodes.
 */
export function pointAtRatio(
  start: Coordinate,
  end: Coordinate,
  ratio: number
): Coordinate {
  return {
    lat: start.lat + ratio * (end.lat - start.lat),
    lon: start.lon + ratio * (end.lon - start.lon),
  };
}

/**
 * Point on the chord from `far` toward `near` whose distance fraction from
 * `far` is `targetKm / totalKm`.
 *
 * A zero-length chord yields `far`.
 */
export function pointAtDistance(
  far: Coordinate,
  near: Coordinate,
  targetKm: number,
  totalKm: number
): Coordinate {
  if (totalKm === 0) return { lat: far.lat, lon: far.lon };
  return pointAtRatio(far, near, targetKm / totalKm);
}

/**
 * Total length of a polyline in kilometers.
 */
export function pathLength(points: readonly Coordinate[]): number {
  let total = 0;
  for (let i = 1; i < points.length; i++) {
    const prev = points[i - 1];
    const cur = points[i];
    if (prev && cur) total += haversineDistance(prev, cur);
  }
  return total;
}

/**
 * Midpoint of the lat/lon extent covered by `points`.
 *
 * @returns The midpoint, or null for an empty list
 */
export function roadMidpoint(points: readonly Coordinate[]): Coordinate | null {
  if (points.length === 0) return null;

  let minLat = Infinity,
    maxLat = -Infinity;
  let minLon = Infinity,
    maxLon = -Infinity;

  for (const p of points) {
    minLat = Math.min(minLat, p.lat);
    maxLat = Math.max(maxLat, p.lat);
    minLon = Math.min(minLon, p.lon);
    maxLon = Math.max(maxLon, p.lon);
  }

  return {
    lat: (maxLat - minLat) / 2 + minLat,
    lon: (maxLon - minLon) / 2 + minLon,
  };
}

/** True when two coordinates are identical */
export function samePosition(a: Coordinate, b: Coordinate): boolean {
  return a.lat === b.lat && a.lon === b.lon;
}
