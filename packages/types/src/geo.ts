/**
 * Geographic utility types.
 */

/** A WGS84 position in decimal degrees */
export interface Coordinate {
  lat: number;
  lon: number;
}

/**
 * Axis-aligned rectangular query region in WGS84 coordinates.
 *
 * A valid cell has finite bounds with `minLat < maxLat` and `minLon < maxLon`.
 */
export interface Cell {
  minLat: number;
  minLon: number;
  maxLat: number;
  maxLon: number;
}
