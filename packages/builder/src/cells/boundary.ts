/**
 * Cell-boundary interpolation.
 *
 * When a road hops from inside a cell to outside it, the hop is split into
 * its latitude-aligned and longitude-aligned legs. On each axis the outside
 * point overshoots, the offset from the inside point to the bound divided by
 * the full leg is the fraction of the chord at which that bound is reached
 * (similar right triangles share the ratio). Whichever bound is reached first
 * is the one the road actually crosses.
 */

import type { Cell, Coordinate } from "@roadgrid/types";
import { haversineDistance, pointAtDistance } from "../geo/index.js";

/**
 * Fraction of the hop `from → to` at which the coordinate leaves `[min, max]`,
 * or Infinity when `to` stays within the range on this axis.
 */
function axisCrossingFraction(
  from: number,
  to: number,
  min: number,
  max: number
): number {
  if (to >= max) return (max - from) / (to - from);
  if (to <= min) return (min - from) / (to - from);
  return Infinity;
}

/**
 * Point where the hop from `inside` to `outside` meets the cell edge.
 *
 * `inside` must satisfy inCell; `outside` must not. The coordinate on the
 * crossed axis is snapped to the exact bound so the result lies on the edge.
 */
export function boundaryCrossing(
  inside: Coordinate,
  outside: Coordinate,
  cell: Cell
): Coordinate {
  const latFraction = axisCrossingFraction(inside.lat, outside.lat, cell.minLat, cell.maxLat);
  const lonFraction = axisCrossingFraction(inside.lon, outside.lon, cell.minLon, cell.maxLon);
  const fraction = Math.min(latFraction, lonFraction, 1);

  const totalKm = haversineDistance(inside, outside);
  const point = pointAtDistance(inside, outside, fraction * totalKm, totalKm);

  if (latFraction <= lonFraction && latFraction <= 1) {
    point.lat = outside.lat >= cell.maxLat ? cell.maxLat : cell.minLat;
  }
  if (lonFraction <= latFraction && lonFraction <= 1) {
    point.lon = outside.lon >= cell.maxLon ? cell.maxLon : cell.minLon;
  }

  return point;
}
