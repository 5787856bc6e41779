/**
 * Waypoint thinning: the inverse of resampling.
 *
 * Drops waypoints that sit within `minDistanceKm` of the last kept one,
 * always keeping the first and last point of the road.
 */

import type { Road, Waypoint } from "@roadgrid/types";
import { haversineDistance, samePosition } from "../geo/index.js";
import {
  DuplicateCoordinateConflictError,
  assertPositiveDistance,
  type RowIssue,
} from "../errors.js";

/**
 * Keep only waypoints more than `minDistanceKm` from the previously kept one.
 *
 * @throws InvalidParameterError for a non-positive distance
 * @throws DuplicateCoordinateConflictError when a different node repeats the
 *   last kept position
 */
export function thinRoad(road: Road, minDistanceKm: number): Waypoint[] {
  assertPositiveDistance(minDistanceKm, "minDistanceKm");

  const first = road[0];
  if (!first) return [];

  const kept: Waypoint[] = [first];
  let lastKept = first;
  let lastSeen = first;

  for (let i = 1; i < road.length; i++) {
    const point = road[i];
    if (!point) continue;

    if (samePosition(lastKept, point)) {
      if (lastKept.nodeId !== point.nodeId) {
        throw new DuplicateCoordinateConflictError(
          point.roadId,
          [lastKept.nodeId, point.nodeId],
          { lat: point.lat, lon: point.lon }
        );
      }
      continue;
    }

    lastSeen = point;
    if (haversineDistance(lastKept, point) > minDistanceKm) {
      kept.push(point);
      lastKept = point;
    }
  }

  if (lastSeen !== lastKept) kept.push(lastSeen);

  return kept;
}

/**
 * Thin a stream of roads.
 *
 * Conflicting roads are left out and recorded in `issues` under their
 * position in the stream, as in resampleRoads. The distance is checked
 * before the first road is read.
 */
export function thinRoads(
  roads: Iterable<Road>,
  minDistanceKm: number,
  issues: RowIssue[]
): Generator<Waypoint[]> {
  assertPositiveDistance(minDistanceKm, "minDistanceKm");
  return generateThinned(roads, minDistanceKm, issues);
}

function* generateThinned(
  roads: Iterable<Road>,
  minDistanceKm: number,
  issues: RowIssue[]
): Generator<Waypoint[]> {
  let index = 0;
  for (const road of roads) {
    let thinned: Waypoint[] | null = null;
    try {
      thinned = thinRoad(road, minDistanceKm);
    } catch (err) {
      if (!(err instanceof DuplicateCoordinateConflictError)) throw err;
      issues.push({ index, roadId: err.roadId, error: err });
    }
    if (thinned) yield thinned;
    index++;
  }
}
