/**
 * Distance-normalised waypoint resampling.
 *
 * Walks a road's original waypoints pair by pair and inserts synthetic
 * points so no two consecutive points are more than `minDistanceKm` apart.
 * Originals are never dropped or reordered; synthetic points are placed on
 * the chord between the two originals that bracket them.
 */

import type { Coordinate, Road, Waypoint } from "@roadgrid/types";
import {
  DISTANCE_PRECISION,
  haversineDistance,
  pointAtDistance,
  roundTo,
  samePosition,
} from "../geo/index.js";
import {
  DuplicateCoordinateConflictError,
  assertPositiveDistance,
  type RowIssue,
} from "../errors.js";
import { syntheticNodeId, type IdAllocator } from "./id-allocator.js";

/**
 * Resample one road so consecutive spacing never exceeds `minDistanceKm`.
 *
 * Distances are compared after rounding to DISTANCE_PRECISION decimals, so
 * floating noise cannot trigger an extra insertion and the result is stable
 * under a second pass.
 *
 * @param road - Ordered waypoints of a single road
 * @param minDistanceKm - Maximum spacing in km, must be positive
 * @param ids - Allocator for synthetic node ids
 * @returns The original waypoints with synthetic points interleaved
 * @throws InvalidParameterError for a non-positive distance
 * @throws DuplicateCoordinateConflictError when two different nodes share a position
 */
export function resampleRoad(
  road: Road,
  minDistanceKm: number,
  ids: IdAllocator
): Waypoint[] {
  assertPositiveDistance(minDistanceKm, "minDistanceKm");

  const first = road[0];
  if (!first) return [];

  const output: Waypoint[] = [first];
  let previousOriginal = first;
  let current: Waypoint = first;

  for (let i = 1; i < road.length; i++) {
    const end = road[i];
    if (!end) continue;

    if (samePosition(previousOriginal, end)) {
      if (previousOriginal.nodeId !== end.nodeId) {
        throw new DuplicateCoordinateConflictError(
          end.roadId,
          [previousOriginal.nodeId, end.nodeId],
          { lat: end.lat, lon: end.lon }
        );
      }
      // Same node repeated: zero-length hop, nothing to split
      continue;
    }

    let distance = haversineDistance(current, end);
    while (roundTo(distance, DISTANCE_PRECISION) > minDistanceKm) {
      const position = stepToward(current, end, minDistanceKm, distance);
      const synthetic: Waypoint = {
        roadId: end.roadId,
        nodeId: syntheticNodeId(ids.next()),
        lat: position.lat,
        lon: position.lon,
      };
      output.push(synthetic);
      current = synthetic;
      distance = haversineDistance(current, end);
    }

    output.push(end);
    current = end;
    previousOriginal = end;
  }

  return output;
}

/** A synthetic hop within this many km of the target is on target */
const STEP_TOLERANCE_KM = 1e-9;

/** Upper bound on correction passes per synthetic point */
const MAX_STEP_CORRECTIONS = 8;

/**
 * Position `stepKm` from `from` along the chord to `to`.
 *
 * Degree-space interpolation is only distance-linear on the equator and
 * along meridians, so the chord fraction is rescaled against the measured
 * Haversine length until the hop is within STEP_TOLERANCE_KM of `stepKm`.
 */
function stepToward(
  from: Coordinate,
  to: Coordinate,
  stepKm: number,
  totalKm: number
): Coordinate {
  let targetKm = stepKm;
  let point = pointAtDistance(from, to, targetKm, totalKm);

  for (let pass = 0; pass < MAX_STEP_CORRECTIONS; pass++) {
    const actual = haversineDistance(from, point);
    if (actual === 0 || Math.abs(actual - stepKm) <= STEP_TOLERANCE_KM) break;
    targetKm *= stepKm / actual;
    point = pointAtDistance(from, to, targetKm, totalKm);
  }

  return point;
}

/**
 * Resample a stream of roads.
 *
 * A road with a duplicate-coordinate conflict is left out and the conflict
 * is appended to `issues` under the road's position in the stream; the
 * remaining roads are still produced. The distance is checked before the
 * first road is read.
 *
 * @param roads - Roads in input order
 * @param minDistanceKm - Maximum spacing in km
 * @param ids - Allocator for synthetic node ids
 * @param issues - Sink for recoverable problems
 */
export function resampleRoads(
  roads: Iterable<Road>,
  minDistanceKm: number,
  ids: IdAllocator,
  issues: RowIssue[]
): Generator<Waypoint[]> {
  assertPositiveDistance(minDistanceKm, "minDistanceKm");
  return generateResampled(roads, minDistanceKm, ids, issues);
}

function* generateResampled(
  roads: Iterable<Road>,
  minDistanceKm: number,
  ids: IdAllocator,
  issues: RowIssue[]
): Generator<Waypoint[]> {
  let index = 0;
  for (const road of roads) {
    let resampled: Waypoint[] | null = null;
    try {
      resampled = resampleRoad(road, minDistanceKm, ids);
    } catch (err) {
      if (!(err instanceof DuplicateCoordinateConflictError)) throw err;
      issues.push({ index, roadId: err.roadId, error: err });
    }
    if (resampled) yield resampled;
    index++;
  }
}
