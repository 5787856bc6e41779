/**
 * Road geometry as exchanged between ingestion, the engine and export.
 */

import type { Coordinate } from "./geo.js";

/** A single point of a road, in discovery order */
export interface Waypoint extends Coordinate {
  /** Road (OSM way) this point belongs to */
  roadId: string;
  /** OSM node id, or a synthetic id for points fabricated by the engine */
  nodeId: string;
}

/**
 * Raw input row as supplied by a data source.
 *
 * Coordinates may arrive as text (CSV, XML attributes) and ids as numbers
 * (OSM element ids); both are validated before use.
 */
export interface WaypointRow {
  roadId: string | number;
  nodeId: string | number;
  lat: string | number;
  lon: string | number;
}

/** A road: ordered, non-empty waypoints sharing one roadId */
export type Road = readonly Waypoint[];

/** How a partition treats the hop where a road leaves or enters a cell */
export type BoundaryMode = "drop" | "interpolate";

/** One output row of a cell partition */
export interface CellRow {
  /** Cell label, `"<minLat,minLon,maxLat,maxLon>_<cellId>"` */
  cell: string;
  roadId: string;
  /** Node id, suffixed `_segment_<k>` when the road has several inside-runs */
  nodeId: string;
  lat: number;
  lon: number;
}
