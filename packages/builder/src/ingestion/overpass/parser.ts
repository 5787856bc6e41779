/**
 * Overpass JSON response parser.
 *
 * Flattens highway ways into waypoint rows, one road after another, ready
 * for the resampler and the cell partitioner.
 *
 * With `out body geom;`, each way carries `nodes[]` (OSM node ids) and a
 * parallel `geometry[]` (inline lat/lon): geometry[i] is the position of
 * nodes[i].
 */

import type { WaypointRow } from "@roadgrid/types";
import type { OverpassJson, OverpassWay } from "overpass-ts";

/** Name used for ways without a `name` tag */
export const UNNAMED_ROAD = "Not named";

/**
 * Road id for a way: `"<way id> <name>"`.
 */
export function roadIdForWay(way: OverpassWay): string {
  return `${way.id} ${way.tags?.["name"] ?? UNNAMED_ROAD}`;
}

/**
 * Parse an Overpass JSON response into waypoint rows.
 *
 * Rows of one way are contiguous and in way order; ways keep response
 * order. Ways without a highway tag or without geometry are skipped.
 *
 * @param response - Overpass JSON response from fetchRoadData()
 */
export function* parseRoadResponse(response: OverpassJson): Generator<WaypointRow> {
  for (const element of response.elements) {
    if (element.type !== "way") continue;
    const way = element as OverpassWay;

    if (!way.tags?.["highway"]) continue;
    if (!way.geometry) continue;

    const roadId = roadIdForWay(way);
    for (let i = 0; i < way.nodes.length; i++) {
      const nodeId = way.nodes[i];
      const geom = way.geometry[i];
      // Null geometry entries are nodes Overpass clipped away
      if (nodeId === undefined || !geom) continue;

      yield { roadId, nodeId: String(nodeId), lat: geom.lat, lon: geom.lon };
    }
  }
}
