/**
 * Data ingestion module.
 *
 * Pipeline:
 * Overpass API -> waypoint rows -> validated roads
 */

export { parseWaypointRow, readRoads, type ParsedRow } from "./rows.js";
export { parseWaypointCsv } from "./csv.js";
export {
  buildRoadQuery,
  fetchRoadData,
  parseRoadResponse,
  roadIdForWay,
  defaultCacheDir,
  queryCacheKey,
  readCachedResponse,
  writeCachedResponse,
  getCachePath,
  DEFAULT_ENDPOINT,
  DEFAULT_TIMEOUT,
  UNNAMED_ROAD,
  type OverpassOptions,
  type RoadDataResult,
} from "./overpass/index.js";
