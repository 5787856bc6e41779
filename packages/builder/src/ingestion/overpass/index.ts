/**
 * Overpass API ingestion module.
 *
 * Queries the Overpass API for highway ways within an extent and turns the
 * response into waypoint rows.
 */

export {
  buildRoadQuery,
  fetchRoadData,
  DEFAULT_ENDPOINT,
  DEFAULT_TIMEOUT,
  type OverpassOptions,
  type RoadDataResult,
} from "./query.js";
export { parseRoadResponse, roadIdForWay, UNNAMED_ROAD } from "./parser.js";
export {
  defaultCacheDir,
  queryCacheKey,
  readCachedResponse,
  writeCachedResponse,
  getCachePath,
} from "./cache.js";
