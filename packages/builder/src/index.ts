/**
 * @roadgrid/builder
 *
 * Road extraction and cell partitioning for OpenStreetMap highway data.
 *
 * Pipeline:
 * 1. Fetch highway ways from the Overpass API (or read a saved road table)
 * 2. Validate rows and group them into roads
 * 3. Resample roads so no hop exceeds a distance limit
 * 4. Partition roads against query cells, summing in-cell length
 * 5. Export rows and lengths as CSV
 */

// Errors
export {
  InvalidParameterError,
  MalformedRowError,
  DuplicateCoordinateConflictError,
  assertPositiveDistance,
  type RowIssue,
} from "./errors.js";

// Geometry
export {
  EARTH_RADIUS_KM,
  DISTANCE_PRECISION,
  roundTo,
  haversineDistance,
  pointAtRatio,
  pointAtDistance,
  pathLength,
  roadMidpoint,
  samePosition,
} from "./geo/index.js";

// Resampling
export {
  createIdAllocator,
  syntheticNodeId,
  boundaryNodeId,
  resampleRoad,
  resampleRoads,
  thinRoad,
  thinRoads,
  type IdAllocator,
  type IdAllocatorOptions,
} from "./resample/index.js";

// Cells
export {
  inCell,
  validateCell,
  formatCell,
  parseCell,
  cellLabel,
  gridCells,
  boundingCell,
  bboxFromCenter,
  boundaryCrossing,
  CellPartition,
  partitionCell,
  partitionCells,
  type PartitionOptions,
  type CellSummary,
  type CollectedPartition,
} from "./cells/index.js";

// Ingestion
export {
  parseWaypointRow,
  readRoads,
  parseWaypointCsv,
  buildRoadQuery,
  fetchRoadData,
  parseRoadResponse,
  roadIdForWay,
  queryCacheKey,
  readCachedResponse,
  writeCachedResponse,
  getCachePath,
  DEFAULT_ENDPOINT,
  DEFAULT_TIMEOUT,
  type ParsedRow,
  type OverpassOptions,
  type RoadDataResult,
} from "./ingestion/index.js";

// Export
export {
  formatCsvLine,
  waypointCsvLines,
  cellRowCsvLines,
  cellLengthCsvLines,
  writeCsvFile,
  type CellLength,
} from "./export/index.js";

// Driver
export {
  extractCellRoads,
  type ExtractOptions,
  type CellExtraction,
  type ExtractionStats,
  type ExtractionResult,
} from "./pipeline/index.js";

// Configuration
export { loadConfig, getConfig, resetConfig, type Config } from "./config.js";
