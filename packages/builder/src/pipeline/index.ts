/**
 * End-to-end extraction: Overpass download -> roads -> resampling -> cells.
 *
 * Pipeline:
 * 1. Validate every cell up front
 * 2. Fetch highways once for the extent covering all cells (or use given rows)
 * 3. Group rows into roads, recording malformed rows
 * 4. Optionally thin, then resample so no hop exceeds minDistanceKm
 * 5. Partition the prepared roads against each cell in turn
 */

import type { BoundaryMode, Cell, CellRow, Waypoint, WaypointRow } from "@roadgrid/types";
import { boundingCell, formatCell, partitionCell, validateCell } from "../cells/index.js";
import { assertPositiveDistance, type RowIssue } from "../errors.js";
import { fetchRoadData, parseRoadResponse, readRoads } from "../ingestion/index.js";
import type { OverpassOptions } from "../ingestion/index.js";
import { pathLength } from "../geo/index.js";
import {
  createIdAllocator,
  resampleRoads,
  thinRoads,
  type IdAllocator,
} from "../resample/index.js";

/** Options for extractCellRoads */
export interface ExtractOptions {
  /** Query cells; each one's position in this list is its cell id */
  cells: readonly Cell[];
  boundaryMode: BoundaryMode;
  /** Resample roads so no hop exceeds this many km (default: no resampling) */
  minDistanceKm?: number;
  /** Drop waypoints within this many km of the last kept one, before resampling */
  thinDistanceKm?: number;
  /** Overpass API options */
  overpass?: OverpassOptions;
  /** Use these rows instead of downloading from Overpass */
  rows?: Iterable<WaypointRow>;
  /** Synthetic id source shared by resampling and boundary points (default: from 1) */
  ids?: IdAllocator;
}

/** Partition output for one cell */
export interface CellExtraction {
  cellId: number;
  cell: Cell;
  /** `"<minLat,minLon,maxLat,maxLon>_<cellId>"` */
  label: string;
  rows: CellRow[];
  totalLengthKm: number;
  roadCount: number;
  /**
   * Problems found while partitioning this cell. Each `index` is a position
   * in `ExtractionResult.roads.flat()`, the prepared table the cells are
   * partitioned from, not in the caller's source rows.
   */
  issues: RowIssue[];
}

export interface ExtractionStats {
  /** Roads after ingestion and resampling */
  roadCount: number;
  /** Waypoints after resampling */
  waypointCount: number;
  /** Points inserted by resampling */
  syntheticCount: number;
  /** Summed length of the prepared roads in km */
  roadLengthKm: number;
  elapsedMs: number;
}

export interface ExtractionResult {
  /** Prepared roads, in input order */
  roads: Waypoint[][];
  cells: CellExtraction[];
  /**
   * Problems found while reading, thinning and resampling roads. Malformed
   * rows carry their position in the source rows; conflicts carry the
   * road's position in the road stream.
   */
  issues: RowIssue[];
  stats: ExtractionStats;
}

/**
 * Extract the road network inside each cell.
 *
 * @throws InvalidParameterError for a malformed cell, an empty cell list or
 *   a non-positive minDistanceKm or thinDistanceKm
 */
export async function extractCellRoads(options: ExtractOptions): Promise<ExtractionResult> {
  const startTime = Date.now();
  const { cells, boundaryMode, minDistanceKm, thinDistanceKm } = options;
  const ids = options.ids ?? createIdAllocator();

  for (const cell of cells) validateCell(cell);
  const extent = boundingCell(cells);
  if (minDistanceKm !== undefined) assertPositiveDistance(minDistanceKm, "minDistanceKm");
  if (thinDistanceKm !== undefined) assertPositiveDistance(thinDistanceKm, "thinDistanceKm");

  const source = options.rows ?? (await downloadRows(extent, options.overpass));

  const issues: RowIssue[] = [];
  let roads: Iterable<Waypoint[]> = readRoads(source, issues);
  if (thinDistanceKm !== undefined) {
    roads = thinRoads(roads, thinDistanceKm, issues);
  }

  let syntheticCount = 0;
  if (minDistanceKm !== undefined) {
    const counted: IdAllocator = {
      next() {
        syntheticCount++;
        return ids.next();
      },
      peek: () => ids.peek(),
    };
    roads = resampleRoads(roads, minDistanceKm, counted, issues);
  }

  const prepared = [...roads];
  const table = prepared.flat();
  const roadLengthKm = prepared.reduce((sum, road) => sum + pathLength(road), 0);

  console.log(
    `[extract] ${prepared.length} roads (${roadLengthKm.toFixed(3)} km), ${table.length} waypoints` +
      (minDistanceKm !== undefined
        ? ` (${syntheticCount} inserted at ${minDistanceKm} km spacing)`
        : "")
  );
  if (issues.length > 0) {
    console.warn(`[extract] ${issues.length} row issue(s) while reading roads`);
  }

  const extractions: CellExtraction[] = cells.map((cell, cellId) => {
    const { rows, summary } = partitionCell(table, cell, {
      cellId,
      boundaryMode,
      ids,
    }).collect();

    console.log(
      `[extract] Cell ${summary.cell}: ${summary.roadCount} roads, ${rows.length} rows, ` +
        `${summary.totalLengthKm.toFixed(3)} km`
    );

    return {
      cellId,
      cell,
      label: summary.cell,
      rows,
      totalLengthKm: summary.totalLengthKm,
      roadCount: summary.roadCount,
      issues: summary.issues,
    };
  });

  return {
    roads: prepared,
    cells: extractions,
    issues,
    stats: {
      roadCount: prepared.length,
      waypointCount: table.length,
      syntheticCount,
      roadLengthKm,
      elapsedMs: Date.now() - startTime,
    },
  };
}

async function downloadRows(
  extent: Cell,
  options: OverpassOptions | undefined
): Promise<WaypointRow[]> {
  console.log(`[overpass] Fetching highways for ${formatCell(extent)}`);
  const { data, cached } = await fetchRoadData(extent, options);
  console.log(
    `[overpass] ${cached ? "Cache HIT" : "Fetched"}: ${data.elements.length} elements`
  );
  return [...parseRoadResponse(data)];
}
