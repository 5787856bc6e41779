/**
 * Cell partitioning.
 *
 * Streams a road-grouped waypoint table once per cell and keeps the parts of
 * each road that lie inside the cell, while summing the in-cell road length.
 *
 * Pipeline per row:
 * 1. Validate the row (malformed rows are recorded and skipped)
 * 2. Flush the previous road when the road id changes
 * 3. Classify the point and extend, open or close the road's inside-run
 *
 * A road that leaves and re-enters the cell has several inside-runs; every
 * row of such a road is tagged `_segment_<k>` with its 0-based run index.
 */

import type { BoundaryMode, Cell, CellRow, Waypoint, WaypointRow } from "@roadgrid/types";
import { haversineDistance, samePosition } from "../geo/index.js";
import {
  DuplicateCoordinateConflictError,
  type RowIssue,
} from "../errors.js";
import { boundaryNodeId, type IdAllocator } from "../resample/id-allocator.js";
import { parseWaypointRow } from "../ingestion/rows.js";
import { boundaryCrossing } from "./boundary.js";
import { cellLabel, inCell, validateCell } from "./cell.js";

/** Options for partitionCell */
export interface PartitionOptions {
  /** 0-based position of the cell in the caller's cell list */
  cellId: number;
  /** Drop the hop across the edge, or end/start runs on an interpolated edge point */
  boundaryMode: BoundaryMode;
  /** Allocator for interpolated boundary point ids */
  ids: IdAllocator;
}

/** Aggregate for one completed pass over a cell */
export interface CellSummary {
  cell: string;
  cellId: number;
  /** Sum of in-cell hop lengths in km; excursions outside never count */
  totalLengthKm: number;
  /** Number of rows emitted */
  rowCount: number;
  /** Number of roads with at least one row in the cell */
  roadCount: number;
  issues: RowIssue[];
}

/** Result of draining a partition */
export interface CollectedPartition {
  rows: CellRow[];
  summary: CellSummary;
}

/** Mutable per-road state, alive only while the road is current */
interface RoadState {
  roadId: string;
  /** Closed and open inside-runs, in order */
  runs: CellRow[][];
  /** Run currently being extended, if the last point was inside */
  openRun: CellRow[] | null;
  lengthKm: number;
  /** Set on a duplicate-coordinate conflict; the road then emits nothing */
  failed: boolean;
  last: { waypoint: Waypoint; inside: boolean } | null;
}

/** Mutable totals for one pass */
interface PassTotals {
  totalLengthKm: number;
  rowCount: number;
  roadCount: number;
  issues: RowIssue[];
}

/**
 * A lazy, restartable partition of a waypoint table against one cell.
 *
 * Each iteration is an independent single pass over `rows`; the input must
 * itself be re-iterable to iterate more than once. Only the current road is
 * held in memory.
 *
 * In interpolate mode every pass draws fresh boundary ids from the shared
 * allocator, so a second pass yields the same rows under new
 * `Generated node # <n>` ids. Build one partition per pass, each with its own
 * allocator, where the ids must repeat.
 */
export class CellPartition implements Iterable<CellRow> {
  readonly label: string;
  private lastSummary: CellSummary | null = null;

  constructor(
    private readonly rows: Iterable<WaypointRow>,
    readonly cell: Cell,
    private readonly options: PartitionOptions
  ) {
    validateCell(cell);
    this.label = cellLabel(cell, options.cellId);
  }

  *[Symbol.iterator](): Iterator<CellRow> {
    const totals: PassTotals = { totalLengthKm: 0, rowCount: 0, roadCount: 0, issues: [] };
    let road: RoadState | null = null;
    let index = 0;

    for (const raw of this.rows) {
      const rowIndex = index++;
      const parsed = parseWaypointRow(raw, rowIndex);
      if (!parsed.success) {
        totals.issues.push({ index: rowIndex, error: parsed.error });
        continue;
      }
      const waypoint = parsed.waypoint;

      if (!road || road.roadId !== waypoint.roadId) {
        if (road) yield* this.flush(road, totals);
        road = newRoad(waypoint.roadId);
      }

      this.advance(road, waypoint, rowIndex, totals);
    }

    if (road) yield* this.flush(road, totals);

    this.lastSummary = {
      cell: this.label,
      cellId: this.options.cellId,
      ...totals,
    };
  }

  /**
   * Summary of the last completed pass, or null before any pass finished.
   */
  summary(): CellSummary | null {
    return this.lastSummary;
  }

  /**
   * Run one full pass and return its rows and summary.
   */
  collect(): CollectedPartition {
    const rows = [...this];
    const summary = this.lastSummary;
    if (!summary) {
      throw new Error(`Partition of ${this.label} did not complete`);
    }
    return { rows, summary };
  }

  private advance(
    road: RoadState,
    waypoint: Waypoint,
    rowIndex: number,
    totals: PassTotals
  ): void {
    if (road.failed) return;

    const last = road.last;
    if (last) {
      // Duplicate-node guard
      if (last.waypoint.nodeId === waypoint.nodeId) return;

      if (samePosition(last.waypoint, waypoint)) {
        road.failed = true;
        const error = new DuplicateCoordinateConflictError(
          road.roadId,
          [last.waypoint.nodeId, waypoint.nodeId],
          { lat: waypoint.lat, lon: waypoint.lon }
        );
        totals.issues.push({ index: rowIndex, roadId: road.roadId, error });
        return;
      }
    }

    const inside = inCell(waypoint, this.cell);
    const interpolate = this.options.boundaryMode === "interpolate";

    if (inside) {
      if (!road.openRun) {
        road.openRun = [];
        road.runs.push(road.openRun);

        // Entering from outside: start the run on the edge
        if (last && interpolate) {
          const entry = this.boundaryRow(road.roadId, waypoint, last.waypoint);
          road.openRun.push(entry);
          road.lengthKm += haversineDistance(entry, waypoint);
        }
      } else if (last?.inside) {
        road.lengthKm += haversineDistance(last.waypoint, waypoint);
      }
      road.openRun.push(this.toRow(waypoint, waypoint.nodeId));
    } else if (last?.inside && road.openRun) {
      // Leaving the cell: close the run, on the edge when interpolating
      if (interpolate) {
        const exit = this.boundaryRow(road.roadId, last.waypoint, waypoint);
        road.openRun.push(exit);
        road.lengthKm += haversineDistance(last.waypoint, exit);
      }
      road.openRun = null;
    }

    road.last = { waypoint, inside };
  }

  private boundaryRow(roadId: string, inside: Waypoint, outside: Waypoint): CellRow {
    const point = boundaryCrossing(inside, outside, this.cell);
    return {
      cell: this.label,
      roadId,
      nodeId: boundaryNodeId(this.options.ids.next()),
      lat: point.lat,
      lon: point.lon,
    };
  }

  private toRow(waypoint: Waypoint, nodeId: string): CellRow {
    return {
      cell: this.label,
      roadId: waypoint.roadId,
      nodeId,
      lat: waypoint.lat,
      lon: waypoint.lon,
    };
  }

  private *flush(road: RoadState, totals: PassTotals): Generator<CellRow> {
    if (road.failed || road.runs.length === 0) return;

    totals.totalLengthKm += road.lengthKm;
    totals.roadCount++;

    const tagged = road.runs.length > 1;
    for (let k = 0; k < road.runs.length; k++) {
      for (const row of road.runs[k] ?? []) {
        totals.rowCount++;
        yield tagged ? { ...row, nodeId: `${row.nodeId}_segment_${k}` } : row;
      }
    }
  }
}

function newRoad(roadId: string): RoadState {
  return { roadId, runs: [], openRun: null, lengthKm: 0, failed: false, last: null };
}

/**
 * Partition a road-grouped waypoint table against one cell.
 *
 * The cell is validated immediately; rows are read lazily when the result
 * is iterated.
 *
 * @param rows - Rows grouped so each road's rows are contiguous, in road order
 * @param cell - Query cell
 * @param options - Cell id, boundary mode and id allocator
 * @throws InvalidParameterError for a malformed cell
 */
export function partitionCell(
  rows: Iterable<WaypointRow>,
  cell: Cell,
  options: PartitionOptions
): CellPartition {
  return new CellPartition(rows, cell, options);
}

/**
 * Partition the same table against each cell in turn.
 *
 * Cells are validated first; `rows` is then read once, so a one-shot
 * generator serves every cell.
 *
 * @returns One collected partition per cell, in cell order
 */
export function partitionCells(
  rows: Iterable<WaypointRow>,
  cells: readonly Cell[],
  options: Omit<PartitionOptions, "cellId">
): CollectedPartition[] {
  for (const cell of cells) validateCell(cell);
  const table = [...rows];

  const partitions = cells.map((cell, cellId) =>
    partitionCell(table, cell, { ...options, cellId })
  );
  const results: CollectedPartition[] = [];
  for (const partition of partitions) {
    results.push(partition.collect());
  }
  return results;
}
