/**
 * CSV export of waypoints, cell rows and per-cell road lengths.
 *
 * Line generators are lazy so a partition can be streamed straight to disk
 * without materializing it.
 */

import { closeSync, mkdirSync, openSync, writeSync } from "node:fs";
import { dirname } from "node:path";
import Papa from "papaparse";
import type { CellRow, Waypoint } from "@roadgrid/types";

export const WAYPOINT_HEADER = ["Road #/id", "Waypoint id (Node)", "Lat", "Lon"] as const;
export const CELL_ROW_HEADER = ["Cell", ...WAYPOINT_HEADER] as const;
export const CELL_LENGTH_HEADER = ["Cell", "Road length (km)"] as const;

/** Anything with a cell label and a total in-cell length */
export interface CellLength {
  cell: string;
  totalLengthKm: number;
}

/**
 * Format one CSV line (no terminator).
 *
 * Fields containing the delimiter, a quote, a line break or edge whitespace
 * are quoted; embedded quotes are doubled.
 */
export function formatCsvLine(fields: readonly (string | number)[]): string {
  return Papa.unparse([[...fields]], { newline: "\n" });
}

export function* waypointCsvLines(waypoints: Iterable<Waypoint>): Generator<string> {
  yield formatCsvLine(WAYPOINT_HEADER);
  for (const w of waypoints) {
    yield formatCsvLine([w.roadId, w.nodeId, w.lat, w.lon]);
  }
}

export function* cellRowCsvLines(rows: Iterable<CellRow>): Generator<string> {
  yield formatCsvLine(CELL_ROW_HEADER);
  for (const r of rows) {
    yield formatCsvLine([r.cell, r.roadId, r.nodeId, r.lat, r.lon]);
  }
}

export function* cellLengthCsvLines(cells: Iterable<CellLength>): Generator<string> {
  yield formatCsvLine(CELL_LENGTH_HEADER);
  for (const c of cells) {
    yield formatCsvLine([c.cell, c.totalLengthKm]);
  }
}

/**
 * Write lines to a file, creating parent directories as needed.
 *
 * Lines are written one at a time, so a lazy source is never held in full.
 *
 * @returns Number of lines written, header included
 */
export function writeCsvFile(path: string, lines: Iterable<string>): number {
  mkdirSync(dirname(path), { recursive: true });

  const fd = openSync(path, "w");
  let count = 0;
  try {
    for (const line of lines) {
      writeSync(fd, `${line}\n`);
      count++;
    }
  } finally {
    closeSync(fd);
  }
  return count;
}
