/**
 * Reading waypoint tables back from CSV.
 *
 * Accepts the layout written by waypointCsvLines, so an extraction can be
 * re-run against a saved road table instead of a fresh Overpass download.
 */

import Papa from "papaparse";
import type { WaypointRow } from "@roadgrid/types";

/**
 * Parse a waypoint CSV (with header) into raw rows.
 *
 * Values are passed through as text; missing columns become empty strings so
 * that row validation reports them.
 */
export function* parseWaypointCsv(text: string): Generator<WaypointRow> {
  const parsed = Papa.parse<Record<string, string | undefined>>(text, {
    header: true,
    skipEmptyLines: true,
  });

  for (const record of parsed.data) {
    yield {
      roadId: record["Road #/id"] ?? "",
      nodeId: record["Waypoint id (Node)"] ?? "",
      lat: record["Lat"] ?? "",
      lon: record["Lon"] ?? "",
    };
  }
}
