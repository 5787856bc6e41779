/**
 * Input row validation and road grouping.
 *
 * Rows come from Overpass responses or callers' own tables, so
 * coordinates may be numbers or numeric text. Each row is checked against a
 * zod schema; failures become MalformedRowError values instead of throwing,
 * so one bad row never aborts a stream.
 */

import { z } from "zod";
import type { Waypoint, WaypointRow } from "@roadgrid/types";
import { MalformedRowError, type RowIssue } from "../errors.js";

const identifierSchema = z
  .union([z.string(), z.number()])
  .transform(String)
  .refine((value) => value.trim().length > 0, { message: "must not be blank" });

function coordinateSchema(limit: number) {
  return z
    .union([z.number(), z.string().trim().min(1, "must not be blank")])
    .pipe(z.coerce.number().finite().min(-limit).max(limit));
}

const waypointRowSchema = z.object({
  roadId: identifierSchema,
  nodeId: identifierSchema,
  lat: coordinateSchema(90),
  lon: coordinateSchema(180),
});

/** Outcome of validating one row */
export type ParsedRow =
  | { success: true; waypoint: Waypoint }
  | { success: false; error: MalformedRowError };

/**
 * Validate one input row.
 *
 * @param row - Row as supplied by the data source
 * @param index - 0-based position of the row, carried on the error
 */
export function parseWaypointRow(row: WaypointRow, index: number): ParsedRow {
  const result = waypointRowSchema.safeParse(row);

  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    return {
      success: false,
      error: new MalformedRowError(`Row ${index} is malformed (${details})`, index, row),
    };
  }

  return { success: true, waypoint: result.data };
}

/**
 * Group contiguous rows into roads.
 *
 * Rows are expected to be grouped by road already; the order is kept as is.
 * A road id that reappears later starts a new road. Malformed rows are
 * appended to `issues` and skipped.
 *
 * @param rows - Road-grouped input rows
 * @param issues - Sink for malformed rows
 */
export function* readRoads(
  rows: Iterable<WaypointRow>,
  issues: RowIssue[]
): Generator<Waypoint[]> {
  let current: Waypoint[] = [];
  let index = 0;

  for (const row of rows) {
    const parsed = parseWaypointRow(row, index++);
    if (!parsed.success) {
      issues.push({ index: parsed.error.index, error: parsed.error });
      continue;
    }

    const { waypoint } = parsed;
    const head = current[0];
    if (head && head.roadId !== waypoint.roadId) {
      yield current;
      current = [];
    }
    current.push(waypoint);
  }

  if (current.length > 0) yield current;
}
