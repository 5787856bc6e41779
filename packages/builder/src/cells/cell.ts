/**
 * Rectangular cells: classification, validation, textual form and grids.
 *
 * A cell's textual form follows the Overpass bbox order
 * (south, west, north, east) = (minLat, minLon, maxLat, maxLon).
 */

import type { Cell, Coordinate } from "@roadgrid/types";
import { InvalidParameterError, assertPositiveDistance } from "../errors.js";

/** Kilometers per degree of latitude, as used for bbox sizing */
const KM_PER_DEGREE_LAT = 111.32;

/**
 * Strict interior test. Points exactly on an edge are outside.
 */
export function inCell(point: Coordinate, cell: Cell): boolean {
  return (
    cell.minLat < point.lat &&
    point.lat < cell.maxLat &&
    cell.minLon < point.lon &&
    point.lon < cell.maxLon
  );
}

/**
 * @throws InvalidParameterError for non-finite bounds or min >= max on an axis
 */
export function validateCell(cell: Cell): void {
  const bounds = [cell.minLat, cell.minLon, cell.maxLat, cell.maxLon];
  if (!bounds.every(Number.isFinite)) {
    throw new InvalidParameterError(
      `Cell bounds must be finite numbers, got ${bounds.join(",")}`,
      "cell"
    );
  }
  if (cell.minLat >= cell.maxLat) {
    throw new InvalidParameterError(
      `Cell minLat (${cell.minLat}) must be below maxLat (${cell.maxLat})`,
      "cell"
    );
  }
  if (cell.minLon >= cell.maxLon) {
    throw new InvalidParameterError(
      `Cell minLon (${cell.minLon}) must be below maxLon (${cell.maxLon})`,
      "cell"
    );
  }
}

/** `"minLat,minLon,maxLat,maxLon"` */
export function formatCell(cell: Cell): string {
  return `${cell.minLat},${cell.minLon},${cell.maxLat},${cell.maxLon}`;
}

/**
 * Parse a `"s,w,n,e"` (or `"s w n e"`) extent into a validated cell.
 */
export function parseCell(text: string): Cell {
  const [minLat, minLon, maxLat, maxLon, ...extra] = text
    .trim()
    .split(/[\s,]+/)
    .filter((part) => part.length > 0)
    .map(Number);

  if (
    minLat === undefined ||
    minLon === undefined ||
    maxLat === undefined ||
    maxLon === undefined ||
    extra.length > 0
  ) {
    throw new InvalidParameterError(
      `Cell "${text}" must have 4 values: south,west,north,east`,
      "cell"
    );
  }

  const cell = { minLat, minLon, maxLat, maxLon };
  validateCell(cell);
  return cell;
}

/**
 * Label used on every output row of a cell: `"<formatCell>_<cellId>"`.
 *
 * @param cellId - 0-based position of the cell in the caller's cell list
 */
export function cellLabel(cell: Cell, cellId: number): string {
  return `${formatCell(cell)}_${cellId}`;
}

/**
 * Split an extent into a rows × cols grid.
 *
 * Cells are returned row-major from south-west to north-east. Shared edges
 * are computed once so neighbouring cells meet exactly.
 */
export function gridCells(extent: Cell, rows: number, cols: number): Cell[] {
  validateCell(extent);
  for (const [name, value] of [
    ["rows", rows],
    ["cols", cols],
  ] as const) {
    if (!Number.isSafeInteger(value) || value < 1) {
      throw new InvalidParameterError(`${name} must be a positive integer, got ${value}`, name);
    }
  }

  const latEdges = splitRange(extent.minLat, extent.maxLat, rows);
  const lonEdges = splitRange(extent.minLon, extent.maxLon, cols);

  const cells: Cell[] = [];
  for (let r = 0; r < rows; r++) {
    for (let c = 0; c < cols; c++) {
      cells.push({
        minLat: latEdges[r] ?? extent.minLat,
        maxLat: latEdges[r + 1] ?? extent.maxLat,
        minLon: lonEdges[c] ?? extent.minLon,
        maxLon: lonEdges[c + 1] ?? extent.maxLon,
      });
    }
  }
  return cells;
}

/** `parts + 1` evenly spaced edges from min to max, with exact end points */
function splitRange(min: number, max: number, parts: number): number[] {
  const step = (max - min) / parts;
  const edges: number[] = [min];
  for (let i = 1; i < parts; i++) {
    edges.push(min + i * step);
  }
  edges.push(max);
  return edges;
}

/**
 * Smallest cell covering all of `cells`.
 */
export function boundingCell(cells: readonly Cell[]): Cell {
  if (cells.length === 0) {
    throw new InvalidParameterError("At least one cell is required", "cells");
  }

  let minLat = Infinity,
    maxLat = -Infinity;
  let minLon = Infinity,
    maxLon = -Infinity;

  for (const cell of cells) {
    minLat = Math.min(minLat, cell.minLat);
    maxLat = Math.max(maxLat, cell.maxLat);
    minLon = Math.min(minLon, cell.minLon);
    maxLon = Math.max(maxLon, cell.maxLon);
  }

  return { minLat, minLon, maxLat, maxLon };
}

/**
 * Compute a cell from a center coordinate and radius.
 *
 * Uses a spherical approximation (good enough for city-scale extents).
 *
 * @param center - Center coordinate
 * @param radiusKm - Radius in kilometers, must be positive
 */
export function bboxFromCenter(center: Coordinate, radiusKm: number): Cell {
  assertPositiveDistance(radiusKm, "radiusKm");

  // Latitude: 1 degree ≈ 111.32 km
  const latDelta = radiusKm / KM_PER_DEGREE_LAT;

  // Longitude: varies with latitude
  const lonDelta =
    radiusKm / (KM_PER_DEGREE_LAT * Math.cos((center.lat * Math.PI) / 180));

  return {
    minLat: center.lat - latDelta,
    minLon: center.lon - lonDelta,
    maxLat: center.lat + latDelta,
    maxLon: center.lon + lonDelta,
  };
}
