/**
 * Extract the road network inside one or more cells and write it as CSV.
 *
 * Usage:
 *   npx tsx scripts/extract-roads.ts --cell s,w,n,e [--cell ...] --boundary drop|interpolate
 *   npx tsx scripts/extract-roads.ts --extent s,w,n,e --grid 3x7 --boundary interpolate
 *   npx tsx scripts/extract-roads.ts --center lat,lon --radius 2 --boundary drop
 *
 * Options:
 *   --thin <km>           Drop waypoints within this spacing of the last kept one
 *   --min-distance <km>   Resample roads so no hop exceeds this spacing
 *   --input <roads.csv>   Use a saved road table instead of Overpass
 *   --out <dir>           Output directory (default: ROADGRID_OUTPUT_DIR or ./out)
 *   --force               Skip the Overpass cache read
 *   --no-cache            Disable the Overpass cache
 *
 * Writes roads.csv, cells.csv and cell-lengths.csv to the output directory.
 */
import { readFileSync } from "fs";
import { resolve } from "path";
import type { BoundaryMode, Cell, WaypointRow } from "@roadgrid/types";
import {
  InvalidParameterError,
  bboxFromCenter,
  cellLengthCsvLines,
  cellRowCsvLines,
  extractCellRoads,
  getConfig,
  gridCells,
  parseCell,
  parseWaypointCsv,
  waypointCsvLines,
  writeCsvFile,
} from "../src/index.js";

const args = process.argv.slice(2);

function getArgValues(flag: string): string[] {
  const values: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";
    if (arg.startsWith(`--${flag}=`)) {
      values.push(arg.slice(flag.length + 3));
      continue;
    }
    const next = args[i + 1];
    if (arg === `--${flag}` && next !== undefined && !next.startsWith("--")) {
      values.push(next);
      i++;
    }
  }
  return values;
}

function getArgValue(flag: string): string | undefined {
  return getArgValues(flag).at(-1);
}

function parseNumber(text: string, parameter: string): number {
  const value = Number(text);
  if (text.trim() === "" || !Number.isFinite(value)) {
    throw new InvalidParameterError(`--${parameter} must be a number, got "${text}"`, parameter);
  }
  return value;
}

function parseBoundaryMode(text: string): BoundaryMode {
  if (text === "drop" || text === "interpolate") return text;
  throw new InvalidParameterError(
    `--boundary must be "drop" or "interpolate", got "${text}"`,
    "boundary"
  );
}

function parseGrid(text: string): { rows: number; cols: number } {
  const match = /^(\d+)x(\d+)$/i.exec(text.trim());
  if (!match) {
    throw new InvalidParameterError(`--grid must look like 3x7, got "${text}"`, "grid");
  }
  return { rows: Number(match[1]), cols: Number(match[2]) };
}

function resolveCells(): Cell[] {
  const cells = getArgValues("cell").map(parseCell);

  const extent = getArgValue("extent");
  if (extent) {
    const grid = parseGrid(getArgValue("grid") ?? "1x1");
    cells.push(...gridCells(parseCell(extent), grid.rows, grid.cols));
  }

  const center = getArgValue("center");
  if (center) {
    const [lat, lon, ...extra] = center.split(",");
    if (lat === undefined || lon === undefined || extra.length > 0) {
      throw new InvalidParameterError(`--center must be lat,lon, got "${center}"`, "center");
    }
    const radius = parseNumber(getArgValue("radius") ?? "1", "radius");
    cells.push(
      bboxFromCenter({ lat: parseNumber(lat, "center"), lon: parseNumber(lon, "center") }, radius)
    );
  }

  if (cells.length === 0) {
    throw new InvalidParameterError("Give at least one --cell, --extent or --center", "cell");
  }
  return cells;
}

async function main() {
  const config = getConfig();

  const cells = resolveCells();

  const boundaryText = getArgValue("boundary") ?? config.ROADGRID_BOUNDARY_MODE;
  if (!boundaryText) {
    throw new InvalidParameterError(
      "Choose a boundary mode with --boundary drop|interpolate (or ROADGRID_BOUNDARY_MODE)",
      "boundary"
    );
  }
  const boundaryMode = parseBoundaryMode(boundaryText);

  const minDistanceText = getArgValue("min-distance");
  const minDistanceKm =
    minDistanceText !== undefined
      ? parseNumber(minDistanceText, "min-distance")
      : config.ROADGRID_MIN_DISTANCE_KM;

  const thinText = getArgValue("thin");
  const thinDistanceKm = thinText !== undefined ? parseNumber(thinText, "thin") : undefined;

  const inputPath = getArgValue("input");
  let rows: WaypointRow[] | undefined;
  if (inputPath) {
    rows = [...parseWaypointCsv(readFileSync(resolve(inputPath), "utf-8"))];
    console.log(`Loaded ${rows.length.toLocaleString()} rows from ${inputPath}`);
  }

  const outputDir = resolve(getArgValue("out") ?? config.ROADGRID_OUTPUT_DIR);

  console.log(`Extracting ${cells.length} cell(s), boundary=${boundaryMode}`);
  const result = await extractCellRoads({
    cells,
    boundaryMode,
    minDistanceKm,
    thinDistanceKm,
    rows,
    overpass: {
      endpoint: config.OVERPASS_ENDPOINT,
      timeout: config.OVERPASS_TIMEOUT,
      cacheDir: config.ROADGRID_CACHE_DIR,
      force: args.includes("--force"),
      noCache: args.includes("--no-cache"),
    },
  });

  for (const issue of result.issues) {
    console.warn(`[extract] ${issue.error.message}`);
  }
  for (const cell of result.cells) {
    for (const issue of cell.issues) {
      console.warn(`[extract] ${cell.label}: ${issue.error.message}`);
    }
  }

  const roadsPath = resolve(outputDir, "roads.csv");
  const roadLines = writeCsvFile(roadsPath, waypointCsvLines(result.roads.flat()));
  console.log(
    `Wrote ${(roadLines - 1).toLocaleString()} waypoints ` +
      `(${result.stats.roadLengthKm.toFixed(1)} km of road) to ${roadsPath}`
  );

  const cellsPath = resolve(outputDir, "cells.csv");
  const cellLines = writeCsvFile(
    cellsPath,
    cellRowCsvLines(result.cells.flatMap((cell) => cell.rows))
  );
  console.log(`Wrote ${(cellLines - 1).toLocaleString()} cell rows to ${cellsPath}`);

  const lengthsPath = resolve(outputDir, "cell-lengths.csv");
  writeCsvFile(
    lengthsPath,
    cellLengthCsvLines(
      result.cells.map((cell) => ({ cell: cell.label, totalLengthKm: cell.totalLengthKm }))
    )
  );
  console.log(`Wrote ${result.cells.length} cell lengths to ${lengthsPath}`);

  console.log(`Done in ${(result.stats.elapsedMs / 1000).toFixed(1)}s`);
}

main().catch((e) => {
  console.error(e instanceof Error ? `${e.name}: ${e.message}` : e);
  process.exit(1);
});
