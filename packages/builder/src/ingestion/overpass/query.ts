/**
 * Overpass API query construction and execution.
 *
 * Generates an Overpass QL query for every highway way in an extent and
 * fetches the result via the overpass-ts client.
 */

import type { Cell } from "@roadgrid/types";
import { overpassJson } from "overpass-ts";
import type { OverpassJson, OverpassOptions as OverpassTsOptions } from "overpass-ts";
import { readCachedResponse, writeCachedResponse } from "./cache.js";

/** Result from fetchRoadData */
export interface RoadDataResult {
  data: OverpassJson;
  /** Query text that was (or would have been) sent */
  query: string;
  /** True when the response came from the disk cache */
  cached: boolean;
}

/** Options for Overpass API requests */
export interface OverpassOptions {
  /** Overpass API endpoint URL (for self-hosted instances) */
  endpoint?: string;
  /** Query timeout in seconds (default: 90) */
  timeout?: number;
  /** User-agent string */
  userAgent?: string;
  /** Bypass cache read (still writes to cache) */
  force?: boolean;
  /** Override the cache directory (default: ~/.roadgrid/overpass-cache/) */
  cacheDir?: string;
  /** Disable caching entirely (no read or write) */
  noCache?: boolean;
}

export const DEFAULT_ENDPOINT = "https://overpass-api.de/api/interpreter";
export const DEFAULT_TIMEOUT = 90;

/**
 * Build an Overpass QL query for all highway ways within an extent.
 *
 * Uses `out body geom;` so each way carries its node coordinates inline,
 * avoiding a second pass for node positions.
 *
 * @param bbox - Extent (WGS84)
 * @param timeout - Query timeout in seconds
 * @returns Overpass QL query string
 */
export function buildRoadQuery(bbox: Cell, timeout: number = DEFAULT_TIMEOUT): string {
  // Overpass bbox format: (south, west, north, east)
  const bboxStr = `${bbox.minLat},${bbox.minLon},${bbox.maxLat},${bbox.maxLon}`;

  return `[out:json][timeout:${timeout}][bbox:${bboxStr}];
(
  way["highway"];
);
out body geom;`;
}

/**
 * Fetch highway data from the Overpass API for an extent.
 *
 * @param bbox - Extent to query
 * @param options - API and cache options
 */
export async function fetchRoadData(
  bbox: Cell,
  options?: OverpassOptions
): Promise<RoadDataResult> {
  const timeout = options?.timeout ?? DEFAULT_TIMEOUT;
  const useCache = !options?.noCache;
  const query = buildRoadQuery(bbox, timeout);

  if (useCache && !options?.force) {
    const cached = readCachedResponse(query, options?.cacheDir);
    if (cached) return { data: cached, query, cached: true };
  }

  const overpassOpts: Partial<OverpassTsOptions> = {
    endpoint: options?.endpoint ?? DEFAULT_ENDPOINT,
  };
  if (options?.userAgent) {
    overpassOpts.userAgent = options.userAgent;
  }

  const data = await overpassJson(query, overpassOpts);

  if (useCache) {
    writeCachedResponse(query, data, options?.cacheDir);
  }

  return { data, query, cached: false };
}
