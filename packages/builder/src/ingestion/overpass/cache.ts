/**
 * Disk cache for Overpass API responses.
 *
 * Entries are keyed by a hash of the full query text, so any change to the
 * extent, timeout or filter is a different entry.
 *
 * Cache lives at ~/.roadgrid/overpass-cache/ unless overridden.
 */

import { createHash } from "node:crypto";
import { existsSync, mkdirSync, readFileSync, statSync, writeFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import type { OverpassJson } from "overpass-ts";

/** Default cache directory */
export function defaultCacheDir(): string {
  return join(homedir(), ".roadgrid", "overpass-cache");
}

/**
 * Deterministic cache key for a query: the first 16 hex chars of its sha256.
 */
export function queryCacheKey(query: string): string {
  return createHash("sha256").update(query).digest("hex").slice(0, 16);
}

/**
 * Cache file path for a query.
 */
export function getCachePath(query: string, cacheDir?: string): string {
  return join(cacheDir ?? defaultCacheDir(), `${queryCacheKey(query)}.json`);
}

/**
 * Read a cached Overpass response from disk.
 *
 * @returns Parsed OverpassJson on hit, or null on miss/corruption.
 */
export function readCachedResponse(query: string, cacheDir?: string): OverpassJson | null {
  const filepath = getCachePath(query, cacheDir);

  if (!existsSync(filepath)) return null;

  try {
    const stat = statSync(filepath);
    if (stat.size === 0) return null;

    const raw = readFileSync(filepath, "utf-8");
    return JSON.parse(raw) as OverpassJson;
  } catch {
    return null;
  }
}

/**
 * Write an Overpass response to the disk cache.
 */
export function writeCachedResponse(
  query: string,
  response: OverpassJson,
  cacheDir?: string
): void {
  const dir = cacheDir ?? defaultCacheDir();
  mkdirSync(dir, { recursive: true });
  writeFileSync(getCachePath(query, dir), JSON.stringify(response));
}
