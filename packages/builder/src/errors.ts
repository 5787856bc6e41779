/**
 * Error taxonomy for the engine.
 *
 * - InvalidParameterError: bad configuration, fatal to the call
 * - MalformedRowError: a single unusable input row, recorded and skipped
 * - DuplicateCoordinateConflictError: two node ids at one position on a road
 */

import type { Coordinate } from "@roadgrid/types";

export class InvalidParameterError extends Error {
  constructor(
    message: string,
    readonly parameter: string
  ) {
    super(message);
    this.name = "InvalidParameterError";
  }
}

export class MalformedRowError extends Error {
  constructor(
    message: string,
    /** 0-based position of the row in its input sequence */
    readonly index: number,
    readonly row: unknown
  ) {
    super(message);
    this.name = "MalformedRowError";
  }
}

export class DuplicateCoordinateConflictError extends Error {
  constructor(
    readonly roadId: string,
    readonly nodeIds: readonly [string, string],
    readonly coordinate: Coordinate
  ) {
    super(
      `Road "${roadId}": nodes "${nodeIds[0]}" and "${nodeIds[1]}" share coordinates ` +
        `${coordinate.lat},${coordinate.lon}; upstream data is inconsistent`
    );
    this.name = "DuplicateCoordinateConflictError";
  }
}

/** A recoverable problem found while streaming rows */
export interface RowIssue {
  /** 0-based position of the offending row (or road, for road streams) */
  index: number;
  /** Road the row belongs to, when it could be read */
  roadId?: string;
  error: MalformedRowError | DuplicateCoordinateConflictError;
}

/**
 * Throw InvalidParameterError unless `value` is a positive finite number.
 */
export function assertPositiveDistance(value: number, parameter: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidParameterError(
      `${parameter} must be a positive number of kilometers, got ${value}`,
      parameter
    );
  }
}
