/**
 * Synthetic node id allocation.
 *
 * Fabricated waypoints need ids that are unique within a run. The counter is
 * an explicit capability handed to the resampler and the partitioner, so
 * parallel callers can give each worker a disjoint slice of the id space
 * (`start: k + 1, step: workers`).
 */

import { InvalidParameterError } from "../errors.js";

/** Source of unique, monotonically increasing synthetic ids */
export interface IdAllocator {
  /** Consume and return the next id */
  next(): number;
  /** The id the next call to `next()` will return */
  peek(): number;
}

/** Options for createIdAllocator */
export interface IdAllocatorOptions {
  /** First id handed out (default: 1) */
  start?: number;
  /** Increment between ids (default: 1) */
  step?: number;
}

export function createIdAllocator(options: IdAllocatorOptions = {}): IdAllocator {
  const start = options.start ?? 1;
  const step = options.step ?? 1;

  if (!Number.isSafeInteger(start)) {
    throw new InvalidParameterError(`start must be an integer, got ${start}`, "start");
  }
  if (!Number.isSafeInteger(step) || step <= 0) {
    throw new InvalidParameterError(`step must be a positive integer, got ${step}`, "step");
  }

  let nextId = start;
  return {
    next() {
      const id = nextId;
      nextId += step;
      return id;
    },
    peek() {
      return nextId;
    },
  };
}

/** Node id for a point inserted by resampling */
export function syntheticNodeId(n: number): string {
  return `Generated Node ${n}`;
}

/** Node id for an interpolated cell-boundary point */
export function boundaryNodeId(n: number): string {
  return `Generated node # ${n}`;
}
