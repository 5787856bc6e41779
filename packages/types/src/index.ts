/**
 * @roadgrid/types
 *
 * Shared domain types for road extraction and cell partitioning.
 *
 * - Geo: coordinates and rectangular cells
 * - Road: waypoints, input rows and partition output rows
 */

export * from "./geo.js";
export * from "./road.js";
