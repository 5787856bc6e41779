export {
  createIdAllocator,
  syntheticNodeId,
  boundaryNodeId,
  type IdAllocator,
  type IdAllocatorOptions,
} from "./id-allocator.js";
export { resampleRoad, resampleRoads } from "./resample.js";
export { thinRoad, thinRoads } from "./thin.js";
