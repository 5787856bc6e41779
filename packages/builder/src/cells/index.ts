export {
  inCell,
  validateCell,
  formatCell,
  parseCell,
  cellLabel,
  gridCells,
  boundingCell,
  bboxFromCenter,
} from "./cell.js";
export { boundaryCrossing } from "./boundary.js";
export {
  CellPartition,
  partitionCell,
  partitionCells,
  type PartitionOptions,
  type CellSummary,
  type CollectedPartition,
} from "./partition.js";
