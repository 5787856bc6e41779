export {
  WAYPOINT_HEADER,
  CELL_ROW_HEADER,
  CELL_LENGTH_HEADER,
  formatCsvLine,
  waypointCsvLines,
  cellRowCsvLines,
  cellLengthCsvLines,
  writeCsvFile,
  type CellLength,
} from "./csv.js";
