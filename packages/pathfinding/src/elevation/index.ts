export {
  START_SYMBOL,
  END_SYMBOL,
  ELEVATION_TABLE,
  createElevationTable,
  decodeSymbol,
  elevationOf,
  formatCellRole,
  type ElevationTable,
} from "./decoder.js";
