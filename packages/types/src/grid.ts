/**
 * Elevation grid types.
 *
 * A grid is the parsed form of a letter-coded heightmap: every cell has a
 * coordinate and a role, and exactly one cell is the start and one the end.
 */

/** Position of a cell in the grid (zero-based, reading order) */
export interface Coordinate {
  row: number;
  col: number;
}

/** Height of a cell, 0 ('a') to 25 ('z') */
export type Elevation = number;

/** Lowest elevation a cell can have */
export const MIN_ELEVATION: Elevation = 0;

/** Highest elevation a cell can have */
export const MAX_ELEVATION: Elevation = 25;

/**
 * What a cell is, besides its height.
 *
 * Start and end carry fixed elevations (those of 'a' and 'z').
 */
export type CellRole =
  | { kind: "start"; elevation: 0 }
  | { kind: "end"; elevation: 25 }
  | { kind: "plain"; elevation: Elevation };

/** One cell of a grid */
export interface GridCell {
  coordinate: Coordinate;
  role: CellRole;
}

/** A fully parsed elevation grid */
export interface Grid {
  /** coordinateKey -> cell, in reading order */
  cells: ReadonlyMap<string, GridCell>;
  start: Coordinate;
  end: Coordinate;
  /** Number of non-blank rows */
  rows: number;
  /** Length of the longest row */
  cols: number;
}
