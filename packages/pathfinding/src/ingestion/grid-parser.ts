/**
 * Parse heightmap text into a Grid.
 *
 * Each non-blank line (trimmed) is one row; each character is one cell.
 * Parsing stops at the first unknown symbol and never returns a partial grid.
 */

import type { CellRole, Coordinate, Grid, GridCell } from "@ridgeline/types";
import { decodeSymbol, ELEVATION_TABLE, formatCellRole, type ElevationTable } from "../elevation/index.js";
import { coordinateKey, formatCoordinate } from "../coordinates.js";
import {
  DuplicateMarkerError,
  NoEndCoordinateError,
  NoStartCoordinateError,
  UnknownElevationSymbolError,
} from "../errors.js";

export interface GridParseOptions {
  /** Symbol table to decode with (defaults to the shared a-z table) */
  table?: ElevationTable;
  /** Log every recorded cell and a summary */
  verbose?: boolean;
}

/**
 * Split input into trimmed, non-blank rows.
 */
export function splitRows(input: string): string[] {
  return input
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * Parse a heightmap.
 *
 * Blank lines are dropped before rows are numbered, so the rows either side
 * of a blank line are adjacent in the grid.
 *
 * @throws UnknownElevationSymbolError at the first symbol outside `a`-`z`, `S`, `E`
 * @throws DuplicateMarkerError when a second `S` or `E` is found
 * @throws NoStartCoordinateError / NoEndCoordinateError when a marker is missing
 */
export function parseGrid(input: string, options: GridParseOptions = {}): Grid {
  const table = options.table ?? ELEVATION_TABLE;
  const verbose = options.verbose ?? false;

  const cells = new Map<string, GridCell>();
  let start: Coordinate | undefined;
  let end: Coordinate | undefined;
  let cols = 0;

  const rows = splitRows(input);
  for (const [row, line] of rows.entries()) {
    // Spread splits by code point, so a stray astral character is reported whole
    const symbols = [...line];
    cols = Math.max(cols, symbols.length);

    for (const [col, symbol] of symbols.entries()) {
      const coordinate: Coordinate = { row, col };
      let role: CellRole;
      try {
        role = decodeSymbol(symbol, table);
      } catch (err) {
        if (err instanceof UnknownElevationSymbolError) {
          throw new UnknownElevationSymbolError(err.symbol, coordinate);
        }
        throw err;
      }

      if (role.kind === "start") {
        if (start) throw new DuplicateMarkerError("start", start, coordinate);
        start = coordinate;
      } else if (role.kind === "end") {
        if (end) throw new DuplicateMarkerError("end", end, coordinate);
        end = coordinate;
      }

      if (verbose) {
        console.log(`[grid] Adding value: ${formatCoordinate(coordinate)} -> ${formatCellRole(role)}`);
      }
      cells.set(coordinateKey(coordinate), { coordinate, role });
    }
  }

  if (!start) throw new NoStartCoordinateError();
  if (!end) throw new NoEndCoordinateError();

  if (verbose) {
    console.log(
      `[grid] Parsed ${rows.length}x${cols} grid: ${cells.size} cells, start=${formatCoordinate(start)}, end=${formatCoordinate(end)}`
    );
  }

  return { cells, start, end, rows: rows.length, cols };
}

/** Role of the cell at a coordinate, if the grid has one there */
export function getCell(grid: Grid, coord: Coordinate): CellRole | undefined {
  return grid.cells.get(coordinateKey(coord))?.role;
}
