/**
 * Elevation decoding: one heightmap symbol to one cell role.
 *
 * Lowercase letters are plain cells ('a' = 0 ... 'z' = 25). 'S' is the start
 * cell at the height of 'a'; 'E' is the end cell at the height of 'z'.
 */

import type { CellRole, Elevation } from "@ridgeline/types";
import { UnknownElevationSymbolError } from "../errors.js";

export const START_SYMBOL = "S";
export const END_SYMBOL = "E";

/** Letter -> elevation lookup */
export type ElevationTable = ReadonlyMap<string, Elevation>;

/** Build the 'a'..'z' -> 0..25 table. */
export function createElevationTable(): ElevationTable {
  const table = new Map<string, Elevation>();
  const base = "a".charCodeAt(0);
  for (let i = 0; i < 26; i++) {
    table.set(String.fromCharCode(base + i), i);
  }
  return table;
}

/** Shared table, built once at module load and never written to. */
export const ELEVATION_TABLE: ElevationTable = createElevationTable();

function lookup(table: ElevationTable, letter: string, symbol: string): Elevation {
  const elevation = table.get(letter);
  if (elevation === undefined) {
    throw new UnknownElevationSymbolError(symbol);
  }
  return elevation;
}

/**
 * Decode a single symbol.
 *
 * @throws UnknownElevationSymbolError for anything other than `a`-`z`, `S` or `E`
 */
export function decodeSymbol(
  symbol: string,
  table: ElevationTable = ELEVATION_TABLE
): CellRole {
  switch (symbol) {
    case START_SYMBOL:
      // Height comes from the role; the table must still hold 'a' and 'z'.
      lookup(table, "a", symbol);
      return { kind: "start", elevation: 0 };
    case END_SYMBOL:
      lookup(table, "z", symbol);
      return { kind: "end", elevation: 25 };
    default:
      return { kind: "plain", elevation: lookup(table, symbol, symbol) };
  }
}

/** Height of a cell, whatever its role */
export function elevationOf(role: CellRole): Elevation {
  switch (role.kind) {
    case "start":
    case "end":
    case "plain":
      return role.elevation;
  }
}

/** Display form: `Start(0)`, `End(25)`, or the bare elevation for plain cells */
export function formatCellRole(role: CellRole): string {
  switch (role.kind) {
    case "start":
      return `Start(${role.elevation})`;
    case "end":
      return `End(${role.elevation})`;
    case "plain":
      return String(role.elevation);
  }
}
