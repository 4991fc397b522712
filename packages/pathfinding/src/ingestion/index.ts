/**
 * Ingestion module.
 *
 * Turns raw heightmap text into a Grid. Loading the text (file, stdin) is
 * left to the caller.
 */

export { parseGrid, splitRows, getCell, type GridParseOptions } from "./grid-parser.js";
