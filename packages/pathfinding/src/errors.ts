/**
 * Error types.
 *
 * Parse failures (bad input) and search failures (no route) are separate
 * families so callers can react to them differently.
 */

import type { Coordinate, SolveMode } from "@ridgeline/types";
import { formatCoordinate } from "./coordinates.js";

export class RidgelineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RidgelineError";
  }
}

/** The grid text could not be turned into a Grid */
export class GridParseError extends RidgelineError {
  constructor(message: string) {
    super(message);
    this.name = "GridParseError";
  }
}

export class UnknownElevationSymbolError extends GridParseError {
  readonly symbol: string;
  readonly coordinate?: Coordinate;

  constructor(symbol: string, coordinate?: Coordinate) {
    super(
      coordinate
        ? `Unknown elevation symbol ${JSON.stringify(symbol)} at ${formatCoordinate(coordinate)}`
        : `Unknown elevation symbol ${JSON.stringify(symbol)}`,
    );
    this.name = "UnknownElevationSymbolError";
    this.symbol = symbol;
    this.coordinate = coordinate;
  }
}

export class NoStartCoordinateError extends GridParseError {
  constructor() {
    super("No start coordinate: grid has no 'S' cell");
    this.name = "NoStartCoordinateError";
  }
}

export class NoEndCoordinateError extends GridParseError {
  constructor() {
    super("No end coordinate: grid has no 'E' cell");
    this.name = "NoEndCoordinateError";
  }
}

export class DuplicateMarkerError extends GridParseError {
  readonly marker: "start" | "end";
  readonly first: Coordinate;
  readonly duplicate: Coordinate;

  constructor(marker: "start" | "end", first: Coordinate, duplicate: Coordinate) {
    super(
      `Duplicate ${marker} marker at ${formatCoordinate(duplicate)} (first seen at ${formatCoordinate(first)})`,
    );
    this.name = "DuplicateMarkerError";
    this.marker = marker;
    this.first = first;
    this.duplicate = duplicate;
  }
}

/** The grid parsed, but the search has no answer */
export class PathSearchError extends RidgelineError {
  constructor(message: string) {
    super(message);
    this.name = "PathSearchError";
  }
}

export class NoPathFoundError extends PathSearchError {
  readonly mode: SolveMode;

  constructor(mode: SolveMode) {
    super(
      mode === "forward"
        ? "No path found from the start cell to the end cell"
        : "No path found from the end cell to any lowest cell",
    );
    this.name = "NoPathFoundError";
    this.mode = mode;
  }
}

export class InvalidConfigError extends RidgelineError {
  readonly source: string;

  constructor(source: string, message: string) {
    super(`Invalid solver config (${source}): ${message}`);
    this.name = "InvalidConfigError";
    this.source = source;
  }
}
