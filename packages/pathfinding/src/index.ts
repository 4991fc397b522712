/**
 * @ridgeline/pathfinding
 *
 * Shortest climbing routes over letter-coded heightmaps.
 *
 * Key concepts:
 * - Grid: Parsed heightmap ('a'-'z' heights, 'S' start, 'E' end)
 * - ElevationGraph: Directed steps allowed by the climb rule
 * - ClimbRoute: The result of a search
 *
 * Pipeline:
 * 1. Parse text -> Grid
 * 2. Build climb graph from grid -> ElevationGraph
 * 3. Search forward (start -> end) or reverse (end -> nearest low cell) -> ClimbRoute
 */

export * from "./errors.js";
export * from "./coordinates.js";

// Modules
export * from "./elevation/index.js";
export * from "./ingestion/index.js";
export * from "./graph/index.js";
export * from "./search/index.js";
export * from "./config/index.js";
export * from "./climb.js";
