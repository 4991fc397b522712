/**
 * Text-in, route-out entry points.
 *
 * Each call parses its own grid and builds its own graph, so calls share no
 * state.
 */

import type { ClimbRoute, ElevationGraph, Grid } from "@ridgeline/types";
import { loadSolverConfig, type SolverConfig } from "./config/index.js";
import { buildElevationGraph, type GraphBuildStats } from "./graph/index.js";
import { parseGrid } from "./ingestion/index.js";
import { findShortestDescent, findShortestPath } from "./search/index.js";

export interface PreparedClimb {
  grid: Grid;
  graph: ElevationGraph;
  stats: GraphBuildStats;
}

/** Parse the heightmap and build its climb graph. */
export function prepareClimb(input: string, config: SolverConfig): PreparedClimb {
  const grid = parseGrid(input, { verbose: config.verbose });
  const { graph, stats } = buildElevationGraph(grid, {
    maxClimb: config.maxClimb,
    verbose: config.verbose,
  });
  return { grid, graph, stats };
}

/**
 * Fewest steps from the start cell to the end cell.
 *
 * @throws GridParseError for bad input
 * @throws NoPathFoundError when the end cell is unreachable
 */
export function solveForward(input: string, config: SolverConfig = loadSolverConfig()): ClimbRoute {
  const { graph } = prepareClimb(input, config);
  return findShortestPath(graph, { verbose: config.verbose });
}

/**
 * Fewest steps from any lowest cell to the end cell.
 *
 * @throws GridParseError for bad input
 * @throws NoPathFoundError when no lowest cell can reach the end cell
 */
export function solveReverse(input: string, config: SolverConfig = loadSolverConfig()): ClimbRoute {
  const { graph } = prepareClimb(input, config);
  return findShortestDescent(graph, {
    lowestElevation: config.lowestElevation,
    verbose: config.verbose,
  });
}
