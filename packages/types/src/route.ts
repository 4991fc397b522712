/**
 * Search results.
 */

import type { Coordinate } from "./grid.js";

/**
 * - forward: from the start cell up to the end cell
 * - reverse: from the end cell down to the nearest lowest cell
 */
export type SolveMode = "forward" | "reverse";

/** A shortest climbing route */
export interface ClimbRoute {
  mode: SolveMode;
  /** Number of steps (edges) on the route */
  distance: number;
  /**
   * Cells visited, from the bottom of the climb to the end cell.
   * Always `distance + 1` entries long.
   */
  path: Coordinate[];
}
