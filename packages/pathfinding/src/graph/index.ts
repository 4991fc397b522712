/**
 * Graph module.
 *
 * Grid -> directed ElevationGraph under the climb rule, plus the reversed view
 * used by the descent search.
 */

export {
  buildElevationGraph,
  createElevationGraph,
  reverseGraph,
  canClimb,
  type GraphBuildOptions,
  type GraphBuildResult,
  type GraphBuildStats,
} from "./graph-builder.js";
