/**
 * Route search module.
 *
 * Breadth-first search over the climb graph in two modes:
 * - forward: start cell -> end cell
 * - reverse: end cell -> nearest lowest cell, over reversed edges
 */

export {
  breadthFirstSearch,
  tracePath,
  type NodeState,
  type BreadthFirstOptions,
  type BreadthFirstResult,
} from "./breadth-first.js";
export {
  findShortestPath,
  findNearestTarget,
  findShortestDescent,
  type PathSearchOptions,
  type DescentSearchOptions,
  type NearestTarget,
} from "./path-solver.js";
