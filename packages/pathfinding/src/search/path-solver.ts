/**
 * Shortest climbs over an ElevationGraph.
 *
 * Forward mode runs one BFS from the start cell to the end cell. Reverse mode
 * answers "shortest climb from any lowest cell" with a single BFS from the end
 * cell over the reversed graph, instead of one search per low cell.
 */

import type { ClimbRoute, Coordinate, ElevationGraph, GraphNode, SolveMode } from "@ridgeline/types";
import { MIN_ELEVATION } from "@ridgeline/types";
import { formatCoordinate } from "../coordinates.js";
import { elevationOf } from "../elevation/index.js";
import { NoPathFoundError } from "../errors.js";
import { reverseGraph } from "../graph/index.js";
import { breadthFirstSearch, tracePath } from "./breadth-first.js";

export interface PathSearchOptions {
  /** Log search progress */
  verbose?: boolean;
}

export interface DescentSearchOptions extends PathSearchOptions {
  /** Elevation of the cells to search for (default 0) */
  lowestElevation?: number;
}

/** Nearest matching node found by {@link findNearestTarget} */
export interface NearestTarget {
  node: number;
  distance: number;
  /** Node ids from the search source to `node` */
  path: number[];
}

/** Coordinates of a node path, copied so routes never alias the graph */
function toCoordinates(graph: ElevationGraph, path: number[]): Coordinate[] {
  return path.map((id) => {
    const node = graph.nodes[id];
    if (!node) throw new RangeError(`Node ${id} is not in the graph`);
    return { ...node.coordinate };
  });
}

/**
 * Forward mode: shortest route from the start cell to the end cell.
 *
 * @throws NoPathFoundError when the end cell cannot be reached
 */
export function findShortestPath(
  graph: ElevationGraph,
  options: PathSearchOptions = {}
): ClimbRoute {
  const result = breadthFirstSearch(graph, graph.start, { stopAt: graph.end });
  const path = result.stoppedEarly ? tracePath(result, graph.end) : null;

  if (options.verbose) {
    console.log(
      `[search] forward: visited ${result.visitedCount}/${graph.nodes.length} nodes, ${path ? `distance=${path.length - 1}` : "end not reached"}`
    );
  }
  if (!path) throw new NoPathFoundError("forward");

  return { mode: "forward", distance: path.length - 1, path: toCoordinates(graph, path) };
}

/**
 * Full BFS from `source`; the nearest reached node that satisfies `isTarget`.
 *
 * Ties go to the node dequeued first.
 *
 * @throws NoPathFoundError (tagged with `mode`) when no target is reached
 */
export function findNearestTarget(
  graph: ElevationGraph,
  source: number,
  isTarget: (node: GraphNode) => boolean,
  mode: SolveMode = graph.reversed ? "reverse" : "forward"
): NearestTarget {
  const result = breadthFirstSearch(graph, source);

  let best: { node: number; distance: number } | null = null;
  for (const [node, distance] of result.distances) {
    const graphNode = graph.nodes[node];
    if (!graphNode || !isTarget(graphNode)) continue;
    if (!best || distance < best.distance) {
      best = { node, distance };
    }
  }

  const path = best ? tracePath(result, best.node) : null;
  if (!best || !path) throw new NoPathFoundError(mode);
  return { node: best.node, distance: best.distance, path };
}

/**
 * Reverse mode: shortest route from any cell at `lowestElevation` up to the
 * end cell.
 *
 * Takes the forward graph and searches its reversed view from the end cell.
 * The returned path runs from the low cell up to the end cell.
 *
 * @throws NoPathFoundError when no low cell can reach the end cell
 */
export function findShortestDescent(
  graph: ElevationGraph,
  options: DescentSearchOptions = {}
): ClimbRoute {
  const lowest = options.lowestElevation ?? MIN_ELEVATION;
  const reversed = graph.reversed ? graph : reverseGraph(graph);

  let nearest: NearestTarget;
  try {
    nearest = findNearestTarget(
      reversed,
      reversed.end,
      (node) => elevationOf(node.role) === lowest,
      "reverse"
    );
  } catch (err) {
    if (options.verbose && err instanceof NoPathFoundError) {
      console.log(`[search] reverse: no cell at elevation ${lowest} reaches the end`);
    }
    throw err;
  }

  // BFS ran end -> low cell; report the climb low cell -> end
  const path = toCoordinates(reversed, [...nearest.path].reverse());
  if (options.verbose) {
    const from = path[0];
    console.log(
      `[search] reverse: nearest elevation-${lowest} cell ${from ? formatCoordinate(from) : "?"}, distance=${nearest.distance}`
    );
  }

  return { mode: "reverse", distance: nearest.distance, path };
}
