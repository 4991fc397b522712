/**
 * Build a directed ElevationGraph from a Grid.
 *
 * An edge runs from a cell to each axis-aligned neighbour that is at most
 * `maxClimb` higher. Going down is always allowed, so edges are not
 * symmetric. The end cell is a sink: it has no outgoing edges.
 */

import type { ElevationGraph, GraphEdge, GraphNode, Grid } from "@ridgeline/types";
import { axisNeighbors, coordinateKey } from "../coordinates.js";
import { elevationOf } from "../elevation/index.js";

export interface GraphBuildOptions {
  /** Largest height gain allowed in one step (default 1) */
  maxClimb?: number;
  /** Log a build summary */
  verbose?: boolean;
}

/**
 * Statistics about the graph building process.
 */
export interface GraphBuildStats {
  /** Number of nodes in the graph */
  nodesCount: number;
  /** Number of directed edges in the graph */
  edgesCount: number;
  /** Time taken to build the graph in milliseconds */
  buildTimeMs: number;
}

/**
 * Result of building a graph from a grid.
 */
export interface GraphBuildResult {
  graph: ElevationGraph;
  stats: GraphBuildStats;
}

/**
 * True when a step from `fromElevation` to `toElevation` is allowed.
 */
export function canClimb(fromElevation: number, toElevation: number, maxClimb: number = 1): boolean {
  return toElevation <= fromElevation + maxClimb;
}

/**
 * Assemble a graph from its nodes and an edge list.
 *
 * Adjacency is derived from `edges` in list order. The inputs are copied,
 * never mutated.
 */
export function createElevationGraph(
  nodes: readonly GraphNode[],
  edges: readonly GraphEdge[],
  start: number,
  end: number,
  reversed: boolean = false
): ElevationGraph {
  const adjacency: number[][] = nodes.map(() => []);
  const nodeIndex = new Map<string, number>();

  for (const node of nodes) {
    nodeIndex.set(coordinateKey(node.coordinate), node.id);
  }
  for (const edge of edges) {
    const targets = adjacency[edge.from];
    if (!targets || edge.to < 0 || edge.to >= nodes.length) {
      throw new RangeError(`Edge ${edge.from}->${edge.to} references a missing node`);
    }
    targets.push(edge.to);
  }

  return {
    nodes: [...nodes],
    edges: edges.map((e) => ({ from: e.from, to: e.to })),
    adjacency,
    nodeIndex,
    start,
    end,
    reversed,
  };
}

/**
 * Build the climb graph for a grid.
 *
 * Nodes are numbered in the grid's reading order; node `i` is the i-th cell.
 */
export function buildElevationGraph(
  grid: Grid,
  options: GraphBuildOptions = {}
): GraphBuildResult {
  const startTime = Date.now();
  const maxClimb = options.maxClimb ?? 1;

  const nodes: GraphNode[] = [];
  const ids = new Map<string, number>();
  for (const [key, cell] of grid.cells) {
    const id = nodes.length;
    nodes.push({ id, coordinate: cell.coordinate, role: cell.role });
    ids.set(key, id);
  }

  const edges: GraphEdge[] = [];
  for (const node of nodes) {
    if (node.role.kind === "end") continue;
    const height = elevationOf(node.role);

    for (const neighbor of axisNeighbors(node.coordinate)) {
      const neighborId = ids.get(coordinateKey(neighbor));
      if (neighborId === undefined) continue;
      const neighborNode = nodes[neighborId];
      if (!neighborNode) continue;
      if (canClimb(height, elevationOf(neighborNode.role), maxClimb)) {
        edges.push({ from: node.id, to: neighborId });
      }
    }
  }

  const start = ids.get(coordinateKey(grid.start));
  const end = ids.get(coordinateKey(grid.end));
  if (start === undefined || end === undefined) {
    throw new RangeError("Grid start or end coordinate has no cell");
  }

  const graph = createElevationGraph(nodes, edges, start, end);
  const buildTimeMs = Date.now() - startTime;

  if (options.verbose) {
    console.log(
      `[graph] Built ${nodes.length} nodes, ${edges.length} edges (maxClimb=${maxClimb}) in ${buildTimeMs}ms`
    );
  }

  return {
    graph,
    stats: {
      nodesCount: nodes.length,
      edgesCount: edges.length,
      buildTimeMs,
    },
  };
}

/**
 * The same graph with every edge flipped.
 *
 * Returns a new graph; reversing twice gives back the original edge set.
 */
export function reverseGraph(graph: ElevationGraph): ElevationGraph {
  const flipped = graph.edges.map((e) => ({ from: e.to, to: e.from }));
  return createElevationGraph(graph.nodes, flipped, graph.start, graph.end, !graph.reversed);
}
