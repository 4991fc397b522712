/**
 * Directed elevation graph.
 *
 * Nodes live in an arena (`nodes[id]`) and edges are pairs of node ids,
 * so cycles between same-height neighbours need no special handling and the
 * reversed view is just a second edge list.
 */

import type { CellRole, Coordinate } from "./grid.js";

/** A graph node, one per grid cell */
export interface GraphNode {
  /** Index of this node in `ElevationGraph.nodes` */
  id: number;
  coordinate: Coordinate;
  role: CellRole;
}

/** A directed, unit-cost edge between two node ids */
export interface GraphEdge {
  from: number;
  to: number;
}

export interface ElevationGraph {
  nodes: readonly GraphNode[];
  edges: readonly GraphEdge[];
  /** Node id -> ids of outgoing edge targets */
  adjacency: readonly (readonly number[])[];
  /** coordinateKey -> node id */
  nodeIndex: ReadonlyMap<string, number>;
  /** Node id of the start cell */
  start: number;
  /** Node id of the end cell */
  end: number;
  /** True when every edge points the opposite way to the climb */
  reversed: boolean;
}
