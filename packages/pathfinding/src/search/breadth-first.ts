/**
 * Unit-cost breadth-first search over an ElevationGraph.
 *
 * Every node moves unvisited -> frontier -> visited and never back. The first
 * time a node is reached fixes its distance, which in BFS order on unit-cost
 * edges is the shortest one.
 */

import type { ElevationGraph } from "@ridgeline/types";

export type NodeState = "unvisited" | "frontier" | "visited";

export interface BreadthFirstOptions {
  /** Stop as soon as this node is dequeued */
  stopAt?: number;
}

export interface BreadthFirstResult {
  /** Node id -> steps from the source, for every node reached */
  distances: Map<number, number>;
  /** Node id -> node it was first reached from (the source has none) */
  predecessors: Map<number, number>;
  /** Nodes dequeued before the search ended */
  visitedCount: number;
  /** True when `stopAt` was dequeued */
  stoppedEarly: boolean;
}

export function breadthFirstSearch(
  graph: ElevationGraph,
  source: number,
  options: BreadthFirstOptions = {}
): BreadthFirstResult {
  if (source < 0 || source >= graph.nodes.length) {
    throw new RangeError(`Source node ${source} is not in the graph`);
  }

  const state: NodeState[] = graph.nodes.map(() => "unvisited");
  const distances = new Map<number, number>([[source, 0]]);
  const predecessors = new Map<number, number>();

  // Array plus read cursor instead of shift(), which is O(n) per dequeue
  const queue: number[] = [source];
  state[source] = "frontier";
  let head = 0;
  let visitedCount = 0;

  while (head < queue.length) {
    const current = queue[head++];
    if (current === undefined) break;
    state[current] = "visited";
    visitedCount++;

    if (current === options.stopAt) {
      return { distances, predecessors, visitedCount, stoppedEarly: true };
    }

    const nextDistance = (distances.get(current) ?? 0) + 1;
    for (const target of graph.adjacency[current] ?? []) {
      if (state[target] !== "unvisited") continue;
      state[target] = "frontier";
      distances.set(target, nextDistance);
      predecessors.set(target, current);
      queue.push(target);
    }
  }

  return { distances, predecessors, visitedCount, stoppedEarly: false };
}

/**
 * Walk predecessors back from `target` to the search source.
 *
 * @returns Node ids from source to target, or null if `target` was not reached
 */
export function tracePath(result: BreadthFirstResult, target: number): number[] | null {
  if (!result.distances.has(target)) return null;

  const path = [target];
  let current = result.predecessors.get(target);
  while (current !== undefined) {
    path.push(current);
    current = result.predecessors.get(current);
  }
  return path.reverse();
}
