import { describe, it, expect, vi, afterEach } from "vitest";
import type { ClimbRoute, ElevationGraph } from "@ridgeline/types";
import { findNearestTarget, findShortestDescent, findShortestPath } from "./path-solver.js";
import { buildElevationGraph, createElevationGraph, reverseGraph } from "../graph/index.js";
import { parseGrid } from "../ingestion/index.js";
import { areAdjacent, coordinateKey } from "../coordinates.js";
import { elevationOf } from "../elevation/index.js";
import { GridParseError, NoPathFoundError, PathSearchError } from "../errors.js";

const CANONICAL = `
Sabqponm
abcryxxl
accszExk
acctuvwj
abdefghi
`;

/** S, a, b..y, E in one row */
const RAMP = "SabcdefghijklmnopqrstuvwxyE";

/** The end cell is ringed by z cells that nothing low can climb onto */
const WALLED = `
Sbz
zzz
zzE
`;

afterEach(() => {
  vi.restoreAllMocks();
});

function graphOf(input: string, maxClimb?: number): ElevationGraph {
  return buildElevationGraph(parseGrid(input), { maxClimb }).graph;
}

function elevationAt(graph: ElevationGraph, key: string): number {
  const id = graph.nodeIndex.get(key);
  const node = id === undefined ? undefined : graph.nodes[id];
  if (!node) throw new Error(`no node at ${key}`);
  return elevationOf(node.role);
}

/** Every step is one axis move that obeys the climb rule */
function expectValidClimb(graph: ElevationGraph, route: ClimbRoute): void {
  expect(route.path).toHaveLength(route.distance + 1);
  for (let i = 1; i < route.path.length; i++) {
    const prev = route.path[i - 1];
    const next = route.path[i];
    if (!prev || !next) throw new Error("short path");
    expect(areAdjacent(prev, next)).toBe(true);
    expect(elevationAt(graph, coordinateKey(next))).toBeLessThanOrEqual(
      elevationAt(graph, coordinateKey(prev)) + 1
    );
  }
}

describe("findShortestPath", () => {
  it("finds 31 steps on the canonical grid", () => {
    const graph = graphOf(CANONICAL);
    const route = findShortestPath(graph);

    expect(route.mode).toBe("forward");
    expect(route.distance).toBe(31);
    expect(route.path[0]).toEqual({ row: 0, col: 0 });
    expect(route.path[31]).toEqual({ row: 2, col: 5 });
    expectValidClimb(graph, route);
  });

  it("climbs a one-row ramp", () => {
    const graph = graphOf(RAMP);
    const route = findShortestPath(graph);

    expect(route.distance).toBe(26);
    expectValidClimb(graph, route);
  });

  it("returns coordinates the caller can change without touching the grid", () => {
    const grid = parseGrid(CANONICAL);
    const { graph } = buildElevationGraph(grid);
    const route = findShortestPath(graph);

    const first = route.path[0];
    const last = route.path[31];
    if (!first || !last) throw new Error("short path");
    first.row = 99;
    last.col = 99;

    expect(grid.start).toEqual({ row: 0, col: 0 });
    expect(grid.end).toEqual({ row: 2, col: 5 });
    expect(graph.nodes[graph.start]?.coordinate).toEqual({ row: 0, col: 0 });
    const again = findShortestPath(graph);
    expect(again.path[0]).toEqual({ row: 0, col: 0 });
    expect(again.path[31]).toEqual({ row: 2, col: 5 });
  });

  it("does not depend on edge order", () => {
    const graph = graphOf(CANONICAL);
    const backwards = createElevationGraph(
      graph.nodes,
      [...graph.edges].reverse(),
      graph.start,
      graph.end
    );
    const rotated = createElevationGraph(
      graph.nodes,
      [...graph.edges.slice(17), ...graph.edges.slice(0, 17)],
      graph.start,
      graph.end
    );

    expect(findShortestPath(backwards).distance).toBe(31);
    expect(findShortestPath(rotated).distance).toBe(31);
  });

  it("fails when the start cannot step straight up to an adjacent end", () => {
    try {
      findShortestPath(graphOf("SE"));
      expect.unreachable("expected no path");
    } catch (err) {
      expect(err).toBeInstanceOf(NoPathFoundError);
      expect(err).toBeInstanceOf(PathSearchError);
      expect(err).not.toBeInstanceOf(GridParseError);
      if (err instanceof NoPathFoundError) {
        expect(err.mode).toBe("forward");
      }
    }
  });

  it("takes a single step to an adjacent end when the climb is allowed", () => {
    const route = findShortestPath(graphOf("SE", 25));

    expect(route.distance).toBe(1);
    expect(route.path).toEqual([
      { row: 0, col: 0 },
      { row: 0, col: 1 },
    ]);
  });

  it("fails when the end is walled off", () => {
    expect(() => findShortestPath(graphOf(WALLED))).toThrow(NoPathFoundError);
  });

  it("logs the outcome when verbose", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    expect(() => findShortestPath(graphOf("SE"), { verbose: true })).toThrow(NoPathFoundError);
    expect(log.mock.calls).toEqual([["[search] forward: visited 1/2 nodes, end not reached"]]);
  });
});

describe("findNearestTarget", () => {
  it("returns the closest node matching the predicate", () => {
    const graph = graphOf(CANONICAL);
    const nearest = findNearestTarget(graph, graph.start, (node) => elevationOf(node.role) === 2);

    expect(nearest.distance).toBe(3);
    expect(nearest.path).toHaveLength(4);
    expect(nearest.path[0]).toBe(graph.start);
    expect(nearest.path[3]).toBe(nearest.node);
  });

  it("counts the source itself as a target", () => {
    const graph = graphOf(CANONICAL);
    const nearest = findNearestTarget(graph, graph.start, (node) => node.role.kind === "start");

    expect(nearest).toEqual({ node: graph.start, distance: 0, path: [graph.start] });
  });

  it("fails with the search mode when nothing matches", () => {
    const graph = graphOf(CANONICAL);
    try {
      findNearestTarget(graph, graph.start, () => false);
      expect.unreachable("expected no path");
    } catch (err) {
      expect(err).toBeInstanceOf(NoPathFoundError);
      if (err instanceof NoPathFoundError) {
        expect(err.mode).toBe("forward");
      }
    }
  });

  it("tags failures on a reversed graph as reverse", () => {
    const reversed = reverseGraph(graphOf(CANONICAL));
    expect(() => findNearestTarget(reversed, reversed.end, () => false)).toThrow(
      "No path found from the end cell to any lowest cell"
    );
  });
});

describe("findShortestDescent", () => {
  it("finds 29 steps on the canonical grid", () => {
    const graph = graphOf(CANONICAL);
    const route = findShortestDescent(graph);

    expect(route.mode).toBe("reverse");
    expect(route.distance).toBe(29);
    const first = route.path[0];
    if (!first) throw new Error("empty path");
    expect(elevationAt(graph, coordinateKey(first))).toBe(0);
    expect(route.path[29]).toEqual({ row: 2, col: 5 });
    expectValidClimb(graph, route);
  });

  it("picks the nearest low cell rather than the start", () => {
    const route = findShortestDescent(graphOf(RAMP));

    expect(route.distance).toBe(25);
    expect(route.path[0]).toEqual({ row: 0, col: 1 });
  });

  it("accepts an already reversed graph", () => {
    const reversed = reverseGraph(graphOf(CANONICAL));
    expect(findShortestDescent(reversed).distance).toBe(29);
  });

  it("does not modify the graph it is given", () => {
    const graph = graphOf(CANONICAL);
    const edges = [...graph.edges];
    findShortestDescent(graph);

    expect(graph.edges).toEqual(edges);
    expect(graph.reversed).toBe(false);
  });

  it("searches for another elevation when asked", () => {
    // nearest 'b' on the ramp is at column 2, 24 steps below the end
    const route = findShortestDescent(graphOf(RAMP), { lowestElevation: 1 });

    expect(route.distance).toBe(24);
    expect(route.path[0]).toEqual({ row: 0, col: 2 });
  });

  it("fails when no low cell can reach the end", () => {
    try {
      findShortestDescent(graphOf(WALLED));
      expect.unreachable("expected no path");
    } catch (err) {
      expect(err).toBeInstanceOf(NoPathFoundError);
      if (err instanceof NoPathFoundError) {
        expect(err.mode).toBe("reverse");
      }
    }
  });

  it("fails when the start is next to the end but cannot climb to it", () => {
    expect(() => findShortestDescent(graphOf("SE"))).toThrow(NoPathFoundError);
  });

  it("logs the nearest low cell when verbose", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    findShortestDescent(graphOf(RAMP), { verbose: true });

    expect(log.mock.calls).toEqual([["[search] reverse: nearest elevation-0 cell [0,1], distance=25"]]);
  });
});
