/**
 * Coordinate helpers: value keys, display and neighbours.
 */

import type { Coordinate } from "@ridgeline/types";

/** Map key for a coordinate; two equal coordinates share a key. */
export function coordinateKey(coord: Coordinate): string {
  return `${coord.row},${coord.col}`;
}

/** Display form, e.g. `[2,5]` */
export function formatCoordinate(coord: Coordinate): string {
  return `[${coord.row},${coord.col}]`;
}

/** Up, down, left, right */
const DIRECTIONS: readonly (readonly [number, number])[] = [
  [-1, 0],
  [1, 0],
  [0, -1],
  [0, 1],
];

/**
 * The four axis-aligned neighbours of a coordinate.
 * Neighbours with a negative row or column are left out; the caller checks
 * the far edges against the grid.
 */
export function axisNeighbors(coord: Coordinate): Coordinate[] {
  const neighbors: Coordinate[] = [];
  for (const [dRow, dCol] of DIRECTIONS) {
    const row = coord.row + dRow;
    const col = coord.col + dCol;
    if (row < 0 || col < 0) continue;
    neighbors.push({ row, col });
  }
  return neighbors;
}

/** True when two coordinates differ by one step along one axis */
export function areAdjacent(a: Coordinate, b: Coordinate): boolean {
  return Math.abs(a.row - b.row) + Math.abs(a.col - b.col) === 1;
}
