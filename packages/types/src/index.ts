/**
 * @ridgeline/types
 *
 * Shared domain types for elevation-grid route search.
 *
 * - Grid: Parsed heightmap with start and end cells
 * - Graph: Directed adjacency built from the grid's climb rule
 * - Route: The result of a search
 */

export * from "./grid.js";
export * from "./graph.js";
export * from "./route.js";
