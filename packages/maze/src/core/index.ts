/**
 * Core module - cavern graph primitives and algorithms.
 */

export * from "./algorithms/union-find";
export * from "./data-structures/distance-frontier";
export * from "./graph";
export * from "./hash";
export * from "./pathfinding";
