/**
 * Pathfinding over cavern graphs.
 */

export * from "./shortest-path";
