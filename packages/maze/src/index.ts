/**
 * Cavern maze package: graph model, digging, shortest paths and the cavern
 * file format.
 *
 * @example
 * ```typescript
 * import { createGameCaverns, shortestPath, pathWeight } from "@cavern/maze";
 *
 * const { find } = createGameCaverns(12345);
 * const path = shortestPath(find.entrance, find.target);
 * console.log(`${path.length} tiles, length ${pathWeight(path)}`);
 * ```
 */

export * from "./codec";
export * from "./constants";
export * from "./core";
export * from "./generators";
export * from "./utils";
export * from "./validation";
