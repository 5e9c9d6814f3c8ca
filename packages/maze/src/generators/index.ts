/**
 * Cavern generators.
 */

export * from "./dig";
export * from "./game-caverns";
