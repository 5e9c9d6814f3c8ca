/**
 * Cavern game engine: the FIND/SCRAM state machine, phase executors and
 * scoring.
 *
 * @example
 * ```typescript
 * import { InlineExecutor, runNewGame } from "@cavern/game";
 *
 * const report = await runNewGame(42, { executor: new InlineExecutor(mySolver) });
 * console.log(report.score);
 * ```
 */

export * from "./constants";
export * from "./display";
export * from "./executors";
export * from "./game";
export * from "./logger";
export * from "./run";
export * from "./scoring";
export * from "./solver";
