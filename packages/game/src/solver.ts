/**
 * Solver contract and module loading.
 */

import { CavernError } from "@cavern/contracts";
import type { FindView, ScramView } from "./run/views";

/**
 * Decision logic driven by the game, each method called at most once.
 *
 * A FIND walk must return while standing on the target; a SCRAM walk must
 * return while standing on the exit, within the step budget.
 */
export interface Solver {
  exploreForTarget(view: FindView): void;
  scramToExit(view: ScramView): void;
}

export function isSolver(value: unknown): value is Solver {
  return (
    typeof value === "object" &&
    value !== null &&
    "exploreForTarget" in value &&
    typeof value.exploreForTarget === "function" &&
    "scramToExit" in value &&
    typeof value.scramToExit === "function"
  );
}

/**
 * Import a module whose default export is a Solver.
 *
 * @param specifier - file URL or package specifier
 * @throws CavernError `SOLVER_INVALID`
 */
export async function loadSolver(specifier: string): Promise<Solver> {
  const loaded: unknown = await import(specifier);
  const candidate =
    typeof loaded === "object" && loaded !== null && "default" in loaded
      ? loaded.default
      : undefined;

  if (!isSolver(candidate)) {
    throw new CavernError(
      "SOLVER_INVALID",
      `${specifier} has no default export implementing exploreForTarget and scramToExit`,
      { specifier },
    );
  }
  return candidate;
}
