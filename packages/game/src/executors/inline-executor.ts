import { outcomeFromError, type PhaseOutcome } from "../run/outcome";
import type { Solver } from "../solver";
import type { PhaseExecutor, PhaseTask } from "./types";

/**
 * Runs the solver on the calling thread against the live views.
 *
 * There is no deadline: `timeoutMs` is ignored. Meant for trusted solvers.
 */
export class InlineExecutor implements PhaseExecutor {
  constructor(private readonly solver: Solver) {}

  async execute(task: PhaseTask): Promise<PhaseOutcome> {
    try {
      if (task.phase === "find") {
        this.solver.exploreForTarget(task.view);
      } else {
        this.solver.scramToExit(task.view);
      }
      return { kind: "completed" };
    } catch (error) {
      return outcomeFromError(error);
    }
  }
}
