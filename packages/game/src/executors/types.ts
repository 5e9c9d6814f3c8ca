import type { Cavern } from "@cavern/maze";
import type { PhaseOutcome } from "../run/outcome";
import type { FindView, ScramView } from "../run/views";

/** Both caverns in the text cavern format, as they stand at phase start. */
export interface SerializedCaverns {
  readonly find: readonly string[];
  readonly scram: readonly string[];
}

interface PhaseTaskBase {
  readonly timeoutMs: number;
  readonly caverns: SerializedCaverns;
}

export interface FindTask extends PhaseTaskBase {
  readonly phase: "find";
  readonly view: FindView;
}

export interface ScramTask extends PhaseTaskBase {
  readonly phase: "scram";
  readonly view: ScramView;
  /** Live SCRAM cavern, for resolving node ids */
  readonly cavern: Cavern;
}

export type PhaseTask = FindTask | ScramTask;

/**
 * Runs one solver callback against a phase view.
 *
 * Implementations settle with an outcome instead of rejecting.
 */
export interface PhaseExecutor {
  execute(task: PhaseTask): Promise<PhaseOutcome>;
}
