/**
 * GameRun
 *
 * The mutable session of one game: position, step counters, gold and the
 * per-phase results. Solvers never touch it directly; they get a FindView
 * or a ScramView, each revoked when its phase ends.
 *
 * Lifecycle: ready -> find -> found -> scram -> finished. A FIND that does
 * not end on the target goes straight to finished.
 */

import { CavernError, OutOfStepsError } from "@cavern/contracts";
import { type Cavern, type CavernNode, type NodeId, takeGold } from "@cavern/maze";
import { type DisplaySink, nullDisplay, type Phase } from "../display";
import { computeBonusFactor, computeScore, computeStepsToScram } from "../scoring";
import type { PhaseOutcome } from "./outcome";
import { type FindView, LiveFindView, LiveScramView, type ScramView } from "./views";

export type RunStage = "ready" | "find" | "found" | "scram" | "finished";

export interface PhaseFault {
  readonly message: string;
  readonly stack?: string;
}

export interface PhaseResult {
  readonly succeeded: boolean;
  readonly errored: boolean;
  readonly timedOut: boolean;
  readonly outOfSteps: boolean;
  readonly wrongLocation: boolean;
  /** Operator-facing reason the phase failed */
  readonly failure?: string;
  readonly fault?: PhaseFault;
}

export interface RunReport {
  readonly find: PhaseResult & {
    readonly stepsTaken: number;
    readonly minDistance: number;
    /** Shortest remaining way to the target when FIND failed, else 0 */
    readonly distanceLeft: number;
  };
  readonly scram: PhaseResult & {
    readonly stepsRemaining: number;
    readonly minDistance: number;
    /** Shortest remaining way to the exit when the run failed, else 0 */
    readonly distanceLeft: number;
  };
  readonly goldCollected: number;
  readonly bonusFactor: number;
  readonly score: number;
}

export interface GameRunOptions {
  readonly display?: DisplaySink;
}

type MutableResult = { -readonly [K in keyof PhaseResult]: PhaseResult[K] };

const PHASE_NAMES: Record<Phase, string> = { find: "FIND", scram: "SCRAM" };

function freshResult(): MutableResult {
  return {
    succeeded: false,
    errored: false,
    timedOut: false,
    outOfSteps: false,
    wrongLocation: false,
  };
}

export class GameRun {
  /** Shortest FIND path, the bonus baseline */
  readonly minStepsToFind: number;

  private readonly display: DisplaySink;
  private readonly scramNodes: readonly CavernNode[];

  private currentStage: RunStage = "ready";
  private current: CavernNode;
  private taken = 0;
  private remaining = 0;
  private gold = 0;

  private readonly results: Record<Phase, MutableResult> = {
    find: freshResult(),
    scram: freshResult(),
  };
  private minFindDistance = 0;
  private minScramDistance = 0;
  private findDistanceLeft = 0;
  private scramDistanceLeft = 0;

  private findView?: LiveFindView;
  private scramView?: LiveScramView;

  constructor(
    readonly caverns: { readonly find: Cavern; readonly scram: Cavern },
    options: GameRunOptions = {},
  ) {
    this.display = options.display ?? nullDisplay;
    this.scramNodes = Object.freeze([...caverns.scram.nodes]);
    this.minStepsToFind = caverns.find.minPathLengthToTarget(caverns.find.entrance);
    this.current = caverns.find.entrance;
  }

  get stage(): RunStage {
    return this.currentStage;
  }

  get position(): CavernNode {
    return this.current;
  }

  get stepsTaken(): number {
    return this.taken;
  }

  /** SCRAM budget left; 0 before SCRAM starts. */
  get stepsRemaining(): number {
    return this.remaining;
  }

  get goldCollected(): number {
    return this.gold;
  }

  get bonusFactor(): number {
    return computeBonusFactor(this.taken, this.minStepsToFind);
  }

  get score(): number {
    return computeScore(this.bonusFactor, this.gold);
  }

  result(phase: Phase): PhaseResult {
    return { ...this.results[phase] };
  }

  // ===========================================================================
  // FIND
  // ===========================================================================

  beginFind(): FindView {
    this.advance("ready", "find");
    const { find } = this.caverns;

    this.current = find.entrance;
    this.taken = 0;
    this.minFindDistance = find.minPathLengthToTarget(this.current);

    this.display.notify({ type: "cavern", phase: "find", cavern: find });
    this.display.notify({ type: "position", node: this.current });
    this.display.notify({ type: "phase", label: "Finding" });

    const view = new LiveFindView({
      position: () => this.current,
      target: () => find.target,
      move: (id) => this.moveFind(id),
    });
    this.findView = view;
    return view;
  }

  endFind(outcome: PhaseOutcome): PhaseResult {
    this.expectStage("find", "endFind");
    this.findView?.revoke();

    const { find, scram } = this.caverns;
    const result = this.record("find", outcome);
    if (outcome.kind === "completed") {
      if (this.current === find.target) {
        result.succeeded = true;
      } else {
        this.fail(result, "find", "wrongLocation");
      }
    }

    if (result.succeeded) {
      this.currentStage = "found";
    } else {
      this.findDistanceLeft = find.minPathLengthToTarget(this.current);
      this.scramDistanceLeft = scram.minPathLengthToTarget(scram.entrance);
      this.currentStage = "finished";
    }
    return { ...result };
  }

  /**
   * Treat FIND as already won and stand on its target. Used by mirror runs
   * that only host a SCRAM phase.
   */
  resumeAtScram(): void {
    this.advance("ready", "found");
    this.current = this.caverns.find.target;
    this.results.find.succeeded = true;
  }

  private moveFind(id: NodeId): void {
    const next = this.current.neighbors().find((node) => node.id === id);
    if (!next) {
      throw CavernError.notAdjacent({ from: this.current.id, to: id });
    }

    this.current = next;
    this.taken++;
    this.display.notify({ type: "bonus", factor: this.bonusFactor });
    this.display.notify({ type: "position", node: next });
  }

  // ===========================================================================
  // SCRAM
  // ===========================================================================

  beginScram(): ScramView {
    this.advance("found", "scram");
    const { scram } = this.caverns;

    this.current = scram.entrance;
    this.minScramDistance = scram.minPathLengthToTarget(this.current);
    this.remaining = computeStepsToScram(this.minScramDistance, scram.openTileCount);

    this.display.notify({ type: "cavern", phase: "scram", cavern: scram });
    this.display.notify({ type: "steps", remaining: this.remaining });
    this.display.notify({ type: "position", node: this.current });
    this.display.notify({ type: "phase", label: "Scramming" });
    this.collectGold();

    const view = new LiveScramView({
      position: () => this.current,
      exit: () => scram.target,
      nodes: () => this.scramNodes,
      budget: () => this.remaining,
      move: (node) => this.moveScram(node),
    });
    this.scramView = view;
    return view;
  }

  endScram(outcome: PhaseOutcome): PhaseResult {
    this.expectStage("scram", "endScram");
    this.scramView?.revoke();

    const { scram } = this.caverns;
    const result = this.record("scram", outcome);
    if (outcome.kind === "completed") {
      if (this.current === scram.target) {
        result.succeeded = true;
        this.display.notify({ type: "phase", label: "Scram Succeeded" });
      } else {
        this.fail(result, "scram", "wrongLocation");
      }
    }

    if (!result.succeeded) {
      this.scramDistanceLeft = scram.minPathLengthToTarget(this.current);
    }
    this.currentStage = "finished";
    return { ...result };
  }

  private moveScram(node: CavernNode): void {
    const edge = this.current.edgeTo(node);
    if (!edge) {
      throw CavernError.notAdjacent({ from: this.current.id, to: node.id });
    }
    if (edge.length > this.remaining) {
      throw new OutOfStepsError(edge.length, this.remaining);
    }

    this.remaining -= edge.length;
    this.current = node;
    this.display.notify({ type: "steps", remaining: this.remaining });
    this.display.notify({ type: "position", node });
    this.collectGold();
  }

  private collectGold(): void {
    if (this.current.tile.gold <= 0) return;
    this.gold += takeGold(this.current.tile);
    this.display.notify({ type: "gold", collected: this.gold, score: this.score });
  }

  // ===========================================================================
  // Results
  // ===========================================================================

  report(): RunReport {
    return {
      find: {
        ...this.result("find"),
        stepsTaken: this.taken,
        minDistance: this.minFindDistance,
        distanceLeft: this.findDistanceLeft,
      },
      scram: {
        ...this.result("scram"),
        stepsRemaining: this.remaining,
        minDistance: this.minScramDistance,
        distanceLeft: this.scramDistanceLeft,
      },
      goldCollected: this.gold,
      bonusFactor: this.bonusFactor,
      score: this.score,
    };
  }

  private record(phase: Phase, outcome: PhaseOutcome): MutableResult {
    const result = this.results[phase];
    switch (outcome.kind) {
      case "completed":
        break;
      case "faulted":
        result.errored = true;
        result.fault =
          outcome.stack === undefined
            ? { message: outcome.message }
            : { message: outcome.message, stack: outcome.stack };
        this.fail(result, phase, "errored");
        break;
      case "outOfSteps":
        this.fail(result, phase, "outOfSteps");
        break;
      case "timedOut":
        this.fail(result, phase, "timedOut", `after ${outcome.timeoutMs} ms`);
        break;
    }
    return result;
  }

  private fail(
    result: MutableResult,
    phase: Phase,
    kind: "errored" | "timedOut" | "outOfSteps" | "wrongLocation",
    detail = "",
  ): void {
    const name = PHASE_NAMES[phase];
    const messages = {
      errored: `Solver errored during the ${name} phase`,
      timedOut: `${name} phase timed out ${detail}`.trimEnd(),
      outOfSteps: `${name} ran out of steps before reaching the exit`,
      wrongLocation: `${name} returned at the wrong location`,
    } as const;

    result[kind] = true;
    result.failure = messages[kind];
    this.display.notify({ type: "error", message: messages[kind] });
  }

  private advance(from: RunStage, to: RunStage): void {
    if (this.currentStage !== from) {
      throw new CavernError(
        "ILLEGAL_TRANSITION",
        `cannot move from ${this.currentStage} to ${to}`,
        { from: this.currentStage, to },
      );
    }
    this.currentStage = to;
  }

  private expectStage(stage: RunStage, operation: string): void {
    if (this.currentStage !== stage) {
      throw new CavernError(
        "ILLEGAL_TRANSITION",
        `${operation}() requires stage ${stage}, run is ${this.currentStage}`,
        { operation, stage: this.currentStage },
      );
    }
  }
}
