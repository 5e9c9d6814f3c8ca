/**
 * Game
 *
 * One seeded game: FIND on the first cavern, then SCRAM on the second if
 * FIND ended on the target. Solver failures of any kind end up in the
 * report; `run()` only rejects on misuse of the Game itself.
 */

import { randomSeed } from "@cavern/contracts";
import { createGameCaverns, type GameCaverns, serializeCavern } from "@cavern/maze";
import { FIND_TIMEOUT_MS, SCRAM_TIMEOUT_MS } from "./constants";
import type { DisplaySink } from "./display";
import type { PhaseExecutor, PhaseTask, SerializedCaverns } from "./executors/types";
import { type Logger, silentLogger } from "./logger";
import { GameRun, type PhaseResult, type RunReport } from "./run/game-run";
import { outcomeFromError, type PhaseOutcome } from "./run/outcome";
import { formatBonus } from "./scoring";

export interface GameOptions {
  readonly executor: PhaseExecutor;
  readonly display?: DisplaySink;
  readonly logger?: Logger;
  readonly findTimeoutMs?: number;
  readonly scramTimeoutMs?: number;
}

export interface GameReport extends RunReport {
  readonly seed: number;
}

export class Game {
  private readonly state: GameRun;
  private readonly logger: Logger;

  constructor(
    readonly caverns: GameCaverns,
    private readonly options: GameOptions,
  ) {
    this.state = new GameRun(caverns, { display: options.display });
    this.logger = options.logger ?? silentLogger;
  }

  get seed(): number {
    return this.caverns.seed;
  }

  async run(): Promise<GameReport> {
    const findView = this.state.beginFind();
    const findOutcome = await this.execute({
      phase: "find",
      view: findView,
      timeoutMs: this.options.findTimeoutMs ?? FIND_TIMEOUT_MS,
      caverns: this.serialize(),
    });
    const find = this.state.endFind(findOutcome);
    this.logFailure(find);

    if (find.succeeded) {
      const scramView = this.state.beginScram();
      const scramOutcome = await this.execute({
        phase: "scram",
        view: scramView,
        cavern: this.caverns.scram,
        timeoutMs: this.options.scramTimeoutMs ?? SCRAM_TIMEOUT_MS,
        caverns: this.serialize(),
      });
      this.logFailure(this.state.endScram(scramOutcome));
    }

    return { seed: this.seed, ...this.state.report() };
  }

  private async execute(task: PhaseTask): Promise<PhaseOutcome> {
    try {
      return await this.options.executor.execute(task);
    } catch (error) {
      return outcomeFromError(error);
    }
  }

  private serialize(): SerializedCaverns {
    return {
      find: serializeCavern(this.caverns.find),
      scram: serializeCavern(this.caverns.scram),
    };
  }

  private logFailure(result: PhaseResult): void {
    if (result.failure === undefined) return;
    this.logger.error(result.failure);
    if (result.fault) {
      this.logger.error(result.fault.stack ?? result.fault.message);
    }
  }
}

/**
 * Build a game from a seed; 0 picks a random one.
 */
export function createGame(seed: number, options: GameOptions): Game {
  const resolved = seed === 0 ? randomSeed() : seed;
  return new Game(createGameCaverns(resolved), options);
}

export function runNewGame(seed: number, options: GameOptions): Promise<GameReport> {
  return createGame(seed, options).run();
}

/** Per-run summary lines, as printed after each game. */
export function formatReport(report: RunReport): string[] {
  return [
    `Gold collected   : ${report.goldCollected}`,
    `Bonus multiplier : ${formatBonus(report.bonusFactor)}`,
    `Score            : ${report.score}`,
  ];
}
