/**
 * Repeated games with per-run and average score reporting.
 */

import { resolve } from "node:path";
import { pathToFileURL } from "node:url";
import { type RunConfig, SeededRandom } from "@cavern/contracts";
import {
  createGame,
  formatReport,
  type GameReport,
  type Logger,
  nullDisplay,
  type PhaseExecutor,
  silentLogger,
  WorkerExecutor,
} from "@cavern/game";
import { ConsoleDisplay } from "./console-display";

const REFERENCE_SOLVER = new URL("./solver/reference-solver.ts", import.meta.url);

export interface RunnerOptions {
  /** Defaults to a worker hosting `config.solver` or the reference solver */
  readonly executor?: PhaseExecutor;
  readonly logger?: Logger;
  readonly write?: (line: string) => void;
}

export interface RunSummary {
  readonly reports: readonly GameReport[];
  /** Total score divided by the run count, rounded toward zero */
  readonly average: number;
}

export function solverModuleFor(config: RunConfig): URL {
  return config.solver === undefined ? REFERENCE_SOLVER : pathToFileURL(resolve(config.solver));
}

export async function runGames(config: RunConfig, options: RunnerOptions = {}): Promise<RunSummary> {
  const write = options.write ?? ((line: string) => console.log(line));
  const logger = options.logger ?? silentLogger;
  const executor =
    options.executor ?? new WorkerExecutor({ solverModule: solverModuleFor(config), logger });
  const display = config.display ? new ConsoleDisplay(write) : nullDisplay;

  const reports: GameReport[] = [];
  let seed = config.seed;
  let total = 0;

  for (let run = 0; run < config.count; run++) {
    const game = createGame(seed, { executor, display, logger });
    write(`Seed : ${game.seed}`);

    const report = await game.run();
    for (const line of formatReport(report)) write(line);
    write("");

    reports.push(report);
    total += report.score;
    if (seed !== 0) seed = new SeededRandom(seed).nextSeed();
  }

  const average = Math.trunc(total / config.count);
  write(`Average score : ${average}`);
  return { reports, average };
}
