/**
 * WorkerExecutor
 *
 * Hosts the solver in a worker thread with its own heap. The worker replays
 * the phase on a mirror GameRun rebuilt from the serialized caverns and
 * streams every accepted move; the engine applies each move to the live
 * view. When the deadline passes, the engine stops listening first and then
 * terminates the worker, so nothing lands after the outcome is settled.
 */

import { Worker } from "node:worker_threads";
import { CavernError } from "@cavern/contracts";
import type { NodeId } from "@cavern/maze";
import { type Logger, silentLogger } from "../logger";
import { outcomeFromError, type PhaseOutcome } from "../run/outcome";
import { type PhaseWorkerData, WorkerMessageSchema } from "./protocol";
import type { PhaseExecutor, PhaseTask } from "./types";

/** Plain ESM bootstrap that loads `phase-worker.ts` through tsx. */
const WORKER_ENTRY = new URL("./phase-worker-boot.mjs", import.meta.url);

export interface WorkerExecutorOptions {
  /** Module whose default export is the Solver; a file URL or specifier */
  readonly solverModule: string | URL;
  readonly logger?: Logger;
}

function replay(task: PhaseTask, nodeId: NodeId): void {
  if (task.phase === "find") {
    task.view.moveTo(nodeId);
    return;
  }
  const node = task.cavern.node(nodeId);
  if (!node) {
    throw new CavernError("SOLVER_INVALID", `worker reported a move to unknown node ${nodeId}`, {
      nodeId,
    });
  }
  task.view.moveTo(node);
}

export class WorkerExecutor implements PhaseExecutor {
  private readonly solverModule: string;
  private readonly logger: Logger;

  constructor(options: WorkerExecutorOptions) {
    this.solverModule = String(options.solverModule);
    this.logger = options.logger ?? silentLogger;
  }

  execute(task: PhaseTask): Promise<PhaseOutcome> {
    const workerData: PhaseWorkerData = {
      phase: task.phase,
      solverModule: this.solverModule,
      find: [...task.caverns.find],
      scram: [...task.caverns.scram],
    };

    return new Promise((resolve) => {
      const worker = new Worker(WORKER_ENTRY, { execArgv: [], workerData });
      let settled = false;

      const settle = (outcome: PhaseOutcome): void => {
        if (settled) return;
        settled = true;
        clearTimeout(deadline);
        worker.off("message", onMessage);
        worker.terminate().catch((error: unknown) => {
          this.logger.warn("Failed to terminate phase worker:", error);
        });
        resolve(outcome);
      };

      const onMessage = (raw: unknown): void => {
        const parsed = WorkerMessageSchema.safeParse(raw);
        if (!parsed.success) {
          settle({ kind: "faulted", message: "phase worker sent a malformed message" });
          return;
        }

        const message = parsed.data;
        if (message.type === "settled") {
          settle(message.outcome);
          return;
        }
        try {
          replay(task, message.nodeId);
        } catch (error) {
          settle(outcomeFromError(error));
        }
      };

      const deadline = setTimeout(() => {
        this.logger.warn(`${task.phase} phase exceeded ${task.timeoutMs} ms, terminating worker`);
        settle({ kind: "timedOut", timeoutMs: task.timeoutMs });
      }, task.timeoutMs);

      worker.on("message", onMessage);
      worker.on("error", (error) => settle(outcomeFromError(error)));
      worker.on("exit", (code) => {
        settle({ kind: "faulted", message: `phase worker exited with code ${code} before settling` });
      });
    });
  }
}
