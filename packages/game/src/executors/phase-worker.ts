/**
 * Worker entry: hosts a solver against a mirror GameRun and streams every
 * accepted move back to the engine.
 */

import { type MessagePort, parentPort, workerData } from "node:worker_threads";
import { loadGraph } from "@cavern/maze";
import type { DisplaySink } from "../display";
import { GameRun } from "../run/game-run";
import { outcomeFromError } from "../run/outcome";
import { loadSolver } from "../solver";
import { PhaseWorkerDataSchema, type WorkerMessage } from "./protocol";

function requirePort(): MessagePort {
  if (!parentPort) {
    throw new Error("phase-worker must run inside a worker thread");
  }
  return parentPort;
}

const port = requirePort();

function post(message: WorkerMessage): void {
  port.postMessage(message);
}

async function main(): Promise<void> {
  const data = PhaseWorkerDataSchema.parse(workerData);
  const solver = await loadSolver(data.solverModule);
  const caverns = {
    find: loadGraph(data.find).getOrThrow(),
    scram: loadGraph(data.scram).getOrThrow(),
  };

  let streaming = false;
  const relay: DisplaySink = {
    notify(event) {
      if (streaming && event.type === "position") {
        post({ type: "move", nodeId: event.node.id });
      }
    },
  };
  const mirror = new GameRun(caverns, { display: relay });

  if (data.phase === "find") {
    const view = mirror.beginFind();
    streaming = true;
    solver.exploreForTarget(view);
  } else {
    mirror.resumeAtScram();
    const view = mirror.beginScram();
    streaming = true;
    solver.scramToExit(view);
  }
  post({ type: "settled", outcome: { kind: "completed" } });
}

main().catch((error: unknown) => {
  post({ type: "settled", outcome: outcomeFromError(error) });
});
