import { describe, expect, it } from "vitest";
import { Game, WorkerExecutor } from "../src";
import { fixtureCaverns, solverUrl } from "./helpers";

const WORKER_TEST_TIMEOUT = 30_000;

/** Long enough for the worker to load its sources and start the solver. */
const SHORT_DEADLINE_MS = 3_000;

interface Deadlines {
  readonly findTimeoutMs?: number;
  readonly scramTimeoutMs?: number;
}

function playWith(solver: string, deadlines: Deadlines = {}) {
  const executor = new WorkerExecutor({ solverModule: solverUrl(solver) });
  return new Game(fixtureCaverns(), {
    executor,
    findTimeoutMs: deadlines.findTimeoutMs ?? 20_000,
    scramTimeoutMs: deadlines.scramTimeoutMs ?? 20_000,
  }).run();
}

describe("WorkerExecutor", () => {
  it(
    "replays the worker's moves on the live run",
    async () => {
      const report = await playWith("depth-first");

      expect(report).toMatchObject({
        find: { succeeded: true, stepsTaken: 4 },
        scram: { succeeded: true, stepsRemaining: 19 },
        goldCollected: 12,
        score: 15,
      });
    },
    WORKER_TEST_TIMEOUT,
  );

  it(
    "times out a FIND solver that never returns",
    async () => {
      const report = await playWith("spin", { findTimeoutMs: SHORT_DEADLINE_MS });

      expect(report.find).toMatchObject({
        succeeded: false,
        errored: false,
        timedOut: true,
        failure: "FIND phase timed out after 3000 ms",
      });
      expect(report.scram.succeeded).toBe(false);
      expect(report.score).toBe(0);
    },
    WORKER_TEST_TIMEOUT,
  );

  it(
    "times out a SCRAM solver that never returns",
    async () => {
      const report = await playWith("scram-spin", { scramTimeoutMs: SHORT_DEADLINE_MS });

      expect(report.find).toMatchObject({ succeeded: true, timedOut: false, stepsTaken: 4 });
      expect(report.scram).toMatchObject({
        succeeded: false,
        errored: false,
        outOfSteps: false,
        timedOut: true,
        failure: "SCRAM phase timed out after 3000 ms",
        stepsRemaining: 23,
        distanceLeft: 4,
      });
      expect(report.goldCollected).toBe(0);
      expect(report.score).toBe(0);
    },
    WORKER_TEST_TIMEOUT,
  );

  it(
    "captures a solver fault",
    async () => {
      const report = await playWith("throwing");

      expect(report.find).toMatchObject({
        errored: true,
        timedOut: false,
        fault: { message: "solver exploded" },
      });
    },
    WORKER_TEST_TIMEOUT,
  );

  it(
    "stops SCRAM at the last affordable move",
    async () => {
      const report = await playWith("overrun");

      expect(report.scram).toMatchObject({
        succeeded: false,
        outOfSteps: true,
        errored: false,
        stepsRemaining: 0,
        distanceLeft: 3,
      });
      expect(report.goldCollected).toBe(5);
      expect(report.score).toBe(6);
    },
    WORKER_TEST_TIMEOUT,
  );

  it(
    "rejects a module without a solver",
    async () => {
      const report = await playWith("not-a-solver");

      expect(report.find.errored).toBe(true);
      expect(report.find.fault?.message).toContain("has no default export");
    },
    WORKER_TEST_TIMEOUT,
  );
});
