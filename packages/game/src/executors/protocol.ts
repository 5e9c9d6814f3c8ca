/**
 * Messages between the engine and a phase worker.
 */

import { z } from "zod";

export const PhaseWorkerDataSchema = z.object({
  phase: z.enum(["find", "scram"]),
  solverModule: z.string().min(1),
  find: z.array(z.string()),
  scram: z.array(z.string()),
});

export type PhaseWorkerData = z.infer<typeof PhaseWorkerDataSchema>;

const SettledOutcomeSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("completed") }),
  z.object({ kind: z.literal("faulted"), message: z.string(), stack: z.string().optional() }),
  z.object({ kind: z.literal("outOfSteps"), message: z.string() }),
]);

export const WorkerMessageSchema = z.discriminatedUnion("type", [
  /** A move the worker's mirror run accepted */
  z.object({ type: z.literal("move"), nodeId: z.number().int() }),
  /** The solver returned or threw; always the last message */
  z.object({ type: z.literal("settled"), outcome: SettledOutcomeSchema }),
]);

export type WorkerMessage = z.infer<typeof WorkerMessageSchema>;
