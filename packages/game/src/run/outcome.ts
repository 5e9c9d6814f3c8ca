import { OutOfStepsError } from "@cavern/contracts";

/**
 * How a solver callback ended, as seen by the executor.
 */
export type PhaseOutcome =
  | { readonly kind: "completed" }
  | { readonly kind: "faulted"; readonly message: string; readonly stack?: string }
  | { readonly kind: "outOfSteps"; readonly message: string }
  | { readonly kind: "timedOut"; readonly timeoutMs: number };

/** Outcomes a solver reaches on its own, without a deadline. */
export type SettledOutcome = Exclude<PhaseOutcome, { readonly kind: "timedOut" }>;

/**
 * Classify an error thrown out of a solver callback.
 */
export function outcomeFromError(error: unknown): SettledOutcome {
  if (error instanceof OutOfStepsError) {
    return { kind: "outOfSteps", message: error.message };
  }
  if (error instanceof Error) {
    return error.stack === undefined
      ? { kind: "faulted", message: error.message }
      : { kind: "faulted", message: error.message, stack: error.stack };
  }
  return { kind: "faulted", message: String(error) };
}
