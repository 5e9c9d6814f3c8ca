/**
 * Error codes for cavern generation and play.
 *
 * `NOT_ADJACENT`, `PHASE_CLOSED` and `ILLEGAL_TRANSITION` are contract
 * violations by the caller. `OUT_OF_STEPS` is an expected in-play condition.
 */
export type CavernErrorCode =
  | "CONFIG_INVALID"
  | "SEED_INVALID"
  | "FORMAT_INVALID"
  | "GENERATION_FAILED"
  | "NODE_UNREACHABLE"
  | "PATH_INVALID"
  | "NOT_ADJACENT"
  | "PHASE_CLOSED"
  | "ILLEGAL_TRANSITION"
  | "OUT_OF_STEPS"
  | "SOLVER_INVALID";

/**
 * Unified error type for all cavern operations.
 *
 * @example
 * ```typescript
 * throw new CavernError(
 *   "NOT_ADJACENT",
 *   "moveTo: node must be adjacent to the current position",
 *   { from: position.id, to: id },
 * );
 * ```
 */
export class CavernError extends Error {
  override readonly name: string = "CavernError";

  constructor(
    public readonly code: CavernErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);

    // Maintains proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  static configInvalid(message: string, details?: Record<string, unknown>): CavernError {
    return new CavernError("CONFIG_INVALID", message, details);
  }

  static formatInvalid(line: number, message: string): CavernError {
    return new CavernError("FORMAT_INVALID", `line ${line}: ${message}`, { line });
  }

  static notAdjacent(details?: Record<string, unknown>): CavernError {
    return new CavernError(
      "NOT_ADJACENT",
      "moveTo: node must be adjacent to the current position",
      details,
    );
  }

  static phaseClosed(operation: string): CavernError {
    return new CavernError(
      "PHASE_CLOSED",
      `${operation}() called after its phase ended`,
      { operation },
    );
  }

  static isCavernError(error: unknown): error is CavernError {
    return error instanceof CavernError;
  }
}

/**
 * Raised by a SCRAM move whose edge is longer than the remaining budget.
 * The move is rejected before any state changes.
 */
export class OutOfStepsError extends CavernError {
  override readonly name: string = "OutOfStepsError";

  constructor(
    public readonly required: number,
    public readonly remaining: number,
  ) {
    super(
      "OUT_OF_STEPS",
      `ran out of steps: move needs ${required}, ${remaining} left`,
      { required, remaining },
    );
  }
}
