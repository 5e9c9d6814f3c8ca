/** Wall-clock deadline for a FIND phase. */
export const FIND_TIMEOUT_MS = 10_000;

/** Wall-clock deadline for a SCRAM phase. */
export const SCRAM_TIMEOUT_MS = 15_000;

export const MIN_BONUS = 1.0;
export const MAX_BONUS = 1.3;

/** FIND walks this many times longer than optimal earn no bonus. */
export const NO_BONUS_LENGTH = 3;

/** Share of extra SCRAM budget, proportional to the cavern's size. */
export const EXTRA_STEPS_FACTOR = 0.3;
