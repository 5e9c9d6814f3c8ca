/**
 * Scoring
 *
 * The bonus rewards a FIND walk close to the shortest path; the score is
 * the SCRAM gold scaled by that bonus.
 */

import { MAX_EDGE_WEIGHT } from "@cavern/maze";
import { EXTRA_STEPS_FACTOR, MAX_BONUS, MIN_BONUS, NO_BONUS_LENGTH } from "./constants";

/**
 * Bonus multiplier in [MIN_BONUS, MAX_BONUS].
 *
 * Falls linearly from MAX_BONUS at an optimal walk to MIN_BONUS once the
 * excess over `minStepsToFind` reaches NO_BONUS_LENGTH times it, i.e. a walk
 * of 4x the shortest. A 3x walk still earns 1.1.
 */
export function computeBonusFactor(stepsTaken: number, minStepsToFind: number): number {
  if (minStepsToFind <= 0) return MAX_BONUS;

  const huntDiff = (stepsTaken - minStepsToFind) / minStepsToFind;
  if (huntDiff <= 0) return MAX_BONUS;

  const range = MAX_BONUS - MIN_BONUS;
  return Math.max(MIN_BONUS, MAX_BONUS - (huntDiff / NO_BONUS_LENGTH) * range);
}

export function computeScore(bonusFactor: number, goldCollected: number): number {
  return Math.floor(bonusFactor * goldCollected);
}

/**
 * SCRAM budget: the shortest way out plus slack proportional to the number
 * of open tiles.
 */
export function computeStepsToScram(minPathToExit: number, openTileCount: number): number {
  return Math.floor(
    minPathToExit + (EXTRA_STEPS_FACTOR * (MAX_EDGE_WEIGHT + 1) * openTileCount) / 2,
  );
}

/** Up to two decimals, trailing zeros dropped ("1.3", "1.15", "1"). */
export function formatBonus(bonusFactor: number): string {
  return String(Math.round(bonusFactor * 100) / 100);
}
