/**
 * The pair of caverns a game is played on.
 */

import { SeededRandom } from "@cavern/contracts";
import { MAX_COLS, MAX_ROWS, MIN_COLS, MIN_ROWS } from "../constants";
import type { Cavern } from "../core/graph/cavern";
import { digCavern } from "./dig";

export interface GameCaverns {
  readonly seed: number;
  readonly rows: number;
  readonly columns: number;
  /** Entrance to target */
  readonly find: Cavern;
  /** FIND target position to exit; same dimensions, different layout */
  readonly scram: Cavern;
}

/**
 * Derive dimensions from the seed, dig the FIND cavern, then dig the SCRAM
 * cavern from the FIND target's coordinates, all from one random stream.
 */
export function createGameCaverns(seed: number): GameCaverns {
  const rng = new SeededRandom(seed);
  const rows = rng.range(MIN_ROWS, MAX_ROWS);
  const columns = rng.range(MIN_COLS, MAX_COLS);

  const find = digCavern(rows, columns, rng);
  const { row, column } = find.target.tile;
  const scram = digCavern(rows, columns, rng, { row, column });

  return { seed, rows, columns, find, scram };
}
