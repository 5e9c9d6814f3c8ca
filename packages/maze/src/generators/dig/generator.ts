/**
 * Cavern Digger
 *
 * Builds a connected, weighted cavern on a rows x columns grid.
 */

import { CavernError, type SeededRandom } from "@cavern/contracts";
import { MAX_COLS, MAX_ROWS, MIN_COLS, MIN_ROWS } from "../../constants";
import { type Cavern, CavernBuilder } from "../../core/graph/cavern";
import type { TilePosition } from "../../core/graph/model";
import { digFrontier, openStart, placeTarget } from "./passes";

function validateDimensions(rows: number, columns: number): void {
  if (!Number.isInteger(rows) || rows < MIN_ROWS || rows > MAX_ROWS) {
    throw CavernError.configInvalid(`Rows must be an integer in [${MIN_ROWS}, ${MAX_ROWS}]`, { rows });
  }
  if (!Number.isInteger(columns) || columns < MIN_COLS || columns > MAX_COLS) {
    throw CavernError.configInvalid(`Columns must be an integer in [${MIN_COLS}, ${MAX_COLS}]`, { columns });
  }
}

/**
 * Dig a cavern. The entrance is `start` when given (the SCRAM cavern is dug
 * from the FIND target's coordinates), otherwise a random tile.
 *
 * The same dimensions, start and random stream always produce the same cavern.
 *
 * @throws CavernError `CONFIG_INVALID` for out-of-range dimensions or start
 */
export function digCavern(
  rows: number,
  columns: number,
  rng: SeededRandom,
  start?: TilePosition,
): Cavern {
  validateDimensions(rows, columns);

  const builder = new CavernBuilder(rows, columns);
  const origin = start ?? {
    row: rng.range(0, rows - 1),
    column: rng.range(0, columns - 1),
  };
  if (!builder.isInBounds(origin.row, origin.column)) {
    throw CavernError.configInvalid(
      `Start (${origin.row}, ${origin.column}) is outside a ${rows}x${columns} cavern`,
      { row: origin.row, column: origin.column },
    );
  }

  const state = { builder, rng };
  const entrance = openStart(state, origin);
  digFrontier(state, entrance);
  const target = placeTarget(state, entrance, builder.orderedNodes());

  return builder.build(entrance, target);
}
