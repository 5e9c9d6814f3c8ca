/**
 * Digging Passes
 *
 * The stages of cavern digging. Each pass consumes the shared random stream
 * in a fixed order, which is what makes a seed reproduce a cavern exactly.
 */

import type { SeededRandom } from "@cavern/contracts";
import {
  DIG_DENSITY,
  GOLD_PROBABILITY,
  LOOP_PROBABILITY,
  MAX_EDGE_WEIGHT,
  MAX_GOLD,
  MAX_OPEN_NEIGHBORS,
  MIN_GOLD,
} from "../../constants";
import { calculateHopDistances } from "../../core/graph/bfs-distance";
import type { CavernBuilder } from "../../core/graph/cavern";
import type { CavernNode, NodeId, TilePosition } from "../../core/graph/model";

/** Orthogonal neighbours, N E S W */
const DIRECTIONS_4: ReadonlyArray<readonly [number, number]> = [
  [-1, 0],
  [0, 1],
  [1, 0],
  [0, -1],
];

interface FrontierCell extends TilePosition {
  readonly parent: CavernNode;
}

export interface DigState {
  readonly builder: CavernBuilder;
  readonly rng: SeededRandom;
}

// =============================================================================
// IDS
// =============================================================================

/**
 * Fresh random 31-bit id, distinct from every id already in the builder.
 */
function nextNodeId(state: DigState): NodeId {
  let id = state.rng.nextUint32() >>> 1;
  while (state.builder.hasId(id)) {
    id = state.rng.nextUint32() >>> 1;
  }
  return id;
}

function rollGold(rng: SeededRandom): number {
  return rng.probability(GOLD_PROBABILITY) ? rng.range(MIN_GOLD, MAX_GOLD) : 0;
}

function rollLength(rng: SeededRandom): number {
  return rng.range(1, MAX_EDGE_WEIGHT);
}

// =============================================================================
// OPEN START PASS
// =============================================================================

/**
 * Open the start tile. It never holds gold.
 */
export function openStart(state: DigState, start: TilePosition): CavernNode {
  return state.builder.addNode(nextNodeId(state), start, 0);
}

// =============================================================================
// DIG FRONTIER PASS
// =============================================================================

function pushWalls(state: DigState, node: CavernNode, frontier: FrontierCell[]): void {
  for (const [dr, dc] of DIRECTIONS_4) {
    const row = node.tile.row + dr;
    const column = node.tile.column + dc;
    if (state.builder.isInBounds(row, column) && !state.builder.nodeAt(row, column)) {
      frontier.push({ row, column, parent: node });
    }
  }
}

function openNeighbors(state: DigState, cell: TilePosition): CavernNode[] {
  const result: CavernNode[] = [];
  for (const [dr, dc] of DIRECTIONS_4) {
    const neighbor = state.builder.nodeAt(cell.row + dr, cell.column + dc);
    if (neighbor) result.push(neighbor);
  }
  return result;
}

/**
 * Grow the open region from `start` by repeatedly digging a random wall next
 * to it. Each dug tile is joined to the tile it was reached from, so the
 * region stays connected; extra joins to other open neighbours add loops.
 */
export function digFrontier(state: DigState, start: CavernNode): void {
  const { builder, rng } = state;
  const goal = Math.max(2, Math.floor(builder.rows * builder.columns * DIG_DENSITY));
  const frontier: FrontierCell[] = [];
  pushWalls(state, start, frontier);

  while (builder.nodeCount < goal && frontier.length > 0) {
    const index = rng.range(0, frontier.length - 1);
    const cell = frontier[index];
    const last = frontier.pop();
    if (!cell || !last) break;
    if (index < frontier.length) frontier[index] = last;

    if (builder.nodeAt(cell.row, cell.column)) continue;
    const neighbors = openNeighbors(state, cell);
    if (neighbors.length >= MAX_OPEN_NEIGHBORS) continue;

    const node = builder.addNode(nextNodeId(state), cell, rollGold(rng));
    builder.connect(node, cell.parent, rollLength(rng));
    for (const neighbor of neighbors) {
      if (neighbor !== cell.parent && rng.probability(LOOP_PROBABILITY)) {
        builder.connect(node, neighbor, rollLength(rng));
      }
    }
    pushWalls(state, node, frontier);
  }
}

// =============================================================================
// PLACE TARGET PASS
// =============================================================================

/**
 * Pick the target among tiles at least half the maximum hop count away from
 * the start, in row-major order.
 */
export function placeTarget(state: DigState, start: CavernNode, nodes: readonly CavernNode[]): CavernNode {
  const { distances, maxDistance } = calculateHopDistances(start);
  const threshold = Math.ceil(maxDistance / 2);
  const candidates = nodes.filter((node) => {
    const hops = distances.get(node);
    return node !== start && hops !== undefined && hops >= threshold;
  });
  return state.rng.choice(candidates) ?? start;
}
