/**
 * Reference solver
 *
 * FIND: depth-first walk that tries the neighbour closest to the target
 * first. SCRAM: repeatedly head for the tile with the best gold per unit of
 * distance that still leaves enough steps to reach the exit, then leave.
 */

import type { FindView, ScramView, Solver } from "@cavern/game";
import {
  type CavernNode,
  computeDistances,
  type DistanceEntry,
  type NodeId,
  shortestPath,
} from "@cavern/maze";

type Distances = ReadonlyMap<CavernNode, DistanceEntry>;

function explore(view: FindView, visited: Set<NodeId>): boolean {
  if (view.distanceToTarget() === 0) return true;

  const here = view.currentLocation();
  visited.add(here);
  const options = view.neighbors().sort((a, b) => a.distanceToTarget - b.distanceToTarget);
  for (const { id } of options) {
    if (visited.has(id)) continue;
    view.moveTo(id);
    if (explore(view, visited)) return true;
    view.moveTo(here);
  }
  return false;
}

function walk(view: ScramView, to: CavernNode): void {
  for (const node of shortestPath(view.currentNode(), to).slice(1)) {
    view.moveTo(node);
  }
}

function distanceOf(distances: Distances, node: CavernNode): number {
  return distances.get(node)?.distance ?? Number.POSITIVE_INFINITY;
}

/** Most gold per step among tiles from which the exit is still affordable. */
function bestDetour(view: ScramView, toExit: Distances): CavernNode | undefined {
  const fromHere = computeDistances(view.currentNode());
  const budget = view.stepsRemaining();

  let best: CavernNode | undefined;
  let bestRatio = 0;
  for (const node of view.allNodes()) {
    const gold = node.tile.gold;
    if (gold <= 0) continue;

    const there = distanceOf(fromHere, node);
    if (there <= 0 || there + distanceOf(toExit, node) > budget) continue;

    const ratio = gold / there;
    if (ratio > bestRatio) {
      best = node;
      bestRatio = ratio;
    }
  }
  return best;
}

export const referenceSolver: Solver = {
  exploreForTarget(view) {
    explore(view, new Set());
  },

  scramToExit(view) {
    const exit = view.exitNode();
    const toExit = computeDistances(exit);

    for (let target = bestDetour(view, toExit); target; target = bestDetour(view, toExit)) {
      walk(view, target);
    }
    walk(view, exit);
  },
};

export default referenceSolver;
