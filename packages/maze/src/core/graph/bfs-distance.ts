/**
 * BFS Distance Calculation
 *
 * Unweighted hop counts, used by the digger to place targets far from the
 * start. Weighted distances live in the pathfinding module.
 */

import type { CavernNode } from "./model";

/**
 * Result of BFS distance calculation.
 */
export interface BFSDistanceResult<TNode> {
  /** Hops from the source, in discovery order */
  readonly distances: Map<TNode, number>;
  readonly maxDistance: number;
}

/**
 * Calculate hop distances from a source node using BFS.
 *
 * @param getNeighbors - Neighbours of a node, in a stable order
 */
export function calculateBFSDistances<TNode>(
  source: TNode,
  getNeighbors: (node: TNode) => readonly TNode[],
): BFSDistanceResult<TNode> {
  const distances = new Map<TNode, number>([[source, 0]]);
  const queue: TNode[] = [source];
  let queueHead = 0;
  let maxDistance = 0;

  while (queueHead < queue.length) {
    const current = queue[queueHead++];
    if (current === undefined) break;
    const currentDist = distances.get(current) ?? 0;

    for (const neighbor of getNeighbors(current)) {
      if (!distances.has(neighbor)) {
        const nextDistance = currentDist + 1;
        distances.set(neighbor, nextDistance);
        if (nextDistance > maxDistance) {
          maxDistance = nextDistance;
        }
        queue.push(neighbor);
      }
    }
  }

  return { distances, maxDistance };
}

export function calculateHopDistances(source: CavernNode): BFSDistanceResult<CavernNode> {
  return calculateBFSDistances(source, (node) => node.neighbors());
}
