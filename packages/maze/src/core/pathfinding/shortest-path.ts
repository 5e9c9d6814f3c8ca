/**
 * Weighted Shortest Paths
 *
 * Dijkstra over cavern edges. All edge lengths are positive, so the first
 * time a node leaves the frontier its distance is final.
 *
 * Ties between equal distances are broken by the order nodes entered the
 * frontier, which follows each node's edge order. A given cavern therefore
 * always yields the same path.
 */

import { CavernError, Err, Ok, type Result } from "@cavern/contracts";
import { DistanceFrontier } from "../data-structures/distance-frontier";
import type { CavernNode } from "../graph/model";

export interface DistanceEntry {
  readonly distance: number;
  /** Predecessor on a shortest path; undefined for the source */
  readonly previous: CavernNode | undefined;
}

/**
 * Single-source distances to every node reachable from `source`.
 *
 * @param stopAt - finish early once this node's distance is settled
 */
export function computeDistances(
  source: CavernNode,
  stopAt?: CavernNode,
): Map<CavernNode, DistanceEntry> {
  const settled = new Map<CavernNode, DistanceEntry>();
  const best = new Map<CavernNode, DistanceEntry>([
    [source, { distance: 0, previous: undefined }],
  ]);
  const frontier = new DistanceFrontier<CavernNode>();
  frontier.push(source, 0);

  for (let current = frontier.pop(); current; current = frontier.pop()) {
    const node = current.value;
    if (settled.has(node)) continue;

    const entry = best.get(node);
    if (!entry || current.distance > entry.distance) continue;
    settled.set(node, entry);
    if (node === stopAt) break;

    for (const edge of node.edges) {
      const neighbor = edge.other(node);
      if (!neighbor || settled.has(neighbor)) continue;

      const distance = current.distance + edge.length;
      const known = best.get(neighbor);
      if (!known || distance < known.distance) {
        best.set(neighbor, { distance, previous: node });
        frontier.push(neighbor, distance);
      }
    }
  }

  return settled;
}

function unreachable(from: CavernNode, to: CavernNode): CavernError {
  return new CavernError(
    "NODE_UNREACHABLE",
    `No path from node ${from.id} to node ${to.id}`,
    { from: from.id, to: to.id },
  );
}

/**
 * Minimum total-length path from `from` to `to`, both ends included.
 * A node's path to itself is `[from]`.
 *
 * @throws CavernError `NODE_UNREACHABLE`
 */
export function shortestPath(from: CavernNode, to: CavernNode): CavernNode[] {
  return tryShortestPath(from, to).getOrThrow();
}

/**
 * Non-throwing variant of {@link shortestPath}.
 */
export function tryShortestPath(
  from: CavernNode,
  to: CavernNode,
): Result<CavernNode[], CavernError> {
  if (from === to) return Ok([from]);
  const distances = computeDistances(from, to);
  if (!distances.has(to)) return Err(unreachable(from, to));

  const path: CavernNode[] = [];
  let cursor: CavernNode | undefined = to;
  while (cursor) {
    path.push(cursor);
    cursor = distances.get(cursor)?.previous;
  }
  return Ok(path.reverse());
}

/**
 * Sum of edge lengths along a path. Empty and single-node paths weigh 0.
 *
 * @throws CavernError `PATH_INVALID` when two consecutive nodes are not adjacent
 */
export function pathWeight(path: readonly CavernNode[]): number {
  let total = 0;
  for (let i = 1; i < path.length; i++) {
    const prev = path[i - 1];
    const next = path[i];
    if (!prev || !next) continue;
    const edge = prev.edgeTo(next);
    if (!edge) {
      throw new CavernError(
        "PATH_INVALID",
        `Path step ${i} joins non-adjacent nodes ${prev.id} and ${next.id}`,
        { index: i },
      );
    }
    total += edge.length;
  }
  return total;
}

/**
 * Minimum total edge length between two nodes.
 *
 * @throws CavernError `NODE_UNREACHABLE`
 */
export function minPathLength(from: CavernNode, to: CavernNode): number {
  if (from === to) return 0;
  const entry = computeDistances(from, to).get(to);
  if (!entry) throw unreachable(from, to);
  return entry.distance;
}
