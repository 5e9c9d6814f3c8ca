/**
 * Connectivity Checks
 */

import { UnionFind } from "../core/algorithms/union-find";
import type { Cavern } from "../core/graph/cavern";
import type { CavernNode } from "../core/graph/model";

export interface ConnectivityReport {
  readonly components: number;
  /** Open tiles outside the entrance's component, row-major */
  readonly unreachable: readonly CavernNode[];
}

export function analyzeConnectivity(cavern: Cavern): ConnectivityReport {
  const index = new Map<CavernNode, number>();
  cavern.nodes.forEach((node, i) => index.set(node, i));

  const uf = new UnionFind(cavern.nodes.length);
  for (const edge of cavern.edges) {
    const a = index.get(edge.first);
    const b = index.get(edge.second);
    if (a !== undefined && b !== undefined) uf.union(a, b);
  }

  const entranceIndex = index.get(cavern.entrance) ?? -1;
  const unreachable = cavern.nodes.filter(
    (_, i) => !uf.connected(i, entranceIndex),
  );

  return { components: uf.components, unreachable };
}

/**
 * True when every open tile, the target included, is reachable from the entrance.
 */
export function isFullyConnected(cavern: Cavern): boolean {
  return analyzeConnectivity(cavern).unreachable.length === 0;
}
