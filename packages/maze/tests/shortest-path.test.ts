import { describe, expect, it } from "vitest";
import {
  CavernBuilder,
  computeDistances,
  createGameCaverns,
  minPathLength,
  pathWeight,
  shortestPath,
  tryShortestPath,
} from "../src";
import type { Cavern, CavernNode } from "../src";
import { loadFixture, nodeById, thrownBy } from "./helpers";

const ids = (path: readonly CavernNode[]) => path.map((node) => node.id);

/** Bellman-Ford relaxation over every edge, as an independent oracle. */
function relaxedDistances(cavern: Cavern, source: CavernNode): Map<CavernNode, number> {
  const dist = new Map<CavernNode, number>([[source, 0]]);
  for (let round = 0; round < cavern.nodeCount; round++) {
    let changed = false;
    for (const edge of cavern.edges) {
      for (const [a, b] of [
        [edge.first, edge.second],
        [edge.second, edge.first],
      ] as const) {
        const da = dist.get(a);
        if (da === undefined) continue;
        const db = dist.get(b);
        if (db === undefined || da + edge.length < db) {
          dist.set(b, da + edge.length);
          changed = true;
        }
      }
    }
    if (!changed) break;
  }
  return dist;
}

describe("shortestPath", () => {
  const cavern = loadFixture("small.cavern");

  it("follows the lighter route", () => {
    const path = shortestPath(cavern.entrance, cavern.target);
    expect(ids(path)).toEqual([1, 2, 3, 6, 9]);
    expect(pathWeight(path)).toBe(4);
    expect(cavern.minPathLengthToTarget(cavern.entrance)).toBe(4);
  });

  it("breaks equal-length ties by edge order", () => {
    // 4 -> 1 -> 2 -> 3 -> 6 -> 9 and 4 -> 7 -> 8 -> 9 both have length 6
    const path = shortestPath(nodeById(cavern, 4), cavern.target);
    expect(ids(path)).toEqual([4, 7, 8, 9]);
    expect(pathWeight(path)).toBe(6);
  });

  it("returns a single node for a path to itself", () => {
    const node = nodeById(cavern, 8);
    expect(shortestPath(node, node)).toEqual([node]);
    expect(pathWeight(shortestPath(node, node))).toBe(0);
    expect(minPathLength(node, node)).toBe(0);
  });

  it("signals unreachable nodes distinctly", () => {
    const builder = new CavernBuilder(1, 3);
    const a = builder.addNode(10, { row: 0, column: 0 }, 0);
    const b = builder.addNode(11, { row: 0, column: 2 }, 0);
    builder.build(a, b);

    expect(thrownBy(() => shortestPath(a, b))).toMatchObject({ code: "NODE_UNREACHABLE" });
    const result = tryShortestPath(a, b);
    expect(result.isErr()).toBe(true);
    expect(result.error.code).toBe("NODE_UNREACHABLE");
  });

  it("treats nodes of another cavern as unreachable", () => {
    const other = loadFixture("small.cavern");
    expect(thrownBy(() => minPathLength(cavern.entrance, other.target))).toMatchObject({
      code: "NODE_UNREACHABLE",
    });
  });

  it("matches an independent relaxation on generated caverns", () => {
    const { find } = createGameCaverns(4242);
    const source = find.entrance;
    const oracle = relaxedDistances(find, source);
    const distances = computeDistances(source);

    expect(distances.size).toBe(find.nodeCount);
    for (const node of find.nodes) {
      expect(distances.get(node)?.distance).toBe(oracle.get(node));
      expect(pathWeight(shortestPath(source, node))).toBe(oracle.get(node));
    }
  });
});

describe("pathWeight", () => {
  const cavern = loadFixture("small.cavern");

  it("weighs empty and single-node paths as zero", () => {
    expect(pathWeight([])).toBe(0);
    expect(pathWeight([cavern.entrance])).toBe(0);
  });

  it("rejects paths with non-adjacent steps", () => {
    expect(thrownBy(() => pathWeight([nodeById(cavern, 1), nodeById(cavern, 3)]))).toMatchObject({
      code: "PATH_INVALID",
    });
  });
});
