import { describe, expect, it } from "vitest";
import { UnionFind } from "../src/core/algorithms/union-find";

describe("UnionFind", () => {
  it("starts with every element in its own set", () => {
    const uf = new UnionFind(5);
    expect(uf.components).toBe(5);
    for (let i = 0; i < 5; i++) {
      expect(uf.find(i)).toBe(i);
    }
  });

  it("merges sets and counts components", () => {
    const uf = new UnionFind(4);
    expect(uf.union(0, 1)).toBe(true);
    expect(uf.union(2, 3)).toBe(true);
    expect(uf.components).toBe(2);
    expect(uf.connected(0, 3)).toBe(false);

    expect(uf.union(1, 2)).toBe(true);
    expect(uf.components).toBe(1);
    expect(uf.connected(0, 3)).toBe(true);
  });

  it("reports redundant unions", () => {
    const uf = new UnionFind(3);
    uf.union(0, 1);
    expect(uf.union(1, 0)).toBe(false);
    expect(uf.components).toBe(2);
  });

  it("compresses long chains to one root", () => {
    const uf = new UnionFind(10);
    for (let i = 0; i < 9; i++) uf.union(i, i + 1);
    const root = uf.find(9);
    for (let i = 0; i < 10; i++) {
      expect(uf.find(i)).toBe(root);
    }
  });

  it("treats out-of-range elements as their own root", () => {
    const uf = new UnionFind(2);
    expect(uf.find(7)).toBe(7);
  });
});
