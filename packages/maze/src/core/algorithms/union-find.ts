/**
 * Union-Find (Disjoint Set Union) over element indices 0..size-1.
 *
 * Path compression plus union by rank; used to verify that every open tile
 * of a loaded cavern belongs to one component.
 *
 * @example
 * ```typescript
 * const uf = new UnionFind(4);
 * uf.union(0, 1);
 * uf.union(2, 3);
 * uf.components; // 2
 * uf.union(1, 2);
 * uf.connected(0, 3); // true
 * ```
 */
export class UnionFind {
  private readonly parent: number[];
  private readonly rank: number[];
  private count: number;

  constructor(size: number) {
    this.parent = Array.from({ length: size }, (_, i) => i);
    this.rank = new Array<number>(size).fill(0);
    this.count = size;
  }

  /** Number of disjoint sets. */
  get components(): number {
    return this.count;
  }

  /**
   * Root representative of the set containing x.
   * Out-of-range elements are their own root.
   */
  find(x: number): number {
    let root = x;
    let parent = this.parent[root];
    while (parent !== undefined && parent !== root) {
      root = parent;
      parent = this.parent[root];
    }

    let cursor = x;
    while (cursor !== root) {
      const next = this.parent[cursor];
      if (next === undefined) break;
      this.parent[cursor] = root;
      cursor = next;
    }
    return root;
  }

  /**
   * Merge the sets containing x and y.
   * @returns false if they were already in the same set
   */
  union(x: number, y: number): boolean {
    const rootX = this.find(x);
    const rootY = this.find(y);
    if (rootX === rootY) return false;

    const rankX = this.rank[rootX];
    const rankY = this.rank[rootY];
    if (rankX === undefined || rankY === undefined) return false;

    if (rankX < rankY) {
      this.parent[rootX] = rootY;
    } else if (rankX > rankY) {
      this.parent[rootY] = rootX;
    } else {
      this.parent[rootY] = rootX;
      this.rank[rootX] = rankX + 1;
    }
    this.count--;
    return true;
  }

  connected(x: number, y: number): boolean {
    return this.find(x) === this.find(y);
  }
}
