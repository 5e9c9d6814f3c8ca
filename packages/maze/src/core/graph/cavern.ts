/**
 * Cavern: the weighted graph of one game phase.
 */

import { CavernError } from "@cavern/contracts";
import { minPathLength } from "../pathfinding/shortest-path";
import { CavernNode, Edge, linkNodes, type NodeId, Tile, type TilePosition } from "./model";

export class Cavern {
  private readonly byId: ReadonlyMap<NodeId, CavernNode>;
  private readonly byPosition: ReadonlyMap<number, CavernNode>;

  /**
   * @param nodes - open tiles, row-major
   * @param edges - in creation order
   */
  constructor(
    readonly rows: number,
    readonly columns: number,
    readonly nodes: readonly CavernNode[],
    readonly edges: readonly Edge[],
    readonly entrance: CavernNode,
    readonly target: CavernNode,
  ) {
    this.byId = new Map(nodes.map((node) => [node.id, node]));
    this.byPosition = new Map(
      nodes.map((node) => [node.tile.row * columns + node.tile.column, node]),
    );
  }

  get nodeCount(): number {
    return this.nodes.length;
  }

  /** Tiles that are not walls; every open tile is a node. */
  get openTileCount(): number {
    return this.nodes.length;
  }

  node(id: NodeId): CavernNode | undefined {
    return this.byId.get(id);
  }

  nodeAt(row: number, column: number): CavernNode | undefined {
    if (row < 0 || row >= this.rows || column < 0 || column >= this.columns) {
      return undefined;
    }
    return this.byPosition.get(row * this.columns + column);
  }

  /**
   * Minimum total edge length from `from` to the target.
   * @throws CavernError `NODE_UNREACHABLE` when no path exists
   */
  minPathLengthToTarget(from: CavernNode): number {
    return minPathLength(from, this.target);
  }
}

/**
 * Mutable assembly of a Cavern, shared by the digger and the file loader.
 */
export class CavernBuilder {
  private readonly byPosition = new Map<number, CavernNode>();
  private readonly ids = new Set<NodeId>();
  private readonly edges: Edge[] = [];

  constructor(
    readonly rows: number,
    readonly columns: number,
  ) {}

  get nodeCount(): number {
    return this.byPosition.size;
  }

  hasId(id: NodeId): boolean {
    return this.ids.has(id);
  }

  isInBounds(row: number, column: number): boolean {
    return row >= 0 && row < this.rows && column >= 0 && column < this.columns;
  }

  nodeAt(row: number, column: number): CavernNode | undefined {
    if (!this.isInBounds(row, column)) return undefined;
    return this.byPosition.get(row * this.columns + column);
  }

  addNode(id: NodeId, position: TilePosition, gold: number): CavernNode {
    const { row, column } = position;
    if (!this.isInBounds(row, column)) {
      throw new CavernError("GENERATION_FAILED", `Tile (${row}, ${column}) is outside the cavern`);
    }
    if (this.ids.has(id)) {
      throw new CavernError("GENERATION_FAILED", `Duplicate node id ${id}`);
    }
    if (this.nodeAt(row, column)) {
      throw new CavernError("GENERATION_FAILED", `Tile (${row}, ${column}) is already open`);
    }

    const node = new CavernNode(id, new Tile(row, column, gold));
    this.byPosition.set(row * this.columns + column, node);
    this.ids.add(id);
    return node;
  }

  connect(a: CavernNode, b: CavernNode, length: number): Edge {
    if (a === b || a.isAdjacentTo(b)) {
      throw new CavernError("GENERATION_FAILED", `Cannot connect node ${a.id} to node ${b.id} twice`);
    }
    const edge = new Edge(a, b, length);
    linkNodes(edge);
    this.edges.push(edge);
    return edge;
  }

  /** Open nodes in row-major order. */
  orderedNodes(): CavernNode[] {
    return Array.from(this.byPosition.entries())
      .sort(([a], [b]) => a - b)
      .map(([, node]) => node);
  }

  build(entrance: CavernNode, target: CavernNode): Cavern {
    return new Cavern(this.rows, this.columns, this.orderedNodes(), [...this.edges], entrance, target);
  }
}
