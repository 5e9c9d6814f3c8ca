/**
 * Cavern graph model: tiles, nodes and weighted edges.
 *
 * Nodes compare by identity. Their ids are the only handle a FIND solver
 * ever sees, so they carry no positional information.
 *
 * Nodes and tiles are handed to SCRAM solvers as they are, so they expose no
 * mutators. Gold and adjacency live in module-level tables, written only by
 * `takeGold` and `linkNodes`.
 */

export type NodeId = number;

const goldByTile = new WeakMap<Tile, number>();
const adjacency = new WeakMap<CavernNode, Map<CavernNode, Edge>>();

export interface TilePosition {
  readonly row: number;
  readonly column: number;
}

/**
 * Spatial and reward data of one open tile.
 */
export class Tile implements TilePosition {
  constructor(
    readonly row: number,
    readonly column: number,
    gold: number,
  ) {
    goldByTile.set(this, gold);
  }

  get gold(): number {
    return goldByTile.get(this) ?? 0;
  }

  /** Manhattan distance to another position, ignoring walls. */
  manhattanTo(other: TilePosition): number {
    return Math.abs(this.row - other.row) + Math.abs(this.column - other.column);
  }
}

/**
 * Undirected weighted edge between two nodes.
 */
export class Edge {
  constructor(
    readonly first: CavernNode,
    readonly second: CavernNode,
    readonly length: number,
  ) {}

  /** The endpoint opposite `node`, or undefined if `node` is not an endpoint. */
  other(node: CavernNode): CavernNode | undefined {
    if (node === this.first) return this.second;
    if (node === this.second) return this.first;
    return undefined;
  }
}

export class CavernNode {
  constructor(
    readonly id: NodeId,
    readonly tile: Tile,
  ) {
    adjacency.set(this, new Map());
  }

  private get links(): ReadonlyMap<CavernNode, Edge> {
    return adjacency.get(this) ?? new Map<CavernNode, Edge>();
  }

  /** Incident edges in the order they were linked. */
  get edges(): readonly Edge[] {
    return Array.from(this.links.values());
  }

  neighbors(): CavernNode[] {
    return Array.from(this.links.keys());
  }

  edgeTo(other: CavernNode): Edge | undefined {
    return this.links.get(other);
  }

  isAdjacentTo(other: CavernNode): boolean {
    return this.links.has(other);
  }
}

/**
 * Remove all gold from a tile.
 * @returns the amount removed (0 once taken)
 */
export function takeGold(tile: Tile): number {
  const taken = tile.gold;
  goldByTile.set(tile, 0);
  return taken;
}

/**
 * Record `edge` on both of its endpoints. Only CavernBuilder wires edges;
 * the package entry does not export this.
 */
export function linkNodes(edge: Edge): void {
  for (const node of [edge.first, edge.second]) {
    const neighbor = edge.other(node);
    const links = adjacency.get(node);
    if (neighbor === undefined || neighbor === node || links === undefined) {
      throw new Error(`Edge does not connect node ${node.id} to another node`);
    }
    links.set(neighbor, edge);
  }
}
