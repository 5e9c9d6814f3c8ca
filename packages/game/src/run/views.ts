/**
 * Phase views: the only surface a solver gets.
 *
 * FIND and SCRAM are separate capabilities. A view stops working as soon as
 * its phase ends; every call then throws `PHASE_CLOSED`.
 */

import { CavernError } from "@cavern/contracts";
import type { CavernNode, NodeId } from "@cavern/maze";

export interface NodeStatus {
  readonly id: NodeId;
  /** Manhattan distance from this node's tile to the target tile */
  readonly distanceToTarget: number;
}

export interface FindView {
  currentLocation(): NodeId;
  neighbors(): NodeStatus[];
  /** Manhattan distance to the target; zero exactly on the target. */
  distanceToTarget(): number;
  /**
   * Move to the neighbour with this id.
   * @throws CavernError `NOT_ADJACENT`
   */
  moveTo(id: NodeId): void;
}

export interface ScramView {
  currentNode(): CavernNode;
  exitNode(): CavernNode;
  allNodes(): readonly CavernNode[];
  stepsRemaining(): number;
  /**
   * Walk one edge, spending its length and picking up any gold at `node`.
   * @throws CavernError `NOT_ADJACENT`
   * @throws OutOfStepsError when the edge is longer than the budget left
   */
  moveTo(node: CavernNode): void;
}

/** Game-side operations behind a FindView. */
export interface FindHost {
  position(): CavernNode;
  target(): CavernNode;
  move(id: NodeId): void;
}

/** Game-side operations behind a ScramView. */
export interface ScramHost {
  position(): CavernNode;
  exit(): CavernNode;
  nodes(): readonly CavernNode[];
  budget(): number;
  move(node: CavernNode): void;
}

abstract class PhaseView {
  private open = true;

  revoke(): void {
    this.open = false;
  }

  protected guard(operation: string): void {
    if (!this.open) throw CavernError.phaseClosed(operation);
  }
}

export class LiveFindView extends PhaseView implements FindView {
  constructor(private readonly host: FindHost) {
    super();
  }

  currentLocation(): NodeId {
    this.guard("currentLocation");
    return this.host.position().id;
  }

  neighbors(): NodeStatus[] {
    this.guard("neighbors");
    const target = this.host.target().tile;
    return this.host
      .position()
      .neighbors()
      .map((node) => ({ id: node.id, distanceToTarget: node.tile.manhattanTo(target) }));
  }

  distanceToTarget(): number {
    this.guard("distanceToTarget");
    return this.host.position().tile.manhattanTo(this.host.target().tile);
  }

  moveTo(id: NodeId): void {
    this.guard("moveTo");
    this.host.move(id);
  }
}

export class LiveScramView extends PhaseView implements ScramView {
  constructor(private readonly host: ScramHost) {
    super();
  }

  currentNode(): CavernNode {
    this.guard("currentNode");
    return this.host.position();
  }

  exitNode(): CavernNode {
    this.guard("exitNode");
    return this.host.exit();
  }

  allNodes(): readonly CavernNode[] {
    this.guard("allNodes");
    return this.host.nodes();
  }

  stepsRemaining(): number {
    this.guard("stepsRemaining");
    return this.host.budget();
  }

  moveTo(node: CavernNode): void {
    this.guard("moveTo");
    this.host.move(node);
  }
}
