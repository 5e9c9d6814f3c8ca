/**
 * Priority queue for Dijkstra: entries leave by ascending distance, and
 * entries at equal distance leave in the order they were pushed.
 */

export interface FrontierEntry<T> {
  readonly value: T;
  readonly distance: number;
}

interface Slot<T> extends FrontierEntry<T> {
  readonly sequence: number;
}

export class DistanceFrontier<T> {
  private readonly slots: Slot<T>[] = [];
  private pushed = 0;

  get size(): number {
    return this.slots.length;
  }

  get isEmpty(): boolean {
    return this.slots.length === 0;
  }

  push(value: T, distance: number): void {
    this.slots.push({ value, distance, sequence: this.pushed++ });
    this.siftUp(this.slots.length - 1);
  }

  pop(): FrontierEntry<T> | undefined {
    const head = this.slots[0];
    const last = this.slots.pop();
    if (head === undefined || last === undefined) return undefined;

    if (this.slots.length > 0) {
      this.slots[0] = last;
      this.siftDown(0);
    }
    return { value: head.value, distance: head.distance };
  }

  /** Whether the slot at `i` must leave before the slot at `j`. */
  private precedes(i: number, j: number): boolean {
    const a = this.slots[i];
    const b = this.slots[j];
    if (a === undefined || b === undefined) return false;
    return a.distance < b.distance || (a.distance === b.distance && a.sequence < b.sequence);
  }

  private swap(i: number, j: number): void {
    const a = this.slots[i];
    const b = this.slots[j];
    if (a === undefined || b === undefined) return;
    this.slots[i] = b;
    this.slots[j] = a;
  }

  private siftUp(index: number): void {
    let child = index;
    while (child > 0) {
      const parent = (child - 1) >> 1;
      if (!this.precedes(child, parent)) return;
      this.swap(child, parent);
      child = parent;
    }
  }

  private siftDown(index: number): void {
    let parent = index;
    for (;;) {
      let first = parent;
      for (const child of [parent * 2 + 1, parent * 2 + 2]) {
        if (child < this.slots.length && this.precedes(child, first)) first = child;
      }
      if (first === parent) return;
      this.swap(parent, first);
      parent = first;
    }
  }
}
