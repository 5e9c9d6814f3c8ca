import { readFileSync } from "node:fs";
import type { Cavern, CavernNode } from "../src";
import { loadGraph } from "../src";

export function fixtureLines(name: string): string[] {
  return readFileSync(new URL(`./fixtures/${name}`, import.meta.url), "utf8").split("\n");
}

export function loadFixture(name: string): Cavern {
  return loadGraph(fixtureLines(name)).getOrThrow();
}

export function nodeById(cavern: Cavern, id: number): CavernNode {
  const node = cavern.node(id);
  if (!node) throw new Error(`fixture has no node ${id}`);
  return node;
}

export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("expected the call to throw");
}
