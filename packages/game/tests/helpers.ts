import { readFileSync } from "node:fs";
import { type Cavern, type GameCaverns, loadGraph } from "@cavern/maze";

export function loadFixture(name: string): Cavern {
  const lines = readFileSync(new URL(`./fixtures/${name}`, import.meta.url), "utf8").split("\n");
  return loadGraph(lines).getOrThrow();
}

/** Two independent copies of the 3x3 fixture; entrance (0, 0), target (2, 2). */
export function fixtureCaverns(): GameCaverns {
  return {
    seed: 1,
    rows: 3,
    columns: 3,
    find: loadFixture("small.cavern"),
    scram: loadFixture("small.cavern"),
  };
}

export function solverUrl(name: string): URL {
  return new URL(`./fixtures/solvers/${name}.ts`, import.meta.url);
}

export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("expected the call to throw");
}
