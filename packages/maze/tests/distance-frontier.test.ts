import { describe, expect, it } from "vitest";
import { DistanceFrontier } from "../src/core/data-structures/distance-frontier";

function drain<T>(frontier: DistanceFrontier<T>): T[] {
  const out: T[] = [];
  for (let entry = frontier.pop(); entry; entry = frontier.pop()) {
    out.push(entry.value);
  }
  return out;
}

describe("DistanceFrontier", () => {
  it("pops by ascending distance", () => {
    const frontier = new DistanceFrontier<string>();
    frontier.push("d", 4);
    frontier.push("a", 1);
    frontier.push("c", 3);
    frontier.push("b", 2);

    expect(frontier.pop()).toEqual({ value: "a", distance: 1 });
    expect(drain(frontier)).toEqual(["b", "c", "d"]);
    expect(frontier.pop()).toBeUndefined();
  });

  it("keeps push order among equal distances", () => {
    const frontier = new DistanceFrontier<string>();
    frontier.push("late", 2);
    frontier.push("first", 1);
    frontier.push("second", 1);
    frontier.push("third", 1);
    frontier.push("early", 0);

    expect(drain(frontier)).toEqual(["early", "first", "second", "third", "late"]);
  });

  it("keeps push order across interleaved pops", () => {
    const frontier = new DistanceFrontier<number>();
    frontier.push(1, 5);
    frontier.push(2, 5);
    expect(frontier.pop()?.value).toBe(1);
    frontier.push(3, 5);
    frontier.push(4, 1);

    expect(drain(frontier)).toEqual([4, 2, 3]);
  });

  it("tracks size", () => {
    const frontier = new DistanceFrontier<number>();
    expect(frontier.isEmpty).toBe(true);
    frontier.push(10, 0);
    frontier.push(5, 0);
    expect(frontier.size).toBe(2);
    frontier.pop();
    frontier.pop();
    expect(frontier.isEmpty).toBe(true);
  });
});
