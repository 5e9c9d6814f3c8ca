import { describe, expect, it } from "vitest";
import { randomSeed, SeededRandom } from "../src";

describe("SeededRandom", () => {
  it("replays the same sequence for the same seed", () => {
    const a = new SeededRandom(12345);
    const b = new SeededRandom(12345);
    for (let i = 0; i < 50; i++) {
      expect(a.nextUint32()).toBe(b.nextUint32());
    }
  });

  it("diverges for seeds that differ only above 32 bits", () => {
    const a = new SeededRandom(7);
    const b = new SeededRandom(7 + 0x100000000);
    expect(a.nextUint32()).not.toBe(b.nextUint32());
  });

  it("keeps range() within inclusive bounds", () => {
    const rng = new SeededRandom(99);
    for (let i = 0; i < 1000; i++) {
      const value = rng.range(1, 15);
      expect(value).toBeGreaterThanOrEqual(1);
      expect(value).toBeLessThanOrEqual(15);
      expect(Number.isInteger(value)).toBe(true);
    }
  });

  it("returns undefined when choosing from an empty array", () => {
    expect(new SeededRandom(1).choice([])).toBeUndefined();
  });

  it("never derives a zero seed", () => {
    const rng = new SeededRandom(1);
    for (let i = 0; i < 100; i++) {
      expect(rng.nextSeed()).not.toBe(0);
    }
    expect(randomSeed()).not.toBe(0);
  });
});
