import { describe, expect, it } from "vitest";
import {
  computeBonusFactor,
  computeScore,
  computeStepsToScram,
  formatBonus,
  MAX_BONUS,
  MIN_BONUS,
} from "../src";

describe("computeBonusFactor", () => {
  it("gives the maximum bonus for an optimal or shorter walk", () => {
    expect(computeBonusFactor(4, 4)).toBe(MAX_BONUS);
    expect(computeBonusFactor(2, 4)).toBe(MAX_BONUS);
  });

  it("gives the maximum bonus when the entrance is the target", () => {
    expect(computeBonusFactor(0, 0)).toBe(MAX_BONUS);
    expect(computeBonusFactor(7, 0)).toBe(MAX_BONUS);
  });

  it("falls linearly between the bounds", () => {
    expect(computeBonusFactor(10, 4)).toBeCloseTo(1.15, 10);
  });

  it("reaches the minimum only at four times the shortest walk", () => {
    expect(computeBonusFactor(3, 1)).toBeCloseTo(1.1, 10);
    expect(computeBonusFactor(12, 4)).toBeCloseTo(1.1, 10);
    expect(computeBonusFactor(4, 1)).toBe(MIN_BONUS);
  });

  it("bottoms out at the minimum bonus", () => {
    expect(computeBonusFactor(16, 4)).toBe(MIN_BONUS);
    expect(computeBonusFactor(100, 4)).toBe(MIN_BONUS);
  });

  it("never increases as the walk gets longer", () => {
    let previous = computeBonusFactor(1, 5);
    for (let steps = 2; steps <= 60; steps++) {
      const bonus = computeBonusFactor(steps, 5);
      expect(bonus).toBeLessThanOrEqual(previous);
      expect(bonus).toBeGreaterThanOrEqual(MIN_BONUS);
      previous = bonus;
    }
  });
});

describe("computeScore", () => {
  it("floors the scaled gold", () => {
    expect(computeScore(1.5, 7)).toBe(10);
    expect(computeScore(1.25, 8)).toBe(10);
    expect(computeScore(MIN_BONUS, 999)).toBe(999);
    expect(computeScore(MAX_BONUS, 0)).toBe(0);
  });
});

describe("computeStepsToScram", () => {
  it("adds slack proportional to the open tiles", () => {
    expect(computeStepsToScram(10, 3)).toBe(17);
    expect(computeStepsToScram(0, 7)).toBe(16);
  });
});

describe("formatBonus", () => {
  it("keeps at most two decimals", () => {
    expect(formatBonus(MAX_BONUS)).toBe("1.3");
    expect(formatBonus(MIN_BONUS)).toBe("1");
    expect(formatBonus(1.2345)).toBe("1.23");
    expect(formatBonus(1.0666666)).toBe("1.07");
  });
});
