/**
 * Deterministic PRNG using the xoshiro128++ algorithm.
 *
 * Every random decision of cavern generation flows through one instance, so a
 * seed fully determines the dimensions, layout, weights, gold and node ids of
 * both caverns of a game.
 *
 * Reference: https://prng.di.unimi.it/xoshiro128plusplus.c
 */

/**
 * SplitMix32 for state initialization from a single seed.
 */
function splitmix32(seed: number): () => number {
  let z = seed >>> 0;
  return () => {
    z = (z + 0x9e3779b9) >>> 0;
    let t = z;
    t = Math.imul(t ^ (t >>> 16), 0x21f0aaad);
    t = Math.imul(t ^ (t >>> 15), 0x735a2d97);
    return (t ^ (t >>> 15)) >>> 0;
  };
}

function rotl(x: number, k: number): number {
  return ((x << k) | (x >>> (32 - k))) >>> 0;
}

/** xoshiro128++ state, four 32-bit words */
type RngState = [number, number, number, number];

export class SeededRandom {
  private readonly s: RngState;

  /**
   * @param seed - Any safe integer. Values wider than 32 bits are folded so
   * that seeds differing only in their high bits still diverge.
   */
  constructor(seed: number) {
    const low = seed >>> 0;
    const high = Math.floor(Math.abs(seed) / 0x100000000) >>> 0;
    const mix = splitmix32((low ^ Math.imul(high, 0x85ebca6b)) >>> 0);

    this.s = [mix(), mix(), mix(), mix()];

    // xoshiro requires at least one non-zero word
    if ((this.s[0] | this.s[1] | this.s[2] | this.s[3]) === 0) {
      this.s[0] = 1;
    }

    for (let i = 0; i < 8; i++) {
      this.nextUint32();
    }
  }

  /**
   * Next raw 32-bit value (xoshiro128++ step).
   */
  nextUint32(): number {
    const s = this.s;
    const result = (rotl((s[0] + s[3]) >>> 0, 7) + s[0]) >>> 0;

    const t = (s[1] << 9) >>> 0;

    s[2] ^= s[0];
    s[3] ^= s[1];
    s[1] ^= s[2];
    s[0] ^= s[3];

    s[2] ^= t;
    s[3] = rotl(s[3], 11);

    return result;
  }

  /**
   * Next random number in [0, 1)
   */
  next(): number {
    return this.nextUint32() / 0x100000000;
  }

  /**
   * Random integer between min and max (inclusive)
   */
  range(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  /**
   * Random element of an array, or undefined when it is empty.
   */
  choice<T>(array: readonly [T, ...T[]]): T;
  choice<T>(array: readonly T[]): T | undefined;
  choice<T>(array: readonly T[]): T | undefined {
    if (array.length === 0) return undefined;
    return array[this.range(0, array.length - 1)];
  }

  /**
   * Boolean that is true with the given probability.
   */
  probability(chance: number): boolean {
    return this.next() < chance;
  }

  /**
   * A non-zero seed for a follow-up game. Zero is reserved for "pick a
   * random seed" at the command line, so it is never returned.
   */
  nextSeed(): number {
    const seed = this.nextUint32();
    return seed === 0 ? 1 : seed;
  }
}
