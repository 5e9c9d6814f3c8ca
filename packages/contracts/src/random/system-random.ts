import { randomInt } from "node:crypto";

const UINT32_LIMIT = 0x1_0000_0000;

/**
 * Pick a fresh, non-zero game seed from the system CSPRNG.
 */
export function randomSeed(): number {
  return randomInt(1, UINT32_LIMIT);
}
