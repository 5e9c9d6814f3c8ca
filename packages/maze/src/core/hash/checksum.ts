/**
 * Cavern Checksum
 *
 * Fingerprint of a cavern's structure and current gold, used to check that a
 * seed reproduces the same cavern and that a file round-trip is lossless.
 *
 * Format: "v{version}:{hash}"
 */

import type { Cavern } from "../graph/cavern";
import { FNV64Hasher } from "./fnv64";

export const CHECKSUM_VERSION = 1;

export function cavernChecksum(cavern: Cavern): string {
  const hasher = new FNV64Hasher()
    .updateInt32(cavern.rows)
    .updateInt32(cavern.columns)
    .updateInt32(cavern.entrance.id)
    .updateInt32(cavern.target.id);

  for (const node of cavern.nodes) {
    hasher
      .updateInt32(node.id)
      .updateInt32(node.tile.row)
      .updateInt32(node.tile.column)
      .updateInt32(node.tile.gold);
  }

  for (const edge of cavern.edges) {
    hasher
      .updateInt32(edge.first.id)
      .updateInt32(edge.second.id)
      .updateInt32(edge.length);
  }

  return `v${CHECKSUM_VERSION}:${hasher.digest()}`;
}
