import { CAVERN_FORMAT_VERSION } from "../constants";
import type { Cavern } from "../core/graph/cavern";
import { WALL_TOKEN } from "./schemas";

/**
 * Serialize a cavern, current gold included, in the format read by
 * {@link loadGraph}.
 */
export function serializeCavern(cavern: Cavern): string[] {
  const { entrance, target } = cavern;
  const lines = [
    `CAVERN ${CAVERN_FORMAT_VERSION}`,
    `SIZE ${cavern.rows} ${cavern.columns}`,
    `ENTRANCE ${entrance.tile.row} ${entrance.tile.column}`,
    `TARGET ${target.tile.row} ${target.tile.column}`,
  ];

  for (let row = 0; row < cavern.rows; row++) {
    const cells: string[] = [];
    for (let column = 0; column < cavern.columns; column++) {
      const node = cavern.nodeAt(row, column);
      cells.push(node ? `${node.id}:${node.tile.gold}` : WALL_TOKEN);
    }
    lines.push(`ROW ${cells.join(" ")}`);
  }

  for (const edge of cavern.edges) {
    const a = edge.first.tile;
    const b = edge.second.tile;
    lines.push(`EDGE ${a.row} ${a.column} ${b.row} ${b.column} ${edge.length}`);
  }

  return lines;
}
