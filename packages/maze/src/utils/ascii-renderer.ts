/**
 * ASCII Cavern Renderer
 *
 * Tiles sit on even rows and columns; the odd cells between them show
 * whether an edge joins the two neighbours.
 *
 * @example
 * ```typescript
 * const { find } = createGameCaverns(12345);
 * console.log(renderAscii(find, { position: find.entrance }));
 * ```
 */

import type { Cavern } from "../core/graph/cavern";
import type { CavernNode } from "../core/graph/model";

/**
 * ASCII character mapping for cavern features
 */
export interface AsciiCharset {
  readonly wall: string;
  readonly floor: string;
  readonly gold: string;
  readonly entrance: string;
  readonly target: string;
  readonly position: string;
  readonly horizontalEdge: string;
  readonly verticalEdge: string;
}

export const DEFAULT_CHARSET: AsciiCharset = {
  wall: "█",
  floor: "·",
  gold: "$",
  entrance: "▲",
  target: "▼",
  position: "@",
  horizontalEdge: "─",
  verticalEdge: "│",
};

/**
 * Simple ASCII charset (for terminals without unicode support)
 */
export const SIMPLE_CHARSET: AsciiCharset = {
  wall: "#",
  floor: ".",
  gold: "$",
  entrance: "<",
  target: ">",
  position: "@",
  horizontalEdge: "-",
  verticalEdge: "|",
};

export interface RenderOptions {
  readonly charset?: AsciiCharset;
  /** Node to mark with the position glyph */
  readonly position?: CavernNode;
}

function tileChar(cavern: Cavern, node: CavernNode, options: RenderOptions, charset: AsciiCharset): string {
  if (node === options.position) return charset.position;
  if (node === cavern.target) return charset.target;
  if (node === cavern.entrance) return charset.entrance;
  return node.tile.gold > 0 ? charset.gold : charset.floor;
}

/**
 * Render a cavern as (2 * rows - 1) lines of (2 * columns - 1) characters.
 */
export function renderAscii(cavern: Cavern, options: RenderOptions = {}): string {
  const charset = options.charset ?? DEFAULT_CHARSET;
  const lines: string[] = [];

  for (let row = 0; row < cavern.rows; row++) {
    let tiles = "";
    let links = "";
    for (let column = 0; column < cavern.columns; column++) {
      const node = cavern.nodeAt(row, column);
      tiles += node ? tileChar(cavern, node, options, charset) : charset.wall;

      if (column < cavern.columns - 1) {
        const right = cavern.nodeAt(row, column + 1);
        tiles += node && right && node.isAdjacentTo(right) ? charset.horizontalEdge : charset.wall;
      }

      if (row < cavern.rows - 1) {
        const below = cavern.nodeAt(row + 1, column);
        links += node && below && node.isAdjacentTo(below) ? charset.verticalEdge : charset.wall;
        if (column < cavern.columns - 1) links += charset.wall;
      }
    }
    lines.push(tiles);
    if (row < cavern.rows - 1) lines.push(links);
  }

  return lines.join("\n");
}
