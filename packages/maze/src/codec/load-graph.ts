/**
 * Cavern File Loader
 *
 * Line-oriented format, one directive per line:
 *
 * ```text
 * CAVERN 1
 * SIZE <rows> <cols>
 * ENTRANCE <row> <col>
 * TARGET <row> <col>
 * ROW <cell> ...                      (one per row; cell is "#" or "<id>:<gold>")
 * EDGE <row> <col> <row> <col> <length>
 * ```
 *
 * Blank lines and lines starting with `//` are ignored. Directives must
 * appear in the order above; EDGE lines come last.
 */

import { CavernError, Result } from "@cavern/contracts";
import type { z } from "zod";
import { CAVERN_FORMAT_VERSION } from "../constants";
import { type Cavern, CavernBuilder } from "../core/graph/cavern";
import type { CavernNode, TilePosition } from "../core/graph/model";
import { analyzeConnectivity } from "../validation/connectivity";
import {
  CoordinateSchema,
  DimensionSchema,
  EdgeLengthSchema,
  OpenCellSchema,
  WALL_TOKEN,
} from "./schemas";

interface Directive {
  /** 1-based line number in the input */
  readonly line: number;
  readonly keyword: string;
  readonly args: readonly string[];
}

class DirectiveReader {
  private index = 0;

  constructor(private readonly lines: readonly string[]) {}

  next(): Directive | undefined {
    while (this.index < this.lines.length) {
      const raw = this.lines[this.index++] ?? "";
      const text = raw.trim();
      if (text === "" || text.startsWith("//")) continue;
      const [keyword = "", ...args] = text.split(/\s+/);
      return { line: this.index, keyword, args };
    }
    return undefined;
  }

  get endLine(): number {
    return this.lines.length;
  }
}

function fail(line: number, message: string): never {
  throw CavernError.formatInvalid(line, message);
}

function expectDirective(reader: DirectiveReader, keyword: string, arity: number): Directive {
  const directive = reader.next();
  if (!directive) {
    return fail(reader.endLine, `unexpected end of input, expected ${keyword}`);
  }
  if (directive.keyword !== keyword) {
    return fail(directive.line, `expected ${keyword}, found '${directive.keyword}'`);
  }
  if (directive.args.length !== arity) {
    return fail(
      directive.line,
      `${keyword} takes ${arity} values, found ${directive.args.length}`,
    );
  }
  return directive;
}

function parseToken<T>(
  schema: z.ZodType<T, string>,
  token: string | undefined,
  line: number,
  what: string,
): T {
  const parsed = schema.safeParse(token ?? "");
  if (!parsed.success) {
    return fail(line, `${what}: ${parsed.error.issues[0]?.message ?? "invalid value"}`);
  }
  return parsed.data;
}

function parsePosition(directive: Directive, offset: number, what: string): TilePosition {
  return {
    row: parseToken(CoordinateSchema, directive.args[offset], directive.line, `${what} row`),
    column: parseToken(CoordinateSchema, directive.args[offset + 1], directive.line, `${what} column`),
  };
}

function resolveOpen(
  builder: CavernBuilder,
  position: TilePosition,
  line: number,
  what: string,
): CavernNode {
  const node = builder.nodeAt(position.row, position.column);
  if (!node) {
    return fail(line, `${what} (${position.row}, ${position.column}) is not an open tile`);
  }
  return node;
}

function parseCavern(lines: readonly string[]): Cavern {
  const reader = new DirectiveReader(lines);

  const header = expectDirective(reader, "CAVERN", 1);
  if (header.args[0] !== String(CAVERN_FORMAT_VERSION)) {
    fail(header.line, `unsupported format version '${header.args[0] ?? ""}'`);
  }

  const size = expectDirective(reader, "SIZE", 2);
  const rows = parseToken(DimensionSchema, size.args[0], size.line, "rows");
  const columns = parseToken(DimensionSchema, size.args[1], size.line, "columns");
  const builder = new CavernBuilder(rows, columns);

  const entranceLine = expectDirective(reader, "ENTRANCE", 2);
  const entrancePosition = parsePosition(entranceLine, 0, "entrance");
  const targetLine = expectDirective(reader, "TARGET", 2);
  const targetPosition = parsePosition(targetLine, 0, "target");

  for (let row = 0; row < rows; row++) {
    const directive = reader.next();
    if (!directive) {
      return fail(reader.endLine, `unexpected end of input, expected ${rows} ROW lines, found ${row}`);
    }
    if (directive.keyword !== "ROW") {
      return fail(directive.line, `expected ROW ${row}, found '${directive.keyword}'`);
    }
    if (directive.args.length < columns) {
      return fail(directive.line, `truncated row: expected ${columns} cells, found ${directive.args.length}`);
    }
    if (directive.args.length > columns) {
      return fail(directive.line, `row has ${directive.args.length} cells, expected ${columns}`);
    }

    directive.args.forEach((token, column) => {
      if (token === WALL_TOKEN) return;
      const cell = parseToken(OpenCellSchema, token, directive.line, `cell ${column}`);
      if (builder.hasId(cell.id)) {
        fail(directive.line, `duplicate node id ${cell.id}`);
      }
      builder.addNode(cell.id, { row, column }, cell.gold);
    });
  }

  for (let directive = reader.next(); directive; directive = reader.next()) {
    if (directive.keyword !== "EDGE") {
      fail(directive.line, `expected EDGE, found '${directive.keyword}'`);
    }
    if (directive.args.length !== 5) {
      fail(directive.line, `EDGE takes 5 values, found ${directive.args.length}`);
    }
    const a = resolveOpen(builder, parsePosition(directive, 0, "edge start"), directive.line, "edge start");
    const b = resolveOpen(builder, parsePosition(directive, 2, "edge end"), directive.line, "edge end");
    const length = parseToken(EdgeLengthSchema, directive.args[4], directive.line, "edge length");

    if (a.tile.manhattanTo(b.tile) !== 1) {
      fail(directive.line, "edge endpoints must be orthogonal neighbours");
    }
    if (a.isAdjacentTo(b)) {
      fail(directive.line, "duplicate edge");
    }
    builder.connect(a, b, length);
  }

  const entrance = resolveOpen(builder, entrancePosition, entranceLine.line, "entrance");
  const target = resolveOpen(builder, targetPosition, targetLine.line, "target");
  const cavern = builder.build(entrance, target);

  const { unreachable } = analyzeConnectivity(cavern);
  if (unreachable.length > 0) {
    fail(reader.endLine, `${unreachable.length} open tiles are unreachable from the entrance`);
  }
  return cavern;
}

/**
 * Deserialize a cavern.
 *
 * @returns `Err` with code `FORMAT_INVALID` for malformed input; no cavern is
 * built in that case.
 */
export function loadGraph(lines: readonly string[]): Result<Cavern, CavernError> {
  return Result.fromThrowable(
    () => parseCavern(lines),
    (error) => {
      if (CavernError.isCavernError(error) && error.code === "FORMAT_INVALID") {
        return error;
      }
      throw error;
    },
  );
}
