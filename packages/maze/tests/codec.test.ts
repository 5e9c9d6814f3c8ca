import { describe, expect, it } from "vitest";
import { cavernChecksum, createGameCaverns, loadGraph, serializeCavern, takeGold } from "../src";
import { fixtureLines, loadFixture } from "./helpers";

function withLine(lines: readonly string[], match: string, replacement: string | undefined): string[] {
  const index = lines.indexOf(match);
  if (index < 0) throw new Error(`fixture has no line '${match}'`);
  const copy = [...lines];
  if (replacement === undefined) copy.splice(index, 1);
  else copy[index] = replacement;
  return copy;
}

function loadError(lines: readonly string[]) {
  const result = loadGraph(lines);
  expect(result.isErr()).toBe(true);
  expect(result.error.code).toBe("FORMAT_INVALID");
  return result.error.message;
}

describe("loadGraph", () => {
  const lines = fixtureLines("small.cavern");

  it("loads the fixture", () => {
    const cavern = loadFixture("small.cavern");
    expect(cavern.rows).toBe(3);
    expect(cavern.columns).toBe(3);
    expect(cavern.nodeCount).toBe(8);
    expect(cavern.openTileCount).toBe(8);
    expect(cavern.edges).toHaveLength(8);
    expect(cavern.entrance.id).toBe(1);
    expect(cavern.target.id).toBe(9);
    expect(cavern.nodeAt(0, 1)?.tile.gold).toBe(5);
    expect(cavern.nodeAt(1, 1)).toBeUndefined();
  });

  it("rejects a truncated row", () => {
    expect(loadError(withLine(lines, "ROW 4:0 # 6:7", "ROW 4:0 #"))).toBe(
      "line 8: truncated row: expected 3 cells, found 2",
    );
  });

  it("rejects a row with too many cells", () => {
    expect(loadError(withLine(lines, "ROW 7:0 8:0 9:0", "ROW 7:0 8:0 9:0 #"))).toBe(
      "line 9: row has 4 cells, expected 3",
    );
  });

  it("rejects input that ends before all rows", () => {
    expect(loadError(lines.slice(0, 8))).toBe(
      "line 8: unexpected end of input, expected 3 ROW lines, found 2",
    );
  });

  it("rejects an unknown header", () => {
    expect(loadError(withLine(lines, "CAVERN 1", "MAZE 1"))).toBe("line 3: expected CAVERN, found 'MAZE'");
    expect(loadError(withLine(lines, "CAVERN 1", "CAVERN 2"))).toBe("line 3: unsupported format version '2'");
  });

  it("rejects non-numeric sizes", () => {
    expect(loadError(withLine(lines, "SIZE 3 3", "SIZE 3 x"))).toBe(
      "line 4: columns: expected an unsigned integer",
    );
  });

  it("rejects malformed cells", () => {
    expect(loadError(withLine(lines, "ROW 4:0 # 6:7", "ROW 4:0 . 6:7"))).toBe(
      "line 8: cell 1: expected '#' or '<id>:<gold>'",
    );
  });

  it("rejects duplicate node ids", () => {
    expect(loadError(withLine(lines, "ROW 4:0 # 6:7", "ROW 4:0 # 2:7"))).toBe("line 8: duplicate node id 2");
  });

  it("rejects edges into walls", () => {
    expect(loadError([...lines, "EDGE 0 1 1 1 3"])).toContain("edge end (1, 1) is not an open tile");
  });

  it("rejects edges between tiles that are not orthogonal neighbours", () => {
    expect(loadError([...lines, "EDGE 0 0 2 0 3"])).toContain("edge endpoints must be orthogonal neighbours");
  });

  it("rejects duplicate edges", () => {
    expect(loadError([...lines, "EDGE 0 1 0 0 3"])).toContain("duplicate edge");
  });

  it("rejects out-of-range edge lengths", () => {
    expect(loadError(withLine(lines, "EDGE 0 0 0 1 1", "EDGE 0 0 0 1 0"))).toBe(
      "line 10: edge length: edge length must be at least 1",
    );
    expect(loadError(withLine(lines, "EDGE 0 0 0 1 1", "EDGE 0 0 0 1 16"))).toBe(
      "line 10: edge length: edge length cannot exceed 15",
    );
  });

  it("rejects an entrance on a wall", () => {
    expect(loadError(withLine(lines, "ENTRANCE 0 0", "ENTRANCE 1 1"))).toBe(
      "line 5: entrance (1, 1) is not an open tile",
    );
  });

  it("rejects disconnected caverns", () => {
    const cut = withLine(withLine(lines, "EDGE 0 2 1 2 1", undefined), "EDGE 1 2 2 2 1", undefined);
    expect(loadError(cut)).toContain("1 open tiles are unreachable from the entrance");
  });
});

describe("serializeCavern", () => {
  it("round-trips the fixture", () => {
    const cavern = loadFixture("small.cavern");
    const reloaded = loadGraph(serializeCavern(cavern)).getOrThrow();
    expect(cavernChecksum(reloaded)).toBe(cavernChecksum(cavern));
  });

  it("round-trips generated caverns, edge order included", () => {
    const { find, scram } = createGameCaverns(777);
    for (const cavern of [find, scram]) {
      const reloaded = loadGraph(serializeCavern(cavern)).getOrThrow();
      expect(cavernChecksum(reloaded)).toBe(cavernChecksum(cavern));
      expect(reloaded.nodes.map((node) => node.neighbors().map((n) => n.id))).toEqual(
        cavern.nodes.map((node) => node.neighbors().map((n) => n.id)),
      );
    }
  });

  it("writes the current gold", () => {
    const cavern = loadFixture("small.cavern");
    const tile = cavern.nodeAt(0, 1)?.tile;
    if (tile) takeGold(tile);
    expect(serializeCavern(cavern)[4]).toBe("ROW 1:0 2:0 3:0");
  });
});
