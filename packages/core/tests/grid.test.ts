import { describe, expect, test } from "vitest";

import { LayoutError } from "../src/errors";
import {
  box,
  columns,
  flagTable,
  normalizeGrid,
  simpleTable,
  table,
} from "../src/render/grid";

describe("simpleTable", () => {
  test("returns nothing for no rows", () => {
    expect(simpleTable([])).toEqual([]);
  });

  test("aligns wide characters by display width", () => {
    expect(
      simpleTable([
        ["名前", "x"],
        ["ab", "y"],
      ])
    ).toEqual(["名前  x", "----  -", "ab    y"]);
  });

  test("pads ragged rows to the longest row", () => {
    expect(normalizeGrid([["a"], ["b", "c", "d"]])).toEqual([
      ["a", "", ""],
      ["b", "c", "d"],
    ]);
  });

  test("applies header and rule styles", () => {
    const lines = simpleTable([["h"], ["v"]], {
      header: (text) => `<${text}>`,
      rule: (text) => `(${text})`,
    });

    expect(lines).toEqual(["<h>", "(-)", "v"]);
  });
});

describe("table", () => {
  test("accepts rows that expose columns()", () => {
    const row = { columns: () => ["x", "1"] };

    expect(table(["k", "v"], [row, ["yy", "2"]])).toEqual([
      "k   v",
      "--  -",
      "x   1",
      "yy  2",
    ]);
  });
});

describe("columns", () => {
  test("uses one width per column", () => {
    expect(columns(["one", "2", "three", "4"], 2)._unsafeUnwrap()).toEqual([
      "one    2",
      "three  4",
    ]);
  });

  test("returns no lines for no items", () => {
    expect(columns([], 3)._unsafeUnwrap()).toEqual([]);
  });

  test("rejects non-integer counts", () => {
    expect(columns(["a"], 1.5)._unsafeUnwrapErr()).toBeInstanceOf(LayoutError);
  });
});

describe("box", () => {
  test("splits on both line break styles", () => {
    expect(box("a\r\nbcd")).toEqual([
      "┌─────┐",
      "│ a   │",
      "│ bcd │",
      "└─────┘",
    ]);
  });

  test("sizes the interior by display width", () => {
    expect(box("日本", "double")).toEqual(["╔══════╗", "║ 日本 ║", "╚══════╝"]);
  });

  test("frames several lines in heavy glyphs", () => {
    const lines = box("line1\nline2", "heavy");

    expect(lines).toEqual([
      "┏━━━━━━━┓",
      "┃ line1 ┃",
      "┃ line2 ┃",
      "┗━━━━━━━┛",
    ]);
    const [top = ""] = lines;
    expect(top.slice(1, -1)).toBe("━".repeat(7));
    const joined = lines.join("\n");
    for (const corner of ["┏", "┓", "┗", "┛"]) {
      expect(joined.split(corner)).toHaveLength(2);
    }
  });
});

describe("flagTable", () => {
  test("leaves missing labels blank", () => {
    expect(
      flagTable({ bitWidth: 2, labels: ["hi"], value: 1 })._unsafeUnwrap()
    ).toEqual([
      "┌────┬────┐",
      "│ 01 │ 00 │",
      "├────┼────┤",
      "│ ○  │ ●  │",
      "│ hi │    │",
      "└────┴────┘",
    ]);
  });

  test("splits wide masks into rows of cells", () => {
    const lines = flagTable(
      { bitWidth: 10, labels: [], value: 0 },
      { cellsPerRow: 8 }
    )._unsafeUnwrap();

    expect(lines).toHaveLength(13);
    expect(lines[1]).toBe(
      "│ 09 │ 08 │ 07 │ 06 │ 05 │ 04 │ 03 │ 02 │"
    );
    expect(lines[6]).toBe("");
    expect(lines[8]).toBe("│ 01 │ 00 │");
  });

  test("accepts bigint values", () => {
    const lines = flagTable({
      bitWidth: 64,
      labels: [],
      value: 1n << 63n,
    })._unsafeUnwrap();

    expect(lines[3]).toBe(
      "│ ●  │ ○  │ ○  │ ○  │ ○  │ ○  │ ○  │ ○  │"
    );
  });

  test.each([
    [{ bitWidth: 2, labels: ["a", "b", "c"], value: 0 }, "3 labels exceed bit width 2"],
    [{ bitWidth: 0, labels: [], value: 0 }, "Bit width must be a positive integer, got 0"],
    [{ bitWidth: 4, labels: [], value: -1 }, "Flag value must be a non-negative integer, got -1"],
    [{ bitWidth: 4, labels: [], value: 16 }, "Flag value 16 does not fit in 4 bits"],
  ])("rejects invalid flag layout %#", (spec, message) => {
    const error = flagTable(spec)._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(LayoutError);
    expect(error.message).toBe(message);
  });
});
