import { describe, expect, test } from "vitest";

import {
  displayWidth,
  padStart,
  stripAnsi,
  truncate,
  wrapText,
} from "../src/render/text";

describe("displayWidth", () => {
  test.each([
    ["abc", 3],
    ["日本", 4],
    ["e\u0301", 1],
    ["\u001B[31mred\u001B[0m", 3],
    ["👍", 2],
    ["🇯🇵", 2],
    ["a\u200Bb", 2],
    ["λ", 1],
  ])("%j is %i cells", (text, width) => {
    expect(displayWidth(text)).toBe(width);
  });
});

describe("text helpers", () => {
  test("stripAnsi removes color codes", () => {
    expect(stripAnsi("\u001B[1mbold\u001B[22m")).toBe("bold");
  });

  test("truncate ends with an ellipsis", () => {
    expect(truncate("hello world", 8)).toBe("hello w…");
    expect(truncate("日本語", 5)).toBe("日本…");
    expect(truncate("short", 10)).toBe("short");
  });

  test("wrapText breaks on word boundaries", () => {
    expect(wrapText("one two three", 7)).toEqual(["one two", "three"]);
  });

  test("padStart pads by display width", () => {
    expect(padStart("日", 4)).toBe("  日");
  });
});
