import { closeSync, openSync } from "node:fs";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { InvalidArgumentError } from "commander";
import { afterAll, beforeAll, describe, expect, test } from "vitest";

import { unescapeNewlines } from "../src/commands/box";
import { parseFlagValue, parseLabels } from "../src/commands/flags";
import { parseRows } from "../src/commands/table";
import { parsePositiveInt } from "../src/runtime";
import { createStdinReader } from "../src/utils/stdin";

describe("argument parsing", () => {
  test.each([
    ["42", 42n],
    ["0x2a", 42n],
    ["0b101010", 42n],
    ["0o52", 42n],
    ["-3", -3n],
  ])("parseFlagValue(%j)", (input, expected) => {
    expect(parseFlagValue(input)).toBe(expected);
  });

  test("parseFlagValue rejects non-integers", () => {
    expect(() => parseFlagValue("1.5")).toThrow(InvalidArgumentError);
    expect(() => parseFlagValue("")).toThrow(InvalidArgumentError);
  });

  test("parsePositiveInt", () => {
    expect(parsePositiveInt("3")).toBe(3);
    expect(() => parsePositiveInt("0")).toThrow("Expected a positive integer.");
  });

  test("parseLabels trims each label", () => {
    expect(parseLabels("a, b ,c")).toEqual(["a", "b", "c"]);
  });

  test("parseRows skips blank lines", () => {
    expect(parseRows("a|b\n\n c |d\r\n", "|")).toEqual([
      ["a", "b"],
      ["c", "d"],
    ]);
  });

  test("unescapeNewlines", () => {
    expect(unescapeNewlines("a\\nb")).toBe("a\nb");
  });
});

describe("createStdinReader", () => {
  let tempRoot: string;

  beforeAll(async () => {
    tempRoot = await mkdtemp(join(tmpdir(), "glyphlog-stdin-"));
  });

  afterAll(async () => {
    await rm(tempRoot, { recursive: true, force: true });
  });

  test("reads one line per call, then end of input", async () => {
    const path = join(tempRoot, "answers.txt");
    await writeFile(path, "y\r\nnö\nlast");
    const fd = openSync(path, "r");

    try {
      const reader = createStdinReader(fd);
      expect(reader.readLine()._unsafeUnwrap()).toBe("y");
      expect(reader.readLine()._unsafeUnwrap()).toBe("nö");
      expect(reader.readLine()._unsafeUnwrap()).toBe("last");
      expect(reader.readLine()._unsafeUnwrap()).toBeNull();
    } finally {
      closeSync(fd);
    }
  });

  test("an unreadable descriptor is an InputError", () => {
    const result = createStdinReader(999_999).readLine();

    expect(result._unsafeUnwrapErr().category).toBe("input");
  });
});
