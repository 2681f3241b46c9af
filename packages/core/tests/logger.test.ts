import { describe, expect, test } from "vitest";

import { IoError, LayoutError } from "../src/errors";
import { Stderr } from "../src/logger";
import { LOG_LEVELS, type LogLevel } from "../src/schema/config";
import { createStreamSink } from "../src/sink";
import { createTestLogger } from "./helpers";

function shownLevels(config: Parameters<typeof createTestLogger>[0]): LogLevel[] {
  const { log, sink } = createTestLogger(config);
  const shown: LogLevel[] = [];
  for (const level of LOG_LEVELS) {
    sink.clear();
    log.log(level, "x");
    if (sink.output !== "") {
      shown.push(level);
    }
  }
  return shown;
}

describe("verbosity gate", () => {
  test("defaults show everything except opt-in levels", () => {
    expect(shownLevels({})).toEqual(["okay", "info", "note", "warn", "error"]);
  });

  test("quiet keeps only error and okay", () => {
    expect(
      shownLevels({ quiet: true, debug: true, trace: true, silly: true, dev: true })
    ).toEqual(["okay", "error"]);
  });

  test("debug, trace and silly are independent", () => {
    expect(shownLevels({ debug: true })).toEqual([
      "okay",
      "info",
      "note",
      "warn",
      "error",
      "debug",
    ]);
    expect(shownLevels({ trace: true })).toEqual([
      "okay",
      "info",
      "note",
      "warn",
      "error",
      "trace",
    ]);
    expect(shownLevels({ silly: true })).toEqual([
      "okay",
      "info",
      "note",
      "warn",
      "error",
      "magic",
      "silly",
    ]);
  });

  test("devlog needs dev", () => {
    expect(shownLevels({ dev: true })).toContain("devlog");
    expect(shownLevels({ debug: true })).not.toContain("devlog");
  });

  test("flags can change at runtime", () => {
    const { log, sink } = createTestLogger();

    log.debug("hidden");
    log.setDebug(true);
    log.debug("shown");
    log.setQuiet(true);
    log.info("muted");

    expect(sink.lines()).toEqual(["[⌬] shown"]);
    expect(log.config).toEqual({
      quiet: true,
      debug: true,
      trace: false,
      silly: false,
      dev: false,
    });
  });

  test("resolves flags from the given environment when no config is passed", () => {
    const log = new Stderr({
      env: { DEBUG_MODE: "1", QUIET_MODE: "0" },
      sink: createStreamSink({ write: () => true }),
    });

    expect(log.config.debug).toBe(true);
    expect(log.config.quiet).toBe(false);
  });
});

describe("messages", () => {
  test("formats each level with its glyph", () => {
    const { log, sink } = createTestLogger({ silly: true, debug: true, trace: true, dev: true });

    log.okay("done");
    log.info("info");
    log.note("note");
    log.warn("careful");
    log.error("bad");
    log.debug("dbg");
    log.trace("trc");
    log.magic("wow");
    log.silly("lol");
    log.devlog("dev");

    expect(sink.lines()).toEqual([
      "[✓] done",
      "[λ] info",
      "[→] note",
      "[△] careful",
      "[✕] bad",
      "[⌬] dbg",
      "[…] trc",
      "[↯] wow",
      "[φ] lol",
      "[⌬] dev",
    ]);
  });

  test("shows the label in front of the glyph", () => {
    const { log, sink } = createTestLogger({}, { label: "app" });

    log.okay("ready");
    log.clearLabel();
    log.okay("bare");
    log.setLabel("svc");
    log.warn("slow");

    expect(sink.lines()).toEqual(["[app][✓] ready", "[✓] bare", "[svc][△] slow"]);
  });

  test("indents continuation lines under the first", () => {
    const { log, sink } = createTestLogger();

    log.info("first\nsecond");

    expect(sink.lines()).toEqual(["[λ] first", "    second"]);
  });

  test("glyph overrides apply per level", () => {
    const { log, sink } = createTestLogger({}, { glyphs: { warn: "!" } });

    log.warn("configured");
    log.setGlyph("info", "i");
    log.info("runtime");

    expect(sink.lines()).toEqual(["[!] configured", "[i] runtime"]);
    expect(log.glyphFor("okay")).toBe("✓");
  });

  test("withGlyphs returns a separate logger over the same sink", () => {
    const { log, sink } = createTestLogger();

    const custom = log.withGlyphs({ okay: "+" });
    custom.okay("custom");
    log.okay("original");

    expect(sink.lines()).toEqual(["[+] custom", "[✓] original"]);
  });

  test("inspect uses describe() when the value has one", () => {
    const { log, sink } = createTestLogger();

    log.inspect("info", { describe: () => "user alice" });
    log.inspect("info", { b: 2, a: 1 });
    log.inspect("debug", { skipped: true });

    expect(sink.lines()).toEqual(["[λ] user alice", "[λ] { a: 1, b: 2 }"]);
  });

  test("a failing stream becomes an IoError", () => {
    const log = new Stderr({
      config: {},
      color: false,
      sink: createStreamSink({
        write: () => {
          throw new Error("EPIPE");
        },
      }),
    });

    const result = log.error("lost");

    const error = result._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(IoError);
    expect(error.message).toBe("Failed to write output: EPIPE");
  });
});

describe("layout output", () => {
  test("boxes in each style", () => {
    const { log, sink } = createTestLogger();

    log.boxLight("hi");
    log.boxHeavy("hi");
    log.boxDouble("hi");

    expect(sink.lines()).toEqual([
      "┌────┐",
      "│ hi │",
      "└────┘",
      "┏━━━━┓",
      "┃ hi ┃",
      "┗━━━━┛",
      "╔════╗",
      "║ hi ║",
      "╚════╝",
    ]);
  });

  test("tables pad every cell", () => {
    const { log, sink } = createTestLogger();

    log.simpleTable([
      ["name", "qty"],
      ["apple", "3"],
      ["fig"],
    ]);

    expect(sink.lines()).toEqual([
      "name   qty",
      "-----  ---",
      "apple  3  ",
      "fig       ",
    ]);
  });

  test("columns fill row by row", () => {
    const { log, sink } = createTestLogger();

    const result = log.columns(["a", "bb", "ccc", "d", "e"], 2);

    expect(result.isOk()).toBe(true);
    expect(sink.lines()).toEqual(["a    bb", "ccc  d", "e"]);
  });

  test("columns rejects a count below one", () => {
    const { log, sink } = createTestLogger();

    const result = log.columns(["a"], 0);

    expect(result._unsafeUnwrapErr()).toBeInstanceOf(LayoutError);
    expect(sink.output).toBe("");
  });

  test("flag table marks set bits", () => {
    const { log, sink } = createTestLogger();

    log.flagTable({ bitWidth: 4, labels: ["A", "B", "C", "D"], value: 0b1010 });

    expect(sink.lines()).toEqual([
      "┌────┬────┬────┬────┐",
      "│ 03 │ 02 │ 01 │ 00 │",
      "├────┼────┼────┼────┤",
      "│ ●  │ ○  │ ●  │ ○  │",
      "│ A  │ B  │ C  │ D  │",
      "└────┴────┴────┴────┘",
    ]);
  });

  test("banners, lists and help", () => {
    const { log, sink } = createTestLogger({}, { width: 20 });

    log.banner("hi", "=");
    log.list(["one", "two"]);
    log.numberedList(["first", "second"]);
    log.help("usage: x");

    expect(sink.lines()).toEqual([
      "======== hi ========",
      "• one",
      "• two",
      "1. first",
      "2. second",
      "┌──────────┐",
      "│ usage: x │",
      "└──────────┘",
    ]);
  });

  test("glyph catalogue lays out every named glyph", () => {
    const { log, sink } = createTestLogger();

    expect(log.glyphCatalogue().isOk()).toBe(true);

    const lines = sink.lines();
    expect(lines).toHaveLength(18);
    expect(lines[0]?.startsWith("❖ usage")).toBe(true);
  });

  test("quiet suppresses layout but not errors", () => {
    const { log, sink } = createTestLogger({ quiet: true });

    log.box("hidden");
    log.simpleTable([["a"]]);
    log.banner("hidden");
    log.error("still shown");

    expect(sink.lines()).toEqual(["[✕] still shown"]);
  });

  test("colorGrid lays the palette out in rows", () => {
    const { log, sink } = createTestLogger();

    expect(log.colorGrid().isOk()).toBe(true);

    const lines = sink.lines();
    expect(lines).toHaveLength(16);
    expect(lines[0]?.startsWith(" 0   . 1   . 2   .")).toBe(true);
    expect(lines[15]?.endsWith(" 254 . 255 .")).toBe(true);
    expect(lines.every((line) => line.length === 96)).toBe(true);
  });

  test("colorGrid rejects a zero column count", () => {
    const { log, sink } = createTestLogger();

    const error = log.colorGrid(0)._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(LayoutError);
    expect(error.message).toBe("Column count must be a positive integer, got 0");
    expect(sink.output).toBe("");
  });

  test("layout inside a visible frame is prefixed", () => {
    const { log, sink } = createTestLogger({ trace: true });

    log.scope("render", () => {
      log.box("x");
    });

    expect(sink.lines()).toEqual([
      "λ render: entering",
      "┆ ┌───┐",
      "┆ │ x │",
      "┆ └───┘",
      "└┄ exiting",
    ]);
  });
});
