import { afterEach, describe, expect, test } from "vitest";

import { Stderr } from "../src/logger";
import { createMemorySink } from "../src/sink";
import { stripAnsi } from "../src/render/text";
import {
  contrastFor,
  createAnsis,
  getAnsis,
  paint,
  resetColorInstance,
  shouldUseColor,
  swatch,
} from "../src/style";

describe("shouldUseColor", () => {
  test("NO_COLOR wins over a TTY", () => {
    expect(shouldUseColor({ isTTY: true }, { NO_COLOR: "1" })).toBe(false);
  });

  test("FORCE_COLOR enables color without a TTY", () => {
    expect(shouldUseColor({ isTTY: false }, { FORCE_COLOR: "1" })).toBe(true);
  });

  test("dumb terminals get no color", () => {
    expect(shouldUseColor({ isTTY: true }, { TERM: "dumb" })).toBe(false);
  });

  test("otherwise follows the stream", () => {
    expect(shouldUseColor({ isTTY: true }, {})).toBe(true);
    expect(shouldUseColor({}, {})).toBe(false);
  });
});

describe("paint", () => {
  afterEach(() => {
    resetColorInstance();
  });

  test("is a no-op with color off", () => {
    expect(paint(createAnsis(false), 214, "warn")).toBe("warn");
  });

  test("wraps text in a 256-color sequence with color on", () => {
    expect(paint(createAnsis(true), 214, "warn")).toBe(
      "\u001B[38;5;214mwarn\u001B[39m"
    );
  });

  test("colors logger output when forced on", () => {
    const sink = createMemorySink();
    const log = new Stderr({ config: {}, sink, color: true });

    log.error("bad");

    expect(sink.output).toBe("\u001B[38;5;1m[✕] bad\u001B[39m\n");
  });

  test("the shared instance is decided on first use until reset", () => {
    const saved = {
      NO_COLOR: process.env.NO_COLOR,
      FORCE_COLOR: process.env.FORCE_COLOR,
    };
    try {
      process.env.NO_COLOR = "1";
      resetColorInstance();
      expect(paint(getAnsis(), 1, "x")).toBe("x");

      Reflect.deleteProperty(process.env, "NO_COLOR");
      process.env.FORCE_COLOR = "1";
      expect(paint(getAnsis(), 1, "x")).toBe("x");

      resetColorInstance();
      expect(paint(getAnsis(), 1, "x")).toBe("\u001B[38;5;1mx\u001B[39m");
    } finally {
      for (const [key, value] of Object.entries(saved)) {
        if (value === undefined) {
          Reflect.deleteProperty(process.env, key);
        } else {
          process.env[key] = value;
        }
      }
    }
  });
});

describe("palette swatches", () => {
  test.each([
    [0, "white"],
    [1, "black"],
    [8, "white"],
    [16, "white"],
    [231, "black"],
    [232, "white"],
    [255, "black"],
  ])("code %i reads in %s", (code, expected) => {
    expect(contrastFor(code)).toBe(expected);
  });

  test("pads the code to a fixed cell", () => {
    expect(swatch(createAnsis(false), 7)).toBe(" 7   .");
    expect(swatch(createAnsis(false), 255)).toBe(" 255 .");
  });

  test("paints the background when color is on", () => {
    const cell = swatch(createAnsis(true), 196);

    expect(cell).toContain("48;5;196m");
    expect(stripAnsi(cell)).toBe(" 196 .");
  });
});
