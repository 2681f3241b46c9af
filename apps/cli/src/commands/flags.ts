import { BORDER_STYLES, type BorderStyle } from "@glyphlog/core";
import { Command, InvalidArgumentError, Option } from "commander";

import type { CliIo } from "../io";
import { createRenderer, fail, parsePositiveInt } from "../runtime";

interface FlagsCommandOptions {
  bits: number;
  labels?: string;
  style: BorderStyle;
  perRow: number;
}

/**
 * Parse a flag value written in decimal, hex (0x), binary (0b) or octal (0o).
 */
export function parseFlagValue(value: string): bigint {
  const trimmed = value.trim();
  if (!/^-?(?:\d+|0x[\da-f]+|0b[01]+|0o[0-7]+)$/i.test(trimmed)) {
    throw new InvalidArgumentError("Expected an integer (decimal, 0x, 0b or 0o).");
  }
  const negative = trimmed.startsWith("-");
  const magnitude = BigInt(negative ? trimmed.slice(1) : trimmed);
  return negative ? -magnitude : magnitude;
}

export function parseLabels(value: string): string[] {
  return value.split(",").map((label) => label.trim());
}

export function flagsCommand(io: CliIo): Command {
  return new Command("flags")
    .description("Show the bits of a value as a labelled table")
    .argument(
      "<value>",
      "Value to show (e.g. 42, 0x2a, 0b101010)",
      parseFlagValue
    )
    .option("--bits <count>", "Number of bits", parsePositiveInt, 8)
    .option("--labels <list>", "Comma-separated labels, highest bit first")
    .option("--per-row <count>", "Cells per row", parsePositiveInt, 8)
    .addOption(
      new Option("--style <style>", "Border style")
        .choices(BORDER_STYLES)
        .default("light")
    )
    .action(
      (value: bigint, options: FlagsCommandOptions, command: Command) => {
        const renderer = createRenderer(io, command);
        const result = renderer.flagTable(
          {
            bitWidth: options.bits,
            labels: options.labels ? parseLabels(options.labels) : [],
            value,
          },
          { style: options.style, cellsPerRow: options.perRow }
        );
        if (result.isErr()) {
          fail(io, renderer, result.error);
        }
      }
    );
}
