import { splitLines } from "@glyphlog/core";
import { Command } from "commander";

import type { CliIo } from "../io";
import { createRenderer, fail } from "../runtime";

interface TableCommandOptions {
  sep: string;
}

/**
 * Split input into rows of trimmed cells. Blank lines are skipped.
 */
export function parseRows(input: string, separator: string): string[][] {
  return splitLines(input)
    .filter((line) => line.trim() !== "")
    .map((line) => line.split(separator).map((cell) => cell.trim()));
}

export function tableCommand(io: CliIo): Command {
  return new Command("table")
    .description("Render rows from stdin as a table (first row is the header)")
    .option("--sep <separator>", "Cell separator", "\t")
    .action((options: TableCommandOptions, command: Command) => {
      const renderer = createRenderer(io, command);
      const input = io.readInput();
      if (input.isErr()) {
        fail(io, renderer, input.error);
        return;
      }

      const result = renderer.simpleTable(parseRows(input.value, options.sep));
      if (result.isErr()) {
        fail(io, renderer, result.error);
      }
    });
}
