import { Command } from "commander";

import type { CliIo } from "../io";
import { createRenderer, fail, parsePositiveInt } from "../runtime";

export function columnsCommand(io: CliIo): Command {
  return new Command("columns")
    .description("Lay items out in columns, row by row")
    .argument("<count>", "Number of columns", parsePositiveInt)
    .argument("<items...>", "Items to lay out")
    .action(
      (count: number, items: string[], _options: unknown, command: Command) => {
        const renderer = createRenderer(io, command);
        const result = renderer.columns(items, count);
        if (result.isErr()) {
          fail(io, renderer, result.error);
        }
      }
    );
}
