import { Command } from "commander";

import type { CliIo } from "../io";
import { createRenderer, fail, parsePositiveInt } from "../runtime";

interface ColorsCommandOptions {
  columns: number;
}

export function colorsCommand(io: CliIo): Command {
  return new Command("colors")
    .description("Show the 256-color palette with each code on its background")
    .option("--columns <count>", "Swatches per line", parsePositiveInt, 16)
    .action((options: ColorsCommandOptions, command: Command) => {
      const renderer = createRenderer(io, command);
      const result = renderer.colorGrid(options.columns);
      if (result.isErr()) {
        fail(io, renderer, result.error);
      }
    });
}
