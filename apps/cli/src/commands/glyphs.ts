import { Command } from "commander";

import type { CliIo } from "../io";
import { createRenderer, fail, parsePositiveInt } from "../runtime";

interface GlyphsCommandOptions {
  columns: number;
}

export function glyphsCommand(io: CliIo): Command {
  return new Command("glyphs")
    .description("List the named glyph catalogue")
    .option("--columns <count>", "Number of columns", parsePositiveInt, 4)
    .action((options: GlyphsCommandOptions, command: Command) => {
      const renderer = createRenderer(io, command);
      const result = renderer.glyphCatalogue(options.columns);
      if (result.isErr()) {
        fail(io, renderer, result.error);
      }
    });
}
