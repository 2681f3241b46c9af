import { BORDER_STYLES, type BorderStyle } from "@glyphlog/core";
import { Command, Option } from "commander";

import type { CliIo } from "../io";
import { createRenderer, fail } from "../runtime";

interface BoxCommandOptions {
  style: BorderStyle;
}

/** Turn literal `\n` sequences from the shell into line breaks. */
export function unescapeNewlines(text: string): string {
  return text.replaceAll("\\n", "\n");
}

export function boxCommand(io: CliIo): Command {
  return new Command("box")
    .description("Draw text inside a box")
    .argument("<text>", "Text to frame (\\n starts a new line)")
    .addOption(
      new Option("--style <style>", "Border style")
        .choices(BORDER_STYLES)
        .default("light")
    )
    .action((text: string, options: BoxCommandOptions, command: Command) => {
      const renderer = createRenderer(io, command);
      const result = renderer.box(unescapeNewlines(text), options.style);
      if (result.isErr()) {
        fail(io, renderer, result.error);
      }
    });
}
