import { SEPARATOR } from "@glyphlog/core";
import { Command } from "commander";

import type { CliIo } from "../io";
import { createRenderer, fail } from "../runtime";

interface BannerCommandOptions {
  fill: string;
}

export function bannerCommand(io: CliIo): Command {
  return new Command("banner")
    .description("Center text in a full-width rule")
    .argument("<text>", "Banner text")
    .option("--fill <char>", "Fill character", SEPARATOR.primary)
    .action((text: string, options: BannerCommandOptions, command: Command) => {
      const renderer = createRenderer(io, command);
      const result = renderer.banner(text, options.fill);
      if (result.isErr()) {
        fail(io, renderer, result.error);
      }
    });
}
