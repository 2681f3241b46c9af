import { LOG_LEVELS, LogLevelSchema } from "@glyphlog/core";
import { Argument, Command } from "commander";

import type { CliIo } from "../io";
import { createRenderer, fail } from "../runtime";

export function logCommand(io: CliIo): Command {
  return new Command("log")
    .description("Write one message at a level")
    .addArgument(new Argument("<level>", "Message level").choices(LOG_LEVELS))
    .argument("<text...>", "Message text")
    .action(
      (level: string, text: string[], _options: unknown, command: Command) => {
        const renderer = createRenderer(io, command);
        const parsed = LogLevelSchema.parse(level);
        const result = renderer.log(parsed, text.join(" "));
        if (result.isErr()) {
          fail(io, renderer, result.error);
        }
      }
    );
}
