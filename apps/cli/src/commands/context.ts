import { Command } from "commander";

import type { CliIo } from "../io";
import { createRenderer, fail } from "../runtime";

export function contextCommand(io: CliIo): Command {
  return new Command("context")
    .description("Announce a context with a banner")
    .argument("<name>", "Context name")
    .action((name: string, _options: unknown, command: Command) => {
      const renderer = createRenderer(io, command);
      const result = renderer.setContext(name);
      if (result.isErr()) {
        fail(io, renderer, result.error);
      }
    });
}
