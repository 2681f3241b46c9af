import {
  BORDER_STYLES,
  type BorderStyle,
  type ConfirmAnswer,
} from "@glyphlog/core";
import { Command, Option } from "commander";

import type { CliIo } from "../io";
import { createRenderer, fail } from "../runtime";

interface ConfirmCommandOptions {
  boxed?: boolean;
  default?: "yes" | "no";
  style: BorderStyle;
}

/** Process exit code for each answer */
export const CONFIRM_EXIT_CODES: Readonly<Record<ConfirmAnswer, number>> = {
  yes: 0,
  no: 1,
  quit: 2,
};

/** Exit code when no answer could be read */
export const CONFIRM_INPUT_ERROR = 3;

export function confirmCommand(io: CliIo): Command {
  return new Command("confirm")
    .description(
      "Ask a yes/no/quit question (exit 0 yes, 1 no, 2 quit, 3 no answer)"
    )
    .argument("<prompt>", "Question to ask")
    .option("--boxed", "Draw the question in a box")
    .addOption(
      new Option("--default <answer>", "Answer used for empty input").choices([
        "yes",
        "no",
      ])
    )
    .addOption(
      new Option("--style <style>", "Box border style")
        .choices(BORDER_STYLES)
        .default("light")
    )
    .action(
      (prompt: string, options: ConfirmCommandOptions, command: Command) => {
        const renderer = createRenderer(io, command);

        let builder = renderer
          .confirm(prompt)
          .boxed(options.boxed ?? false)
          .style(options.style);
        if (options.default) {
          builder = builder.defaultAnswer(options.default);
        }

        const answer = builder.ask(io.reader);
        if (answer.isErr()) {
          const code =
            answer.error.category === "input" ? CONFIRM_INPUT_ERROR : 1;
          fail(io, renderer, answer.error, code);
          return;
        }
        io.exitCode = CONFIRM_EXIT_CODES[answer.value];
      }
    );
}
