import { VERSION } from "@glyphlog/shared";
import { Command } from "commander";

import { bannerCommand } from "./commands/banner";
import { boxCommand } from "./commands/box";
import { colorsCommand } from "./commands/colors";
import { columnsCommand } from "./commands/columns";
import { confirmCommand } from "./commands/confirm";
import { contextCommand } from "./commands/context";
import { demoCommand } from "./commands/demo";
import { flagsCommand } from "./commands/flags";
import { glyphsCommand } from "./commands/glyphs";
import { logCommand } from "./commands/log";
import { tableCommand } from "./commands/table";
import { type CliIo, createProcessIo } from "./io";
import { parsePositiveInt } from "./runtime";

export type { CliIo } from "./io";

/**
 * Build the `glyphlog` program around an I/O context.
 */
export function createProgram(io: CliIo): Command {
  const program = new Command();

  program
    .name("glyphlog")
    .description(
      "Render glyph messages, boxes, tables and prompts on stderr from shell scripts"
    )
    .version(VERSION)
    .option("-q, --quiet", "Only show errors and success messages")
    .option("--debug", "Show debug messages")
    .option("--trace", "Show trace frames")
    .option("--silly", "Show silly and magic messages")
    .option("--dev", "Show devlog messages")
    .option("--no-color", "Disable color output")
    .option("--width <columns>", "Layout width", parsePositiveInt)
    .option("--label <name>", "Label shown before each message glyph");

  program.addCommand(logCommand(io));
  program.addCommand(boxCommand(io));
  program.addCommand(bannerCommand(io));
  program.addCommand(tableCommand(io));
  program.addCommand(columnsCommand(io));
  program.addCommand(flagsCommand(io));
  program.addCommand(contextCommand(io));
  program.addCommand(confirmCommand(io));
  program.addCommand(glyphsCommand(io));
  program.addCommand(colorsCommand(io));
  program.addCommand(demoCommand(io));

  return program;
}

/**
 * Parse `argv` and run the chosen command. Returns the exit code.
 */
export function run(argv: readonly string[] = process.argv): number {
  const io = createProcessIo();
  createProgram(io).parse(argv);
  return io.exitCode;
}
