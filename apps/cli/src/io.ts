import { join } from "node:path";

import {
  createStreamSink,
  type InputError,
  type InputReader,
  type Sink,
} from "@glyphlog/core";
import envPaths from "env-paths";
import type { Result } from "neverthrow";

import { createStdinReader, readAllStdin } from "./utils/stdin";

/**
 * Everything a command touches outside the renderer. Tests swap in memory
 * sinks and canned input.
 */
export interface CliIo {
  /** Where rendered output goes */
  sink: Sink;
  /** Whole standard input, for commands that read rows */
  readInput(): Result<string, InputError>;
  /** Line-by-line answers, for prompts */
  reader: InputReader;
  env: NodeJS.ProcessEnv;
  cwd: string;
  /** User config file; skipped when unset */
  userConfigPath?: string;
  /** Set by commands; the bin script hands it to the process */
  exitCode: number;
}

export const USER_CONFIG_FILENAME = "config.json";

/**
 * Default user config location, e.g. ~/.config/glyphlog/config.json.
 */
export function getUserConfigPath(): string {
  return join(envPaths("glyphlog", { suffix: "" }).config, USER_CONFIG_FILENAME);
}

export function createProcessIo(): CliIo {
  return {
    sink: createStreamSink(process.stderr),
    readInput: () => readAllStdin(),
    reader: createStdinReader(),
    env: process.env,
    cwd: process.cwd(),
    userConfigPath: getUserConfigPath(),
    exitCode: 0,
  };
}
