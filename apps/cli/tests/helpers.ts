import { tmpdir } from "node:os";

import {
  createLineReader,
  createMemorySink,
  type MemorySink,
} from "@glyphlog/core";
import { ok } from "neverthrow";

import { type CliIo, createProgram } from "../src";

export interface TestIoOptions {
  input?: string;
  answers?: string[];
  env?: NodeJS.ProcessEnv;
  userConfigPath?: string;
  cwd?: string;
}

export function createTestIo(options: TestIoOptions = {}): {
  io: CliIo;
  sink: MemorySink;
} {
  const sink = createMemorySink();
  const io: CliIo = {
    sink,
    readInput: () => ok(options.input ?? ""),
    reader: createLineReader(options.answers ?? []),
    env: options.env ?? {},
    cwd: options.cwd ?? tmpdir(),
    userConfigPath: options.userConfigPath,
    exitCode: 0,
  };
  return { io, sink };
}

/**
 * Run the program with user arguments against a test I/O context.
 */
export function runCli(args: string[], io: CliIo): void {
  const program = createProgram(io);
  program.exitOverride();
  program.parse(args, { from: "user" });
}
