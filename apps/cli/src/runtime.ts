import {
  type GlyphlogConfig,
  type GlyphlogError,
  loadConfig,
  resolveVerbosity,
  Stderr,
  type VerbosityConfig,
} from "@glyphlog/core";
import { createLogger } from "@glyphlog/shared";
import { type Command, InvalidArgumentError } from "commander";

import type { CliIo } from "./io";

/** Options defined on the root program */
export interface GlobalOptions {
  quiet?: boolean;
  debug?: boolean;
  trace?: boolean;
  silly?: boolean;
  dev?: boolean;
  /** `false` when --no-color is given */
  color?: boolean;
  width?: number;
  label?: string;
}

const VERBOSITY_FLAGS = ["quiet", "debug", "trace", "silly", "dev"] as const;

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

function loadFileConfig(io: CliIo, fallback: Stderr): GlyphlogConfig {
  const loaded = loadConfig({ userConfigPath: io.userConfigPath, cwd: io.cwd });
  if (loaded.isOk()) {
    return loaded.value;
  }
  createLogger({ renderer: fallback }).warn(
    `${loaded.error.message}; using defaults`
  );
  return { verbosity: {}, glyphs: {} };
}

/**
 * Build the renderer for a command run.
 * Precedence: flags > environment > config file > defaults.
 */
export function createRenderer(io: CliIo, command: Command): Stderr {
  const flags = command.optsWithGlobals<GlobalOptions>();
  const fallback = new Stderr({
    config: {},
    sink: io.sink,
    color: flags.color === false ? false : undefined,
  });
  const file = loadFileConfig(io, fallback);

  const verbosity: VerbosityConfig = resolveVerbosity(io.env, file.verbosity);
  for (const flag of VERBOSITY_FLAGS) {
    if (flags[flag]) {
      verbosity[flag] = true;
    }
  }

  return new Stderr({
    config: verbosity,
    sink: io.sink,
    color: flags.color === false ? false : file.color,
    width: flags.width ?? file.width,
    label: flags.label ?? file.label,
    glyphs: file.glyphs,
  });
}

/**
 * Report a failed operation and mark the run as failed.
 */
export function fail(
  io: CliIo,
  renderer: Stderr,
  error: GlyphlogError,
  exitCode = 1
): void {
  io.exitCode = exitCode;
  if (error.category === "io") {
    return;
  }
  renderer.error(error.message);
}
