import { existsSync, readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { err, ok, type Result } from "neverthrow";

import { ConfigError, describeCause } from "./errors";
import {
  DEFAULT_CONFIG,
  DEFAULT_VERBOSITY,
  type GlyphlogConfig,
  GlyphlogConfigSchema,
  type VerbosityConfig,
} from "./schema/config";

export const PROJECT_CONFIG_FILENAME = ".glyphlog.json";

// --------------------------------------------------------------------------
// Environment variable overrides
// --------------------------------------------------------------------------

/**
 * Environment variables that switch a verbosity flag on.
 *
 * Precedence (highest to lowest):
 * 1. Explicit options (CLI flags, constructor config)
 * 2. Environment variables
 * 3. Project config (.glyphlog.json)
 * 4. User config (config.json in the user config directory)
 * 5. Defaults (everything off)
 */
export const ENV_MAP: Readonly<Record<string, keyof VerbosityConfig>> = {
  QUIET_MODE: "quiet",
  DEBUG_MODE: "debug",
  TRACE_MODE: "trace",
  SILLY_MODE: "silly",
  DEV_MODE: "dev",
};

const FALSE_VALUES = new Set(["", "0", "false", "no", "off"]);

/**
 * A set variable enables its flag unless it spells an explicit "off".
 */
export function parseEnvFlag(value: string | undefined): boolean {
  if (value === undefined) {
    return false;
  }
  return !FALSE_VALUES.has(value.trim().toLowerCase());
}

/**
 * Resolve verbosity from environment variables layered over a base.
 * Variables only switch flags on; they never turn off a flag the base set.
 */
export function resolveVerbosity(
  env: NodeJS.ProcessEnv = process.env,
  base: Partial<VerbosityConfig> = {}
): VerbosityConfig {
  const resolved: VerbosityConfig = { ...DEFAULT_VERBOSITY, ...base };
  for (const [envKey, flag] of Object.entries(ENV_MAP)) {
    if (parseEnvFlag(env[envKey])) {
      resolved[flag] = true;
    }
  }
  return resolved;
}

// --------------------------------------------------------------------------
// Config files
// --------------------------------------------------------------------------

function readConfigFile(
  path: string
): Result<Record<string, unknown> | null, ConfigError> {
  if (!existsSync(path)) {
    return ok(null);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    return err(
      new ConfigError(path, {
        message: `Failed to read config file ${path}: ${describeCause(error)}`,
        cause: error,
      })
    );
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return err(
      new ConfigError(path, {
        message: `Config file ${path} must contain a JSON object`,
      })
    );
  }
  return ok({ ...parsed });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function mergeDeep(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };
  for (const [key, value] of Object.entries(source)) {
    const existing = result[key];
    result[key] =
      isRecord(existing) && isRecord(value) ? mergeDeep(existing, value) : value;
  }
  return result;
}

/**
 * Walk up from `startDir` looking for `filename`.
 */
export function findFileUp(filename: string, startDir: string): string | null {
  let dir = startDir;

  for (;;) {
    const filePath = join(dir, filename);
    if (existsSync(filePath)) {
      return filePath;
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

export interface LoadConfigOptions {
  /** User config file; skipped when unset */
  userConfigPath?: string;
  /** Directory to start the project config search from */
  cwd?: string;
}

/**
 * Load configuration from the user and project config files.
 * Project values override user values; missing files are skipped.
 */
export function loadConfig(
  options: LoadConfigOptions = {}
): Result<GlyphlogConfig, ConfigError> {
  const projectPath = findFileUp(
    PROJECT_CONFIG_FILENAME,
    options.cwd ?? process.cwd()
  );
  const paths = [options.userConfigPath, projectPath].filter(
    (path): path is string => typeof path === "string"
  );

  let merged: Record<string, unknown> = { ...DEFAULT_CONFIG };
  let lastPath = "<defaults>";
  for (const path of paths) {
    const file = readConfigFile(path);
    if (file.isErr()) {
      return err(file.error);
    }
    if (file.value) {
      merged = mergeDeep(merged, file.value);
      lastPath = path;
    }
  }

  const parsed = GlyphlogConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    return err(
      new ConfigError(lastPath, { message: `Invalid config: ${issues}` })
    );
  }
  return ok(parsed.data);
}
