import { z } from "zod";

/**
 * Semantic log levels, in display-table order.
 */
export const LOG_LEVELS = [
  "okay",
  "info",
  "note",
  "warn",
  "error",
  "debug",
  "trace",
  "magic",
  "silly",
  "devlog",
] as const;

export const LogLevelSchema = z.enum(LOG_LEVELS);

export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Verbosity flags gating output.
 */
export const VerbosityConfigSchema = z.object({
  /** Suppress everything except error and okay */
  quiet: z.boolean().default(false),
  /** Show debug messages */
  debug: z.boolean().default(false),
  /** Show trace frames and trace messages */
  trace: z.boolean().default(false),
  /** Show silly and magic messages */
  silly: z.boolean().default(false),
  /** Show devlog messages */
  dev: z.boolean().default(false),
});

export type VerbosityConfig = z.infer<typeof VerbosityConfigSchema>;

const glyph = z.string().min(1);

/**
 * Per-level glyph overrides. Unlisted levels keep their default glyph.
 */
export const GlyphOverridesSchema = z
  .object({
    okay: glyph.optional(),
    info: glyph.optional(),
    note: glyph.optional(),
    warn: glyph.optional(),
    error: glyph.optional(),
    debug: glyph.optional(),
    trace: glyph.optional(),
    magic: glyph.optional(),
    silly: glyph.optional(),
    devlog: glyph.optional(),
  })
  .strict();

export type GlyphOverrides = z.infer<typeof GlyphOverridesSchema>;

/**
 * Configuration file schema.
 * Stored as config.json in the user config directory and .glyphlog.json
 * in a project.
 */
export const GlyphlogConfigSchema = z.object({
  /** Default verbosity before environment variables and flags apply */
  verbosity: VerbosityConfigSchema.partial().default({}),
  /** Fixed output width; detected from the terminal when unset */
  width: z.number().int().positive().optional(),
  /** Label shown in front of every message glyph */
  label: z.string().min(1).optional(),
  /** Force color on or off; detected when unset */
  color: z.boolean().optional(),
  /** Glyph overrides per level */
  glyphs: GlyphOverridesSchema.default({}),
});

export type GlyphlogConfig = z.infer<typeof GlyphlogConfigSchema>;

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: GlyphlogConfig = {
  verbosity: {},
  glyphs: {},
};

export const DEFAULT_VERBOSITY: VerbosityConfig = {
  quiet: false,
  debug: false,
  trace: false,
  silly: false,
  dev: false,
};
