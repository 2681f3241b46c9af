/**
 * Error taxonomy for rendering operations.
 *
 * Every failure is returned as a `Result` from the call that caused it.
 * Nothing here is thrown across the public API.
 */

export type ErrorCategory = "io" | "input" | "layout" | "handle" | "config";

export interface GlyphlogErrorOptions {
  message: string;
  cause?: unknown;
}

/** Base class for all glyphlog errors. */
export class GlyphlogError extends Error {
  readonly category: ErrorCategory;

  constructor(category: ErrorCategory, options: GlyphlogErrorOptions) {
    super(options.message, { cause: options.cause });
    this.name = "GlyphlogError";
    this.category = category;
  }
}

/** The output sink rejected a write. */
export class IoError extends GlyphlogError {
  constructor(options: GlyphlogErrorOptions) {
    super("io", options);
    this.name = "IoError";
  }
}

/** Confirmation input could not be read or never became a valid answer. */
export class InputError extends GlyphlogError {
  constructor(options: GlyphlogErrorOptions) {
    super("input", options);
    this.name = "InputError";
  }
}

/** A layout request cannot be rendered as asked. */
export class LayoutError extends GlyphlogError {
  constructor(options: GlyphlogErrorOptions) {
    super("layout", options);
    this.name = "LayoutError";
  }
}

/** A trace handle was used while not on top of the stack, or after release. */
export class HandleMisuseError extends GlyphlogError {
  readonly frame: string;

  constructor(frame: string, options: GlyphlogErrorOptions) {
    super("handle", options);
    this.name = "HandleMisuseError";
    this.frame = frame;
  }
}

/** A configuration file could not be read or failed validation. */
export class ConfigError extends GlyphlogError {
  readonly path: string;

  constructor(path: string, options: GlyphlogErrorOptions) {
    super("config", options);
    this.name = "ConfigError";
    this.path = path;
  }
}

/** Describe an unknown thrown value for an error message. */
export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
