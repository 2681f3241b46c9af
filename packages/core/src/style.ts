/**
 * Centralized color handling using ansis with lazy initialization.
 *
 * ansis evaluates color support at module load time, but CLI flags like
 * --no-color are processed after imports. This module defers the color
 * decision until first use, allowing flags to take effect.
 */
import { Ansis } from "ansis";

import type { TerminalLike } from "./render/viewport";

/** 256-color codes need at least level 2; level 3 also allows truecolor */
const COLOR_ON = new Ansis(3);
const COLOR_OFF = new Ansis(0);

let colorInstance: Ansis | null = null;

/**
 * Determine if color should be used for `stream`.
 * Respects NO_COLOR, FORCE_COLOR, and TERM=dumb conventions.
 */
export function shouldUseColor(
  stream: TerminalLike = process.stderr,
  env: NodeJS.ProcessEnv = process.env
): boolean {
  if (env.NO_COLOR) {
    return false;
  }
  if (env.FORCE_COLOR) {
    return true;
  }
  if (env.TERM === "dumb") {
    return false;
  }
  return stream.isTTY ?? false;
}

/**
 * An ansis instance with color forced on or off.
 */
export function createAnsis(enabled: boolean): Ansis {
  return enabled ? COLOR_ON : COLOR_OFF;
}

/**
 * Get the shared ansis instance, initializing on first access.
 */
export function getAnsis(): Ansis {
  if (colorInstance) {
    return colorInstance;
  }
  colorInstance = createAnsis(shouldUseColor());
  return colorInstance;
}

/**
 * Reset the shared instance (useful for testing or after --no-color).
 */
export function resetColorInstance(): void {
  colorInstance = null;
}

/**
 * Paint text with a 256-color palette index.
 */
export function paint(a: Ansis, code: number, text: string): string {
  return a.fg(code)(text);
}

/** Entries in the 256-color palette */
export const PALETTE_SIZE = 256;

/**
 * Text color that stays readable on palette background `code`.
 */
export function contrastFor(code: number): "black" | "white" {
  if (code < 16) {
    return code === 0 || code === 8 ? "white" : "black";
  }
  if (code < 232) {
    // 6x6x6 cube, channel steps of 51
    const index = code - 16;
    const r = Math.floor(index / 36) * 51;
    const g = Math.floor((index % 36) / 6) * 51;
    const b = (index % 6) * 51;
    return r + g + b > 382 ? "black" : "white";
  }
  return code > 243 ? "black" : "white";
}

/** Palette cell: the code printed on its own background. */
export function swatch(a: Ansis, code: number): string {
  return a.bg(code)[contrastFor(code)](` ${String(code).padEnd(3)} .`);
}
