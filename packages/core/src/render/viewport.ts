/**
 * Viewport detection for terminal-aware rendering.
 */

import type { Viewport } from "./types";

export const DEFAULT_WIDTH = 80;
const MIN_WIDTH = 20;
const MAX_WIDTH = 200;

export interface TerminalLike {
  columns?: number;
  rows?: number;
  isTTY?: boolean;
}

/**
 * Detect the viewport of a terminal stream (stderr by default).
 * Returns the default width when the stream is not a TTY.
 */
export function detectViewport(
  stream: TerminalLike = process.stderr
): Viewport {
  const columns = stream.columns;

  if (!columns || !stream.isTTY) {
    return { width: DEFAULT_WIDTH };
  }

  const width = Math.max(MIN_WIDTH, Math.min(MAX_WIDTH, columns));
  const height = stream.rows;

  return { width, ...(height && { height }) };
}

/**
 * Check if a stream is a TTY (supports colors, cursor movement, etc.)
 */
export function isTTY(stream: TerminalLike = process.stderr): boolean {
  return stream.isTTY === true;
}
