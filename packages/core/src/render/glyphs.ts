/**
 * Consistent glyph usage across terminal output.
 *
 * Border sets are atomic: a render picks one set and uses only its glyphs.
 */

import type { BorderStyle } from "./types";

/** Box-drawing glyphs for one border style */
export interface BorderGlyphs {
  topLeft: string;
  topRight: string;
  bottomLeft: string;
  bottomRight: string;
  horizontal: string;
  vertical: string;
  /** T-junction opening downward (┬) */
  topT: string;
  /** T-junction opening upward (┴) */
  bottomT: string;
  /** T-junction opening right (├) */
  leftT: string;
  /** T-junction opening left (┤) */
  rightT: string;
  cross: string;
}

export const BORDERS: Readonly<Record<BorderStyle, Readonly<BorderGlyphs>>> = {
  light: {
    topLeft: "┌",
    topRight: "┐",
    bottomLeft: "└",
    bottomRight: "┘",
    horizontal: "─",
    vertical: "│",
    topT: "┬",
    bottomT: "┴",
    leftT: "├",
    rightT: "┤",
    cross: "┼",
  },
  heavy: {
    topLeft: "┏",
    topRight: "┓",
    bottomLeft: "┗",
    bottomRight: "┛",
    horizontal: "━",
    vertical: "┃",
    topT: "┳",
    bottomT: "┻",
    leftT: "┣",
    rightT: "┫",
    cross: "╋",
  },
  double: {
    topLeft: "╔",
    topRight: "╗",
    bottomLeft: "╚",
    bottomRight: "╝",
    horizontal: "═",
    vertical: "║",
    topT: "╦",
    bottomT: "╩",
    leftT: "╠",
    rightT: "╣",
    cross: "╬",
  },
  none: {
    topLeft: " ",
    topRight: " ",
    bottomLeft: " ",
    bottomRight: " ",
    horizontal: " ",
    vertical: " ",
    topT: " ",
    bottomT: " ",
    leftT: " ",
    rightT: " ",
    cross: " ",
  },
};

export const BORDER_STYLES = ["light", "heavy", "double", "none"] as const;

/** Glyph set for a border style */
export function borderGlyphs(style: BorderStyle): Readonly<BorderGlyphs> {
  return BORDERS[style];
}

/** Trace tree connectors. Each occupies a fixed column width. */
export const TRACE = {
  /** Frame header (λ) */
  header: "λ ",
  /** Open ancestor frame (┆) */
  continuation: "┆ ",
  /** Step inside a frame (├┄) */
  branch: "├┄ ",
  /** Frame exit (└┄) */
  last: "└┄ ",
  /** Labelled trace lead-in (└┄┄) */
  labelled: "└┄┄",
} as const;

/** Bit markers for flag tables */
export const FLAG = {
  set: "●",
  unset: "○",
} as const;

/** Labels for the labelled trace helpers */
export const TRACE_LABEL = {
  add: "+",
  sub: "-",
  found: "✻",
  done: "✔",
  item: "⟐",
} as const;

/** Fill characters for banners */
export const SEPARATOR = {
  /** Context banners (-) */
  context: "-",
  /** Primary banner (═) */
  primary: "═",
  /** Secondary banner (━) */
  secondary: "━",
  /** Table header rule (-) */
  rule: "-",
} as const;
