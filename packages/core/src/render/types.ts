/**
 * Core types for the render module.
 */

/** Viewport dimensions for terminal-aware rendering */
export interface Viewport {
  width: number;
  height?: number;
}

/** Named border glyph set */
export type BorderStyle = "light" | "heavy" | "double" | "none";

/** Rows of text cells; rows may differ in length */
export type Grid = readonly (readonly string[])[];

/** Anything that can present itself as a table row */
export interface TableRowSource {
  columns(): string[];
}

export type TableRow = readonly string[] | TableRowSource;

/** Bitmask description for a flag table */
export interface FlagSpec {
  /** Number of bits shown, most significant first */
  bitWidth: number;
  /** Labels in display order; label 0 names the highest bit */
  labels: readonly string[];
  /** Non-negative integer whose bits are shown */
  value: number | bigint;
}

export interface FlagTableOptions {
  style?: BorderStyle;
  /** Cells per table row. Default: 8 */
  cellsPerRow?: number;
}
