/**
 * Pure rendering utilities: text measurement, glyph sets, grid layout and
 * trace/banner lines. Nothing in this module writes output.
 *
 * @example
 * import { box, simpleTable, displayWidth } from "@glyphlog/core";
 *
 * box("hello", "heavy"); // ["┏━━━━━━━┓", "┃ hello ┃", "┗━━━━━━━┛"]
 * simpleTable([["name", "qty"], ["apple", "3"]]);
 * displayWidth("日本"); // 4
 */

// Types
export type {
  BorderStyle,
  FlagSpec,
  FlagTableOptions,
  Grid,
  TableRow,
  TableRowSource,
  Viewport,
} from "./types";

// Viewport detection
export {
  DEFAULT_WIDTH,
  detectViewport,
  isTTY,
  type TerminalLike,
} from "./viewport";

// Text utilities
export {
  displayWidth,
  maxWidth,
  padEnd,
  padStart,
  splitLines,
  stripAnsi,
  truncate,
  wrapText,
} from "./text";

// Glyphs
export {
  BORDER_STYLES,
  BORDERS,
  borderGlyphs,
  FLAG,
  SEPARATOR,
  TRACE,
  TRACE_LABEL,
  type BorderGlyphs,
} from "./glyphs";

// Grid layout
export {
  box,
  columns,
  columnWidths,
  flagTable,
  list,
  normalizeGrid,
  numberedList,
  simpleTable,
  table,
  type TableStyles,
} from "./grid";

// Trace lines and banners
export {
  CONTEXT_BANNER_MAX_WIDTH,
  renderBanner,
  renderContextBanner,
  renderTraceExit,
  renderTraceHeader,
  renderTraceLabel,
  renderTraceStep,
  traceIndent,
} from "./tree";
