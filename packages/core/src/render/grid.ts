/**
 * Grid layout shared by tables, column layouts, boxes and flag tables.
 *
 * Every function here is pure: it returns the lines to print and never
 * writes. Widths come from `displayWidth`, so wide and combining characters
 * stay aligned.
 */

import { err, ok, type Result } from "neverthrow";

import { LayoutError } from "../errors";
import { type BorderGlyphs, borderGlyphs, FLAG, SEPARATOR } from "./glyphs";
import { displayWidth, maxWidth, padEnd, splitLines } from "./text";
import type {
  BorderStyle,
  FlagSpec,
  FlagTableOptions,
  Grid,
  TableRow,
  TableRowSource,
} from "./types";

/** Spaces between table and column cells */
const COLUMN_GAP = "  ";
/** Spaces between a box edge and its content, on each side */
const BOX_PADDING = 1;
const DEFAULT_CELLS_PER_ROW = 8;

type StyleFn = (text: string) => string;

export interface TableStyles {
  header?: StyleFn;
  rule?: StyleFn;
}

const plain: StyleFn = (text) => text;

/**
 * Pad ragged rows with empty cells up to the longest row.
 */
export function normalizeGrid(rows: Grid): string[][] {
  const columnCount = rows.reduce((max, row) => Math.max(max, row.length), 0);
  return rows.map((row) => {
    const cells = [...row];
    while (cells.length < columnCount) {
      cells.push("");
    }
    return cells;
  });
}

/**
 * Per-column display widths of a normalized grid.
 */
export function columnWidths(rows: readonly (readonly string[])[]): number[] {
  const widths: number[] = [];
  for (const row of rows) {
    for (const [i, cell] of row.entries()) {
      widths[i] = Math.max(widths[i] ?? 0, displayWidth(cell));
    }
  }
  return widths;
}

/**
 * Render rows as a table. The first row is the header and is followed by a
 * rule; every cell is padded to its column width so right edges align.
 *
 * @example
 * simpleTable([["a", "bb"], ["ccc", "d"]]);
 * // ["a    bb", "---  --", "ccc  d "]
 */
export function simpleTable(rows: Grid, styles: TableStyles = {}): string[] {
  if (rows.length === 0) {
    return [];
  }

  const grid = normalizeGrid(rows);
  const widths = columnWidths(grid);
  const header = styles.header ?? plain;
  const rule = styles.rule ?? plain;

  const lines: string[] = [];
  for (const [rowIndex, row] of grid.entries()) {
    const line = row
      .map((cell, i) => padEnd(cell, widths[i] ?? 0))
      .join(COLUMN_GAP);

    if (rowIndex === 0) {
      lines.push(header(line));
      lines.push(
        rule(widths.map((w) => SEPARATOR.rule.repeat(w)).join(COLUMN_GAP))
      );
    } else {
      lines.push(line);
    }
  }
  return lines;
}

function isRowSource(row: TableRow): row is TableRowSource {
  return "columns" in row && typeof row.columns === "function";
}

function rowCells(row: TableRow): readonly string[] {
  return isRowSource(row) ? row.columns() : row;
}

/**
 * Render headers plus rows that are either cell arrays or expose `columns()`.
 */
export function table(
  headers: readonly string[],
  rows: readonly TableRow[],
  styles: TableStyles = {}
): string[] {
  return simpleTable([headers, ...rows.map(rowCells)], styles);
}

/**
 * Lay items out row-major in `count` columns. Each column is as wide as its
 * widest item; the last row may be short and is left-aligned.
 */
export function columns(
  items: readonly string[],
  count: number
): Result<string[], LayoutError> {
  if (!Number.isInteger(count) || count < 1) {
    return err(
      new LayoutError({
        message: `Column count must be a positive integer, got ${count}`,
      })
    );
  }

  const rows: string[][] = [];
  for (let i = 0; i < items.length; i += count) {
    rows.push(items.slice(i, i + count));
  }

  const widths = columnWidths(rows);
  return ok(
    rows.map((row) =>
      row
        .map((item, i) => padEnd(item, widths[i] ?? 0))
        .join(COLUMN_GAP)
        .trimEnd()
    )
  );
}

/**
 * Frame text in a box. Lines split on explicit line breaks; the interior is
 * the widest line plus one space of padding on each side.
 */
export function box(text: string, style: BorderStyle = "light"): string[] {
  const chars = borderGlyphs(style);
  const lines = splitLines(text);
  const contentWidth = maxWidth(lines);
  const pad = " ".repeat(BOX_PADDING);
  const edge = chars.horizontal.repeat(contentWidth + BOX_PADDING * 2);

  return [
    `${chars.topLeft}${edge}${chars.topRight}`,
    ...lines.map(
      (line) =>
        `${chars.vertical}${pad}${padEnd(line, contentWidth)}${pad}${chars.vertical}`
    ),
    `${chars.bottomLeft}${edge}${chars.bottomRight}`,
  ];
}

function toBigInt(value: number | bigint): bigint | null {
  if (typeof value === "bigint") {
    return value;
  }
  return Number.isSafeInteger(value) ? BigInt(value) : null;
}

function validateFlagSpec(spec: FlagSpec): Result<bigint, LayoutError> {
  if (!Number.isInteger(spec.bitWidth) || spec.bitWidth < 1) {
    return err(
      new LayoutError({
        message: `Bit width must be a positive integer, got ${spec.bitWidth}`,
      })
    );
  }
  if (spec.labels.length > spec.bitWidth) {
    return err(
      new LayoutError({
        message: `${spec.labels.length} labels exceed bit width ${spec.bitWidth}`,
      })
    );
  }

  const value = toBigInt(spec.value);
  if (value === null || value < 0n) {
    return err(
      new LayoutError({
        message: `Flag value must be a non-negative integer, got ${String(spec.value)}`,
      })
    );
  }
  if (value >> BigInt(spec.bitWidth) !== 0n) {
    return err(
      new LayoutError({
        message: `Flag value ${value} does not fit in ${spec.bitWidth} bits`,
      })
    );
  }
  return ok(value);
}

function borderRow(
  count: number,
  cellWidth: number,
  left: string,
  join: string,
  right: string,
  chars: Readonly<BorderGlyphs>
): string {
  const segment = chars.horizontal.repeat(cellWidth);
  return `${left}${Array.from({ length: count }, () => segment).join(join)}${right}`;
}

function cellRow(
  cells: readonly string[],
  cellWidth: number,
  chars: Readonly<BorderGlyphs>
): string {
  const inner = cells.map((cell) => ` ${padEnd(cell, cellWidth - 2)} `);
  return `${chars.vertical}${inner.join(chars.vertical)}${chars.vertical}`;
}

/**
 * Render the bits of a value as a table of cells.
 *
 * Bits are read most-significant first: cell `i` shows bit
 * `bitWidth - 1 - i` and is labelled with `labels[i]`. Each cell has the bit
 * index, a set/unset marker and the label. Missing labels render blank.
 */
export function flagTable(
  spec: FlagSpec,
  options: FlagTableOptions = {}
): Result<string[], LayoutError> {
  const validated = validateFlagSpec(spec);
  if (validated.isErr()) {
    return err(validated.error);
  }
  const value = validated.value;

  const cellsPerRow = options.cellsPerRow ?? DEFAULT_CELLS_PER_ROW;
  if (!Number.isInteger(cellsPerRow) || cellsPerRow < 1) {
    return err(
      new LayoutError({
        message: `Cells per row must be a positive integer, got ${cellsPerRow}`,
      })
    );
  }

  const chars = borderGlyphs(options.style ?? "light");
  const digits = Math.max(2, String(spec.bitWidth - 1).length);
  const labels = Array.from(
    { length: spec.bitWidth },
    (_, i) => spec.labels[i] ?? ""
  );
  const cellWidth = Math.max(digits, maxWidth(labels), 1) + 2;

  const cells = labels.map((label, i) => {
    const bit = spec.bitWidth - 1 - i;
    const isSet = ((value >> BigInt(bit)) & 1n) === 1n;
    return {
      index: String(bit).padStart(digits, "0"),
      marker: isSet ? FLAG.set : FLAG.unset,
      label,
    };
  });

  const lines: string[] = [];
  for (let start = 0; start < cells.length; start += cellsPerRow) {
    const chunk = cells.slice(start, start + cellsPerRow);
    const n = chunk.length;

    if (start > 0) {
      lines.push("");
    }
    lines.push(
      borderRow(n, cellWidth, chars.topLeft, chars.topT, chars.topRight, chars),
      cellRow(
        chunk.map((c) => c.index),
        cellWidth,
        chars
      ),
      borderRow(n, cellWidth, chars.leftT, chars.cross, chars.rightT, chars),
      cellRow(
        chunk.map((c) => c.marker),
        cellWidth,
        chars
      ),
      cellRow(
        chunk.map((c) => c.label),
        cellWidth,
        chars
      ),
      borderRow(
        n,
        cellWidth,
        chars.bottomLeft,
        chars.bottomT,
        chars.bottomRight,
        chars
      )
    );
  }
  return ok(lines);
}

/**
 * Bulleted list lines.
 */
export function list(items: readonly string[], bullet = "•"): string[] {
  return items.map((item) => `${bullet} ${item}`);
}

/**
 * Numbered list lines, starting at 1.
 */
export function numberedList(items: readonly string[]): string[] {
  return items.map((item, i) => `${i + 1}. ${item}`);
}
