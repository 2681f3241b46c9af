/**
 * Text measurement and manipulation for rendering.
 *
 * Widths are terminal cells, not string length: East Asian wide characters and
 * emoji presentation graphemes take two cells, combining marks and zero-width
 * characters take none, ANSI escape sequences take none.
 */

const ANSI_PATTERN = /\u001B(?:\[[0-?]*[ -/]*[@-~]|\][^\u0007\u001B]*(?:\u0007|\u001B\\))/g;
const EMOJI_PRESENTATION = /\p{Emoji_Presentation}/u;
const EXTENDED_PICTOGRAPHIC = /\p{Extended_Pictographic}/u;
const REGIONAL_INDICATOR = /^\p{Regional_Indicator}/u;
const ZERO_WIDTH = /^[\p{Mark}\u200B-\u200F\u2060\uFEFF]+$/u;
const VARIATION_SELECTOR_16 = "\uFE0F";

/** East Asian Wide and Fullwidth blocks, inclusive code point ranges */
const WIDE_RANGES: readonly (readonly [number, number])[] = [
  [0x1100, 0x115f],
  [0x2e80, 0x303e],
  [0x3041, 0x33ff],
  [0x3400, 0x4dbf],
  [0x4e00, 0x9fff],
  [0xa000, 0xa4cf],
  [0xa960, 0xa97f],
  [0xac00, 0xd7a3],
  [0xf900, 0xfaff],
  [0xfe10, 0xfe19],
  [0xfe30, 0xfe6f],
  [0xff00, 0xff60],
  [0xffe0, 0xffe6],
  [0x1b000, 0x1b2ff],
  [0x20000, 0x2fffd],
  [0x30000, 0x3fffd],
];

const segmenter = new Intl.Segmenter(undefined, { granularity: "grapheme" });

function isWideCodePoint(codePoint: number): boolean {
  for (const [start, end] of WIDE_RANGES) {
    if (codePoint < start) {
      return false;
    }
    if (codePoint <= end) {
      return true;
    }
  }
  return false;
}

function graphemeWidth(grapheme: string): number {
  const codePoint = grapheme.codePointAt(0) ?? 0;

  if (codePoint < 0x20 || (codePoint >= 0x7f && codePoint < 0xa0)) {
    return 0;
  }
  if (ZERO_WIDTH.test(grapheme)) {
    return 0;
  }
  if (REGIONAL_INDICATOR.test(grapheme)) {
    return 2;
  }
  if (
    EXTENDED_PICTOGRAPHIC.test(grapheme) &&
    (EMOJI_PRESENTATION.test(grapheme) ||
      grapheme.includes(VARIATION_SELECTOR_16))
  ) {
    return 2;
  }
  return isWideCodePoint(codePoint) ? 2 : 1;
}

/**
 * Remove ANSI escape sequences (SGR colors, OSC links).
 */
export function stripAnsi(str: string): string {
  return str.replace(ANSI_PATTERN, "");
}

/**
 * Display width of a string in terminal cells.
 */
export function displayWidth(str: string): number {
  const plain = stripAnsi(str);

  // Fast path: printable ASCII is one cell per character
  if (/^[\x20-\x7e]*$/.test(plain)) {
    return plain.length;
  }

  let width = 0;
  for (const { segment } of segmenter.segment(plain)) {
    width += graphemeWidth(segment);
  }
  return width;
}

/**
 * Widest display width among the given strings (0 when empty).
 */
export function maxWidth(strs: readonly string[]): number {
  let widest = 0;
  for (const str of strs) {
    widest = Math.max(widest, displayWidth(str));
  }
  return widest;
}

/**
 * Pad a string with trailing spaces to a display width.
 */
export function padEnd(str: string, width: number): string {
  const current = displayWidth(str);
  if (current >= width) {
    return str;
  }
  return str + " ".repeat(width - current);
}

/**
 * Pad a string with leading spaces to a display width.
 */
export function padStart(str: string, width: number): string {
  const current = displayWidth(str);
  if (current >= width) {
    return str;
  }
  return " ".repeat(width - current) + str;
}

/**
 * Truncate a string to a display width, ending with an ellipsis when cut.
 */
export function truncate(str: string, width: number): string {
  if (displayWidth(str) <= width) {
    return str;
  }
  if (width <= 0) {
    return "";
  }

  let out = "";
  let used = 0;
  for (const { segment } of segmenter.segment(stripAnsi(str))) {
    const cells = graphemeWidth(segment);
    if (used + cells > width - 1) {
      break;
    }
    out += segment;
    used += cells;
  }
  return `${out}…`;
}

/**
 * Wrap text to fit within a display width, preserving word boundaries.
 * Words wider than the width are kept whole on their own line.
 */
export function wrapText(text: string, width: number): string[] {
  if (displayWidth(text) <= width) {
    return [text];
  }

  const words = text.split(/\s+/).filter(Boolean);
  const lines: string[] = [];
  let currentLine = "";

  for (const word of words) {
    if (currentLine.length === 0) {
      currentLine = word;
    } else if (displayWidth(currentLine) + 1 + displayWidth(word) <= width) {
      currentLine += ` ${word}`;
    } else {
      lines.push(currentLine);
      currentLine = word;
    }
  }

  if (currentLine.length > 0) {
    lines.push(currentLine);
  }

  return lines;
}

/**
 * Split text into lines on `\n` or `\r\n`.
 */
export function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}
