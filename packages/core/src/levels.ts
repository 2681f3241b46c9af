import { type GlyphOverrides, LOG_LEVELS, type LogLevel } from "./schema/config";

export interface LevelStyle {
  glyph: string;
  /** 256-color palette index */
  color: number;
}

export type GlyphColorTable = Readonly<Record<LogLevel, Readonly<LevelStyle>>>;

export const DEFAULT_LEVEL_STYLES: GlyphColorTable = {
  okay: { glyph: "✓", color: 10 },
  info: { glyph: "λ", color: 6 },
  note: { glyph: "→", color: 6 },
  warn: { glyph: "△", color: 214 },
  error: { glyph: "✕", color: 1 },
  debug: { glyph: "⌬", color: 51 },
  trace: { glyph: "…", color: 242 },
  magic: { glyph: "↯", color: 213 },
  silly: { glyph: "φ", color: 13 },
  devlog: { glyph: "⌬", color: 197 },
};

/**
 * Apply glyph overrides on top of a table. Colors are never overridden.
 */
export function withGlyphOverrides(
  base: GlyphColorTable,
  overrides: GlyphOverrides
): GlyphColorTable {
  const table: Record<LogLevel, LevelStyle> = { ...base };
  for (const level of LOG_LEVELS) {
    const glyph = overrides[level];
    if (glyph !== undefined) {
      table[level] = { ...base[level], glyph };
    }
  }
  return table;
}
