import { readFileSync } from "node:fs";
import { z } from "zod";

export const GlyphEntrySchema = z.object({
  name: z.string().min(1),
  glyph: z.string().min(1),
});

export type GlyphEntry = z.infer<typeof GlyphEntrySchema>;

const CATALOGUE_URL = new URL("../data/glyphs.json", import.meta.url);

let catalogue: readonly GlyphEntry[] | null = null;

/**
 * Named glyph collection, loaded once from data/glyphs.json.
 */
export function loadGlyphCatalogue(): readonly GlyphEntry[] {
  if (catalogue) {
    return catalogue;
  }
  const raw: unknown = JSON.parse(readFileSync(CATALOGUE_URL, "utf8"));
  catalogue = z.array(GlyphEntrySchema).parse(raw);
  return catalogue;
}

/** Look up a glyph by name. */
export function glyph(name: string): string | undefined {
  return loadGlyphCatalogue().find((entry) => entry.name === name)?.glyph;
}
