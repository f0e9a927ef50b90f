import path from "node:path";
import type { jsPDF } from "jspdf";
import { GlyphCoverageError, UnknownFontError } from "./errors";
import { readAsset } from "./fileSystem";

type StandardFont = { kind: "standard"; name: string; family: string; style: string };
type EmbeddedFont = { kind: "embedded"; name: string; fileName: string; base64: string };
export type RegisteredFont = StandardFont | EmbeddedFont;

// The 14 base PDF fonts jsPDF renders without embedding (Symbol and ZapfDingbats left out).
const STANDARD_FONTS: ReadonlyArray<[name: string, family: string, style: string]> = [
  ["Helvetica", "helvetica", "normal"],
  ["Helvetica-Bold", "helvetica", "bold"],
  ["Helvetica-Oblique", "helvetica", "italic"],
  ["Helvetica-BoldOblique", "helvetica", "bolditalic"],
  ["Times-Roman", "times", "normal"],
  ["Times-Bold", "times", "bold"],
  ["Times-Italic", "times", "italic"],
  ["Times-BoldItalic", "times", "bolditalic"],
  ["Courier", "courier", "normal"],
  ["Courier-Bold", "courier", "bold"],
  ["Courier-Oblique", "courier", "italic"],
  ["Courier-BoldOblique", "courier", "bolditalic"],
];

// Standard fonts are written with a single-byte encoding.
const STANDARD_FONT_LIMIT = 0xff;

function keyOf(name: string): string {
  return name.trim().toLowerCase();
}

/**
 * Fonts available to the page composer, looked up by case-insensitive name.
 * Built once before a run and handed to the pipeline; composition only reads it.
 */
export class FontRegistry {
  private readonly fonts = new Map<string, RegisteredFont>();

  static withStandardFonts(): FontRegistry {
    const registry = new FontRegistry();
    for (const [name, family, style] of STANDARD_FONTS) {
      registry.fonts.set(keyOf(name), { kind: "standard", name, family, style });
    }
    return registry;
  }

  /** Registers a TrueType font file under `name`. */
  async register(name: string, ttfPath: string): Promise<RegisteredFont> {
    const bytes = await readAsset(ttfPath, "font file");
    return this.registerBytes(name, bytes, path.basename(ttfPath));
  }

  registerBytes(name: string, bytes: Uint8Array, fileName = `${name}.ttf`): RegisteredFont {
    const font: EmbeddedFont = {
      kind: "embedded",
      name,
      fileName,
      base64: Buffer.from(bytes).toString("base64"),
    };
    this.fonts.set(keyOf(name), font);
    return font;
  }

  has(name: string): boolean {
    return this.fonts.has(keyOf(name));
  }

  names(): string[] {
    return [...this.fonts.values()].map((font) => font.name);
  }

  resolve(name: string): RegisteredFont {
    const font = this.fonts.get(keyOf(name));
    if (!font) {
      throw new UnknownFontError(name, this.names());
    }
    return font;
  }

  /**
   * Throws `GlyphCoverageError` when `text` holds a character the standard
   * font `name` cannot encode. Embedded fonts are trusted to carry their glyphs.
   */
  assertCovers(name: string, text: string): void {
    const font = this.resolve(name);
    if (font.kind !== "standard") {
      return;
    }
    for (const char of text) {
      if ((char.codePointAt(0) ?? 0) > STANDARD_FONT_LIMIT) {
        throw new GlyphCoverageError(font.name, char);
      }
    }
  }

  /**
   * Makes `name` the active font of `doc`, embedding it into the document the
   * first time it is used there.
   */
  applyTo(doc: jsPDF, name: string, embedded: Set<string>): void {
    const font = this.resolve(name);
    if (font.kind === "standard") {
      doc.setFont(font.family, font.style);
      return;
    }
    if (!embedded.has(font.name)) {
      doc.addFileToVFS(font.fileName, font.base64);
      doc.addFont(font.fileName, font.name, "normal");
      embedded.add(font.name);
    }
    doc.setFont(font.name, "normal");
  }
}
