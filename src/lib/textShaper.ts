import bidiFactory from "bidi-js";
import { z } from "zod";
import { TextDecodingError } from "./errors";
import formsTable from "./data/arabicForms.json";

// Joining types as in Unicode ArabicShaping.txt: Dual, Right, Non-joining, join-Causing, Transparent.
type JoiningType = "D" | "R" | "U" | "C" | "T";

type Glyph = {
  char: string;
  joining: JoiningType;
  /** isolated, final, initial, medial (R letters stop after final). */
  forms?: readonly string[];
};

const codePoint = z
  .string()
  .regex(/^[0-9A-F]{4}$/)
  .transform((hex) => String.fromCodePoint(Number.parseInt(hex, 16)));

const tableSchema = z.object({
  letters: z.record(
    codePoint,
    z.object({ joining: z.enum(["D", "R", "U"]), forms: z.array(codePoint).min(1).max(4) })
  ),
  lamAlef: z.record(codePoint, z.tuple([codePoint, codePoint])),
  joinCausing: z.array(codePoint),
  transparent: z.array(z.tuple([codePoint, codePoint])),
});

const table = tableSchema.parse(formsTable);

const LAM = "\u0644";
const ARABIC_SCRIPT = /[\u0600-\u06FF\u0750-\u077F\u08A0-\u08FF\uFB50-\uFDFF\uFE70-\uFEFC]/;
const MALFORMED = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]|\uFFFD/;

const bidi = bidiFactory();

function joiningTypeOf(char: string): JoiningType {
  const letter = table.letters[char];
  if (letter) {
    return letter.joining;
  }
  if (table.joinCausing.includes(char)) {
    return "C";
  }
  if (table.transparent.some(([from, to]) => char >= from && char <= to)) {
    return "T";
  }
  return "U";
}

function joinsForward(type: JoiningType | undefined): boolean {
  return type === "D" || type === "C";
}

function joinsBackward(type: JoiningType | undefined): boolean {
  return type === "D" || type === "R" || type === "C";
}

export function containsArabicScript(text: string): boolean {
  return ARABIC_SCRIPT.test(text);
}

/** Throws `TextDecodingError` on lone surrogates or U+FFFD left by a failed decode. */
export function assertWellFormed(text: string): void {
  const match = MALFORMED.exec(text);
  if (match) {
    throw new TextDecodingError(text, match.index);
  }
}

function collapseLamAlef(chars: string[]): Glyph[] {
  const glyphs: Glyph[] = [];
  for (let i = 0; i < chars.length; i++) {
    const char = chars[i];
    if (char === LAM) {
      // marks between the lam and the alef stay, after the ligature
      let next = i + 1;
      while (next < chars.length && joiningTypeOf(chars[next]) === "T") {
        next++;
      }
      const ligature = next < chars.length ? table.lamAlef[chars[next]] : undefined;
      if (ligature) {
        glyphs.push({ char, joining: "R", forms: ligature });
        for (let mark = i + 1; mark < next; mark++) {
          glyphs.push({ char: chars[mark], joining: "T" });
        }
        i = next;
        continue;
      }
    }
    glyphs.push({ char, joining: joiningTypeOf(char), forms: table.letters[char]?.forms });
  }
  return glyphs;
}

function neighbour(glyphs: Glyph[], from: number, step: 1 | -1): Glyph | undefined {
  for (let i = from + step; i >= 0 && i < glyphs.length; i += step) {
    if (glyphs[i].joining !== "T") {
      return glyphs[i];
    }
  }
  return undefined;
}

/** Replaces Arabic-script letters with their contextual presentation forms, in logical order. */
export function reshape(text: string): string {
  const glyphs = collapseLamAlef(Array.from(text));
  return glyphs
    .map((glyph, index) => {
      const forms = glyph.forms;
      if (!forms) {
        return glyph.char;
      }
      const joinsPrevious = joinsBackward(glyph.joining) && joinsForward(neighbour(glyphs, index, -1)?.joining);
      const joinsNext = joinsForward(glyph.joining) && joinsBackward(neighbour(glyphs, index, 1)?.joining);
      const [isolated, final, initial, medial] = forms;
      if (joinsPrevious && joinsNext && medial) {
        return medial;
      }
      if (joinsPrevious && final) {
        return final;
      }
      if (joinsNext && initial) {
        return initial;
      }
      return isolated;
    })
    .join("");
}

/** Applies the Unicode bidirectional algorithm and returns the characters in visual (left-to-right) order. */
export function toVisualOrder(text: string): string {
  const levels = bidi.getEmbeddingLevels(text);
  const units = text.split("");
  bidi.getMirroredCharactersMap(text, levels.levels).forEach((mirror, index) => {
    units[index] = mirror;
  });
  for (const [start, end] of bidi.getReorderSegments(text, levels)) {
    const reversed = units.slice(start, end + 1).reverse();
    units.splice(start, reversed.length, ...reversed);
  }
  // reversal swaps the halves of surrogate pairs back into place
  for (let i = 0; i < units.length - 1; i++) {
    if (/[\uDC00-\uDFFF]/.test(units[i]) && /[\uD800-\uDBFF]/.test(units[i + 1])) {
      [units[i], units[i + 1]] = [units[i + 1], units[i]];
      i++;
    }
  }
  return units.join("");
}

/**
 * Prepares a display name for a renderer that lays glyphs out left to right
 * with no shaping or bidi support of its own. Text without Arabic-script
 * characters comes back untouched.
 */
export function shapeText(raw: string): string {
  assertWellFormed(raw);
  if (!containsArabicScript(raw)) {
    return raw;
  }
  return toVisualOrder(reshape(raw));
}
