import { createHash } from "crypto";
import type { CardKind } from "@shared/index";

const SENTENCE_ENDINGS = [".", "!", "?"];
const UNSAFE_FILENAME_CHARS = /[\/\\:*?"<>|[\]]/g;
// Leaves room for the suffix under the common 255-byte file name limit.
const MAX_STEM_BYTES = 120;
const HASH_LENGTH = 8;

export function normalizeTerm(text: string): string {
  return text.trim().replace(/\s+/g, " ");
}

export function normalizeTerms(input: string | readonly string[]): string[] {
  const lines = typeof input === "string" ? input.replace(/^\uFEFF/, "").split(/\r?\n/) : input;
  return lines.map(normalizeTerm).filter((line) => line.length > 0);
}

export function capitalizeTerm(text: string): string {
  if (!text) return "";
  return text.charAt(0).toUpperCase() + text.slice(1).toLowerCase();
}

// "Der Schreibtisch" with gender "der" becomes "Schreibtisch".
export function stripLeadingArticle(text: string, gender?: string): string {
  if (!gender) return text;
  const prefix = `${gender.toLowerCase()} `;
  if (!text.toLowerCase().startsWith(prefix)) return text;
  return capitalizeTerm(text.slice(prefix.length).trim());
}

export function detectInputKind(text: string): CardKind {
  const trimmed = text.trim();
  if (SENTENCE_ENDINGS.some((ending) => trimmed.endsWith(ending))) return "sentence";
  return trimmed.split(/\s+/).length === 1 ? "word" : "expression";
}

function truncateUtf8(text: string, maxBytes: number): string {
  let result = "";
  let size = 0;
  for (const char of text) {
    size += Buffer.byteLength(char, "utf8");
    if (size > maxBytes) break;
    result += char;
  }
  return result;
}

/**
 * Long stems are cut on a character boundary and suffixed with a hash of the
 * full stem, so distinct sentences keep distinct names.
 */
export function audioFileNameFor(text: string): string {
  let stem = text.trim().toLowerCase().replace(UNSAFE_FILENAME_CHARS, "").replace(/\s+/g, "_");
  if (Buffer.byteLength(stem, "utf8") > MAX_STEM_BYTES) {
    const digest = createHash("sha1").update(stem).digest("hex").slice(0, HASH_LENGTH);
    stem = `${truncateUtf8(stem, MAX_STEM_BYTES - HASH_LENGTH - 1)}_${digest}`;
  }
  return `${stem}_pronunciation.mp3`;
}
