import type { CardKind, ContextPair, Gender } from "@shared/index";
import type { ChatMessage, TextGenerator } from "./llm";
import { detectInputKind } from "./text";

export const SENTINEL = "N/A";

const GENDERS: readonly Gender[] = ["der", "die", "das"];
const KINDS: readonly CardKind[] = ["word", "expression", "sentence"];

export type EnrichedContent = {
  kind: CardKind;
  translations: string[];
  gender?: Gender;
  plural?: string;
  context?: ContextPair;
  tip?: string;
};

export type ReplyFields = ReadonlyMap<string, string>;

const SYSTEM_PROMPT =
  "You are a German language expert helping a learner build flashcards. Answer concisely, in exactly the requested format, with no extra lines.";

export function buildEnrichmentPrompt(term: string): ChatMessage[] {
  const user = `Analyze the German input: "${term}"

1. Classify it as exactly one of: word, expression, sentence.
   A word is a single vocabulary item (a noun may carry its article), an expression is a multi-word phrase or idiom, a sentence is a complete clause.
2. Translate it to English. For a word or expression, list up to three common translations separated by commas.
3. For a noun, give its grammatical gender (der, die or das) and its plural form. Otherwise write N/A.
4. For a word or expression, write one simple German context sentence using it and its English translation. For a sentence, write N/A.
5. Optionally give a short memory aid or usage note in English, otherwise N/A.

Format as:
Type: [word|expression|sentence]
Translation: [Text]
Gender: [der|die|das|N/A]
Plural: [Text|N/A]
German Context: [Text|N/A]
English Context: [Text|N/A]
Tip: [Text|N/A]`;

  return [
    { role: "system", content: SYSTEM_PROMPT },
    { role: "user", content: user }
  ];
}

function normalizeKey(raw: string): string {
  return raw
    .replace(/[*_`#>]+/g, " ")
    .replace(/^\s*(?:[-+•]|\d+[.)])\s*/, "")
    .trim()
    .toLowerCase()
    .replace(/\s+/g, "_");
}

function normalizeValue(raw: string): string {
  return raw
    .trim()
    .replace(/^(?:\*\*|__|`)+|(?:\*\*|__|`)+$/g, "")
    .trim()
    .replace(/^["“„']+|["”“']+$/g, "")
    .replace(/;/g, ",")
    .trim();
}

export function parseReplyFields(reply: string): ReplyFields {
  const fields = new Map<string, string>();
  for (const line of reply.split(/\r?\n/)) {
    const separator = line.indexOf(":");
    if (separator < 0) continue;
    const key = normalizeKey(line.slice(0, separator));
    if (!key || fields.has(key)) continue;
    fields.set(key, normalizeValue(line.slice(separator + 1)));
  }
  return fields;
}

export function readField(fields: ReplyFields, key: string): string {
  const value = fields.get(key);
  return value ? value : SENTINEL;
}

function isSentinel(value: string): boolean {
  return value.trim().toUpperCase() === SENTINEL;
}

function optionalField(fields: ReplyFields, key: string): string | undefined {
  const value = readField(fields, key);
  return isSentinel(value) ? undefined : value;
}

function parseKind(value: string, term: string): CardKind {
  const candidate = value.toLowerCase();
  return KINDS.find((kind) => candidate === kind) ?? detectInputKind(term);
}

function parseGender(value: string | undefined): Gender | undefined {
  const candidate = value?.toLowerCase();
  return GENDERS.find((gender) => gender === candidate);
}

function splitTranslations(value: string, kind: CardKind): string[] {
  if (kind === "sentence") return [value];
  return value
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}

export function toEnrichedContent(term: string, fields: ReplyFields): EnrichedContent | null {
  const translation = readField(fields, "translation");
  if (isSentinel(translation)) return null;

  const kind = parseKind(readField(fields, "type"), term);
  const translations = splitTranslations(translation, kind);
  if (!translations.length) return null;

  const content: EnrichedContent = { kind, translations };
  if (kind === "word") {
    const gender = parseGender(optionalField(fields, "gender"));
    const plural = optionalField(fields, "plural");
    if (gender) content.gender = gender;
    if (plural) content.plural = plural;
  }
  if (kind !== "sentence") {
    const source = optionalField(fields, "german_context");
    if (source) {
      content.context = { source, target: optionalField(fields, "english_context") ?? "" };
    }
  }
  const tip = optionalField(fields, "tip");
  if (tip) content.tip = tip;
  return content;
}

/**
 * Classifies and enriches one term with a single completion request.
 * Returns `null` when the reply marks the translation as unavailable;
 * service errors propagate to the caller.
 */
export async function enrichTerm(term: string, generator: TextGenerator, signal?: AbortSignal): Promise<EnrichedContent | null> {
  const reply = await generator.complete(buildEnrichmentPrompt(term), signal);
  return toEnrichedContent(term, parseReplyFields(reply));
}
