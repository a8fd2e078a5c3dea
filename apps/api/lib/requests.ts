import { z } from "zod";
import { normalizeTerms } from "./text";

export const DOWNLOAD_FILE_NAME = "german-vocabulary.apkg";

// A multi-line string is accepted too, the same shape an input file has.
const generateRequestSchema = z.object({
  words: z.union([z.array(z.string()), z.string()])
});

const regenerateRequestSchema = z.object({
  word: z.string().trim().min(1),
  id: z.number().int().nonnegative()
});

export type RegenerateRequest = z.infer<typeof regenerateRequestSchema>;

/** Terms to process, or `null` when the body is malformed or holds none. */
export function parseGenerateRequest(body: unknown): string[] | null {
  const parsed = generateRequestSchema.safeParse(body);
  if (!parsed.success) return null;
  const terms = normalizeTerms(parsed.data.words);
  return terms.length ? terms : null;
}

export function parseRegenerateRequest(body: unknown): RegenerateRequest | null {
  const parsed = regenerateRequestSchema.safeParse(body);
  return parsed.success ? parsed.data : null;
}
