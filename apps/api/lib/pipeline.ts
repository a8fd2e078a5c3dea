import type { Card } from "@shared/index";
import { resolveAudio, type AudioSources } from "./audio";
import { assembleCard } from "./card";
import { enrichTerm } from "./enricher";
import { BatchCancelledError, describeError } from "./errors";
import type { TextGenerator } from "./llm";
import { capitalizeTerm, stripLeadingArticle } from "./text";

export type PipelineDeps = {
  generator: TextGenerator;
  audio: AudioSources;
  audioDir: string;
};

export type BatchProgress = {
  /** Zero-based position of the term about to be processed. */
  index: number;
  total: number;
  term: string;
};

export type ProgressObserver = (progress: BatchProgress) => void;

export type GenerateOptions = {
  onProgress?: ProgressObserver;
  signal?: AbortSignal;
  delayMs?: number;
};

function pause(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new BatchCancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new BatchCancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export async function processTerm(term: string, index: number, deps: PipelineDeps, signal?: AbortSignal): Promise<Card | null> {
  const content = await enrichTerm(term, deps.generator, signal);
  if (!content) {
    console.warn(`[pipeline] no translation for "${term}", skipping`);
    return null;
  }

  const sourceText = content.kind === "word" ? stripLeadingArticle(capitalizeTerm(term), content.gender) : term;
  const audio = await resolveAudio(
    { kind: content.kind, sourceText, originalText: term, gender: content.gender },
    deps.audio,
    deps.audioDir,
    signal
  );
  if (!audio.succeeded) {
    console.warn(`[pipeline] no audio for "${term}", the card will be silent`);
  }
  return assembleCard(index, sourceText, content, audio);
}

/**
 * Processes terms one at a time in input order. Terms that fail to classify
 * are logged and dropped; cancellation stops the batch with `BatchCancelledError`.
 */
export async function generateCards(terms: readonly string[], deps: PipelineDeps, options: GenerateOptions = {}): Promise<Card[]> {
  const { onProgress, signal, delayMs = 0 } = options;
  const cards: Card[] = [];
  const total = terms.length;

  for (const [index, term] of terms.entries()) {
    if (signal?.aborted) throw new BatchCancelledError();
    onProgress?.({ index, total, term });
    console.log(`[pipeline] processing ${index + 1}/${total}: ${term}`);

    try {
      const card = await processTerm(term, index, deps, signal);
      if (card) cards.push(card);
    } catch (error) {
      if (signal?.aborted) throw new BatchCancelledError();
      console.warn(`[pipeline] failed to process "${term}": ${describeError(error)}`);
    }

    if (delayMs > 0 && index < total - 1) {
      await pause(delayMs, signal);
    }
  }

  console.log(`[pipeline] ${cards.length}/${total} terms turned into cards`);
  return cards;
}
