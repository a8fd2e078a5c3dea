import { promises as fs } from "fs";
import path from "path";
import type { CardKind, Gender } from "@shared/index";
import type { SpeechSource } from "./llm";
import type { PronunciationSource } from "./pronunciation";
import { audioFileNameFor } from "./text";

export type AudioRequest = {
  kind: CardKind;
  /** Display form, article stripped and capitalized for words. */
  sourceText: string;
  /** The complete input line as typed. */
  originalText: string;
  gender?: Gender;
};

export type AudioSources = {
  pronunciations?: PronunciationSource;
  speech: SpeechSource;
};

export type AudioProvider = "pronunciation" | "speech";

export type AudioResult =
  | {
      succeeded: true;
      sourceTextUsed: string;
      fileName: string;
      filePath: string;
      provider: AudioProvider;
    }
  | { succeeded: false; sourceTextUsed: null };

export type AudioAttempt = {
  provider: AudioProvider;
  query: string;
};

export function planAudioAttempts(request: AudioRequest, hasPronunciationSource: boolean): AudioAttempt[] {
  if (request.kind !== "word") {
    return [{ provider: "speech", query: request.originalText.trim() }];
  }

  const attempts: AudioAttempt[] = [];
  if (hasPronunciationSource) {
    if (request.gender) {
      attempts.push({ provider: "pronunciation", query: `${request.gender} ${request.sourceText}` });
    }
    attempts.push({ provider: "pronunciation", query: request.sourceText });
  }
  attempts.push({ provider: "speech", query: request.sourceText });
  return attempts;
}

async function fetchAttempt(attempt: AudioAttempt, sources: AudioSources, signal?: AbortSignal): Promise<Uint8Array | undefined> {
  if (attempt.provider === "pronunciation") {
    return sources.pronunciations?.lookup(attempt.query, signal);
  }
  return sources.speech.synthesize(attempt.query, signal);
}

/**
 * Walks the fallback chain until one provider yields audio and stores it as
 * `<audioDir>/<audioFileNameFor(query)>`, replacing any earlier file of that name.
 */
export async function resolveAudio(
  request: AudioRequest,
  sources: AudioSources,
  audioDir: string,
  signal?: AbortSignal
): Promise<AudioResult> {
  for (const attempt of planAudioAttempts(request, Boolean(sources.pronunciations))) {
    try {
      const bytes = await fetchAttempt(attempt, sources, signal);
      if (!bytes?.length) {
        console.warn(`[audio] no ${attempt.provider} audio for "${attempt.query}"`);
        continue;
      }
      const fileName = audioFileNameFor(attempt.query);
      const filePath = path.join(audioDir, fileName);
      await fs.mkdir(audioDir, { recursive: true });
      await fs.writeFile(filePath, bytes);
      console.log(`[audio] stored ${fileName} via ${attempt.provider}`);
      return { succeeded: true, sourceTextUsed: attempt.query, fileName, filePath, provider: attempt.provider };
    } catch (error) {
      if (signal?.aborted) throw error;
      console.warn(`[audio] ${attempt.provider} failed for "${attempt.query}"`, error instanceof Error ? error.message : error);
    }
  }
  return { succeeded: false, sourceTextUsed: null };
}

export async function clearAudioDirectory(audioDir: string): Promise<number> {
  await fs.mkdir(audioDir, { recursive: true });
  const entries = await fs.readdir(audioDir, { withFileTypes: true });
  const stale = entries.filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith(".mp3"));
  await Promise.all(stale.map((entry) => fs.unlink(path.join(audioDir, entry.name))));
  if (stale.length) {
    console.log(`[audio] removed ${stale.length} audio files from the previous batch`);
  }
  return stale.length;
}
