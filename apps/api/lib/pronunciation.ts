import { z } from "zod";

export interface PronunciationSource {
  /** Resolves to the mp3 bytes of a recorded pronunciation, or `undefined` when none exists. */
  lookup(word: string, signal?: AbortSignal): Promise<Uint8Array | undefined>;
}

export type ForvoClientOptions = {
  apiKey: string;
  baseUrl: string;
  language: string;
  timeoutMs: number;
};

const forvoResponseSchema = z.object({
  items: z
    .array(
      z.object({
        pathmp3: z.string().url().optional()
      })
    )
    .default([])
});

function normalizeAudioUrl(url: string): string {
  return url.startsWith("http://") ? url.replace("http://", "https://") : url;
}

// The timer and the caller's signal stay attached until `read` has consumed the body.
async function fetchWithTimeout<T>(
  url: string,
  timeoutMs: number,
  signal: AbortSignal | undefined,
  read: (response: Response) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  const abort = () => controller.abort(signal?.reason);
  const timer = setTimeout(() => controller.abort(new Error(`Request timed out after ${timeoutMs}ms`)), timeoutMs);
  if (signal?.aborted) abort();
  signal?.addEventListener("abort", abort, { once: true });
  try {
    const response = await fetch(url, { signal: controller.signal, cache: "no-store" });
    return await read(response);
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener("abort", abort);
  }
}

export function createForvoClient(options: ForvoClientOptions): PronunciationSource {
  const standardPronunciationUrl = (word: string) =>
    `${options.baseUrl}/key/${encodeURIComponent(options.apiKey)}/format/json/action/standard-pronunciation/word/${encodeURIComponent(
      word
    )}/language/${options.language}`;

  return {
    async lookup(word, signal) {
      const payload = await fetchWithTimeout(standardPronunciationUrl(word), options.timeoutMs, signal, async (response) => {
        if (!response.ok) {
          throw new Error(`Pronunciation lookup failed with status ${response.status}`);
        }
        return forvoResponseSchema.parse(await response.json());
      });
      const audioUrl = payload.items.find((item) => item.pathmp3)?.pathmp3;
      if (!audioUrl) return undefined;

      return fetchWithTimeout(normalizeAudioUrl(audioUrl), options.timeoutMs, signal, async (audio) => {
        if (!audio.ok) {
          throw new Error(`Pronunciation download failed with status ${audio.status}`);
        }
        return new Uint8Array(await audio.arrayBuffer());
      });
    }
  };
}
