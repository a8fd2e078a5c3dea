import type { BatchEvent } from "@shared/index";
import { describeError } from "./errors";
import type { FlashcardService } from "./service";

export const NDJSON_CONTENT_TYPE = "application/x-ndjson; charset=utf-8";

export type BatchEventSink = (event: BatchEvent) => void;

export function encodeEvent(event: BatchEvent): string {
  return `${JSON.stringify(event)}\n`;
}

/**
 * Runs one batch and reports it as events. Failures end the run with an
 * `error` event instead of a rejection.
 */
export async function runBatchEvents(
  service: FlashcardService,
  terms: readonly string[],
  emit: BatchEventSink,
  signal?: AbortSignal
): Promise<void> {
  emit({ type: "start", total: terms.length });
  try {
    const { cards } = await service.runBatch(terms, {
      signal,
      onProgress: ({ index, total, term }) => emit({ type: "progress", current: index + 1, total, word: term })
    });
    emit({ type: "complete", count: cards.length, cards });
  } catch (error) {
    console.error("[stream] batch failed", error);
    emit({ type: "error", message: describeError(error) });
  }
}

export function streamBatchEvents(service: FlashcardService, terms: readonly string[], signal?: AbortSignal): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  const abort = new AbortController();
  const onAbort = () => abort.abort();
  let open = true;

  return new ReadableStream<Uint8Array>({
    async start(controller) {
      if (signal?.aborted) abort.abort();
      signal?.addEventListener("abort", onAbort, { once: true });
      await runBatchEvents(
        service,
        terms,
        (event) => {
          if (open) controller.enqueue(encoder.encode(encodeEvent(event)));
        },
        abort.signal
      );
      signal?.removeEventListener("abort", onAbort);
      if (open) {
        open = false;
        controller.close();
      }
    },
    cancel() {
      // The reader went away; stop the batch after the term in flight.
      open = false;
      abort.abort();
    }
  });
}
