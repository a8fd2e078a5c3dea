import { promises as fs } from "fs";
import type { Card } from "@shared/index";
import { clearAudioDirectory } from "./audio";
import type { AppConfig } from "./config";
import { loadConfig } from "./config";
import { writeDeckPackage } from "./deck/apkg";
import { BatchInProgressError, ClassificationError } from "./errors";
import { writeExportFile } from "./export";
import { createOpenAIServices } from "./llm";
import { generateCards, processTerm, type PipelineDeps, type ProgressObserver } from "./pipeline";
import { createForvoClient } from "./pronunciation";

export type ServiceSettings = Pick<AppConfig, "audioDir" | "exportPath" | "packagePath" | "deckName" | "termDelayMs">;

export type BatchOptions = {
  onProgress?: ProgressObserver;
  signal?: AbortSignal;
};

export type BatchResult = {
  cards: Card[];
  exportPath: string;
  packagePath: string;
};

/**
 * Owns the process-wide outputs (audio directory, export file, deck package)
 * and lets one batch or regeneration touch them at a time.
 */
export class FlashcardService {
  private busy = false;
  private cards: Card[] = [];

  constructor(
    private readonly deps: PipelineDeps,
    private readonly settings: ServiceSettings
  ) {}

  get isBusy(): boolean {
    return this.busy;
  }

  currentCards(): readonly Card[] {
    return this.cards;
  }

  async runBatch(terms: readonly string[], options: BatchOptions = {}): Promise<BatchResult> {
    return this.exclusive(async () => {
      await clearAudioDirectory(this.settings.audioDir);
      const cards = await generateCards(terms, this.deps, {
        onProgress: options.onProgress,
        signal: options.signal,
        delayMs: this.settings.termDelayMs
      });
      await this.publish(cards);
      return { cards, exportPath: this.settings.exportPath, packagePath: this.settings.packagePath };
    });
  }

  async regenerate(term: string, id: number, signal?: AbortSignal): Promise<Card> {
    return this.exclusive(async () => {
      const card = await processTerm(term, id, this.deps, signal);
      if (!card) throw new ClassificationError(term);
      const others = this.cards.filter((existing) => existing.id !== id);
      await this.publish([...others, card].sort((a, b) => a.id - b.id));
      return card;
    });
  }

  async readPackage(): Promise<Buffer | null> {
    try {
      return await fs.readFile(this.settings.packagePath);
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") return null;
      throw error;
    }
  }

  private async publish(cards: Card[]): Promise<void> {
    await writeExportFile(cards, this.settings.exportPath);
    await writeDeckPackage(cards, this.settings.packagePath, {
      deckName: this.settings.deckName,
      audioDir: this.settings.audioDir
    });
    this.cards = cards;
  }

  private async exclusive<T>(task: () => Promise<T>): Promise<T> {
    if (this.busy) throw new BatchInProgressError();
    this.busy = true;
    try {
      return await task();
    } finally {
      this.busy = false;
    }
  }
}

export function createFlashcardService(config: AppConfig): FlashcardService {
  const openai = createOpenAIServices(config);
  const pronunciations = config.forvoApiKey
    ? createForvoClient({
        apiKey: config.forvoApiKey,
        baseUrl: config.forvoApiBase,
        language: config.language,
        timeoutMs: config.requestTimeoutMs
      })
    : undefined;

  return new FlashcardService(
    {
      generator: openai,
      audio: { pronunciations, speech: openai },
      audioDir: config.audioDir
    },
    config
  );
}

let shared: FlashcardService | null = null;

// Route handlers share one service so the execution slot covers the whole process.
export function getFlashcardService(): FlashcardService {
  shared ??= createFlashcardService(loadConfig());
  return shared;
}
