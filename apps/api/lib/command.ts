import { promises as fs } from "fs";
import { loadConfig, type AppConfig } from "./config";
import { BatchCancelledError, ConfigurationError, describeError } from "./errors";
import { createFlashcardService, type FlashcardService } from "./service";
import { normalizeTerms } from "./text";

export const DEFAULT_INPUT_FILE = "input.txt";

export type CommandOptions = {
  env?: Record<string, string | undefined>;
  signal?: AbortSignal;
  createService?: (config: AppConfig) => FlashcardService;
};

/** Runs one batch from an input file and resolves to the process exit code. */
export async function runCommand(args: readonly string[], options: CommandOptions = {}): Promise<number> {
  const inputPath = args[0] ?? DEFAULT_INPUT_FILE;
  const { createService = createFlashcardService } = options;

  let config: AppConfig;
  try {
    config = loadConfig(options.env);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`[cli] ${error.message}`);
      return 1;
    }
    throw error;
  }

  let input: string;
  try {
    input = await fs.readFile(inputPath, "utf8");
  } catch (error) {
    console.error(`[cli] could not read ${inputPath}: ${describeError(error)}`);
    return 1;
  }

  const terms = normalizeTerms(input);
  if (!terms.length) {
    console.log(`[cli] no terms found in ${inputPath}`);
    return 0;
  }
  console.log(`[cli] found ${terms.length} terms to process`);

  try {
    const result = await createService(config).runBatch(terms, {
      signal: options.signal,
      onProgress: ({ index, total, term }) => console.log(`[cli] (${index + 1}/${total}) ${term}`)
    });
    console.log(`[cli] wrote ${result.cards.length} cards to ${result.exportPath} and ${result.packagePath}`);
    return 0;
  } catch (error) {
    if (error instanceof BatchCancelledError) {
      console.warn("[cli] cancelled, nothing was written");
      return 130;
    }
    console.error(`[cli] ${describeError(error)}`);
    return 1;
  }
}
