import path from "path";
import { z } from "zod";
import { ConfigurationError } from "./errors";

export const SPEECH_VOICES = ["alloy", "echo", "fable", "onyx", "nova", "shimmer"] as const;

export type SpeechVoice = (typeof SPEECH_VOICES)[number];

export type AppConfig = {
  openaiApiKey: string;
  forvoApiKey?: string;
  chatModel: string;
  speechModel: string;
  speechVoice: SpeechVoice;
  forvoApiBase: string;
  language: "de";
  deckName: string;
  termDelayMs: number;
  requestTimeoutMs: number;
  audioDir: string;
  exportPath: string;
  packagePath: string;
};

const optionalText = z
  .string()
  .optional()
  .transform((value) => value?.trim() || undefined);

const envSchema = z.object({
  OPENAI_API_KEY: optionalText,
  FORVO_API_KEY: optionalText,
  OPENAI_CHAT_MODEL: optionalText,
  OPENAI_TTS_MODEL: optionalText,
  OPENAI_TTS_VOICE: z.enum(SPEECH_VOICES).optional(),
  FORVO_API_BASE: optionalText,
  FLASHDECK_OUTPUT_DIR: optionalText,
  FLASHDECK_DECK_NAME: optionalText,
  FLASHDECK_TERM_DELAY_MS: z.coerce.number().int().min(0).optional(),
  FLASHDECK_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().optional()
});

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(`Invalid ${issue?.path.join(".") || "environment"}: ${issue?.message ?? "unknown issue"}`);
  }
  const vars = parsed.data;
  if (!vars.OPENAI_API_KEY) {
    throw new ConfigurationError("OPENAI_API_KEY is not set. Add it to the environment before generating cards.");
  }
  if (!vars.FORVO_API_KEY) {
    console.warn("[config] FORVO_API_KEY is not set. Pronunciation lookups are skipped; audio falls back to speech synthesis.");
  }

  const outputDir = path.resolve(vars.FLASHDECK_OUTPUT_DIR ?? process.cwd());
  return {
    openaiApiKey: vars.OPENAI_API_KEY,
    forvoApiKey: vars.FORVO_API_KEY,
    chatModel: vars.OPENAI_CHAT_MODEL ?? "gpt-4o",
    speechModel: vars.OPENAI_TTS_MODEL ?? "tts-1",
    speechVoice: vars.OPENAI_TTS_VOICE ?? "alloy",
    forvoApiBase: (vars.FORVO_API_BASE ?? "https://apifree.forvo.com").replace(/\/+$/, ""),
    language: "de",
    deckName: vars.FLASHDECK_DECK_NAME ?? "German Vocabulary",
    termDelayMs: vars.FLASHDECK_TERM_DELAY_MS ?? 1000,
    requestTimeoutMs: vars.FLASHDECK_REQUEST_TIMEOUT_MS ?? 30000,
    audioDir: path.join(outputDir, "audio"),
    exportPath: path.join(outputDir, "output.txt"),
    packagePath: path.join(outputDir, "anki-deck.apkg")
  };
}
