import OpenAI from "openai";
import type { AppConfig } from "./config";

export type ChatMessage = {
  role: "system" | "user";
  content: string;
};

export interface TextGenerator {
  complete(messages: ChatMessage[], signal?: AbortSignal): Promise<string>;
}

export interface SpeechSource {
  synthesize(text: string, signal?: AbortSignal): Promise<Uint8Array>;
}

export type OpenAIServices = TextGenerator & SpeechSource;

export function createOpenAIServices(
  config: Pick<AppConfig, "openaiApiKey" | "chatModel" | "speechModel" | "speechVoice" | "requestTimeoutMs">
): OpenAIServices {
  const client = new OpenAI({
    apiKey: config.openaiApiKey,
    timeout: config.requestTimeoutMs,
    maxRetries: 0
  });

  return {
    async complete(messages, signal) {
      const completion = await client.chat.completions.create(
        {
          model: config.chatModel,
          messages,
          temperature: 0.3,
          max_tokens: 300
        },
        { signal }
      );
      const content = completion.choices[0]?.message?.content?.trim();
      if (!content) {
        throw new Error("The language model returned an empty reply.");
      }
      return content;
    },

    async synthesize(text, signal) {
      const response = await client.audio.speech.create(
        {
          model: config.speechModel,
          voice: config.speechVoice,
          input: text,
          response_format: "mp3"
        },
        { signal }
      );
      return new Uint8Array(await response.arrayBuffer());
    }
  };
}
