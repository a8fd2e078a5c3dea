import { mkdtemp, rm } from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createHandler, type HttpEvent } from "./lambda";
import { ConfigurationError } from "./lib/errors";
import type { ChatMessage } from "./lib/llm";
import { FlashcardService } from "./lib/service";

const REPLIES: Record<string, string> = {
  Tisch: "Type: word\nTranslation: table\nGender: der",
  Stuhl: "Type: word\nTranslation: chair\nGender: der"
};

function createService(outputDir: string, gate?: Promise<void>): FlashcardService {
  const complete = async (messages: ChatMessage[]) => {
    await gate;
    const term = messages[1]?.content.match(/Analyze the German input: "([^"]*)"/)?.[1] ?? "";
    return REPLIES[term] ?? "Translation: N/A";
  };
  const speech = { synthesize: async (text: string) => new TextEncoder().encode(text) };
  const audioDir = path.join(outputDir, "audio");
  return new FlashcardService(
    { generator: { complete }, audio: { speech }, audioDir },
    {
      audioDir,
      exportPath: path.join(outputDir, "output.txt"),
      packagePath: path.join(outputDir, "anki-deck.apkg"),
      deckName: "German Vocabulary",
      termDelayMs: 0
    }
  );
}

function request(method: string, rawPath: string, body?: unknown): HttpEvent {
  return {
    rawPath,
    requestContext: { http: { method, path: rawPath } },
    body: body === undefined ? null : typeof body === "string" ? body : JSON.stringify(body)
  };
}

describe("lambda handler", () => {
  let outputDir: string;
  let service: FlashcardService;
  let handler: ReturnType<typeof createHandler>;

  beforeEach(async () => {
    outputDir = await mkdtemp(path.join(os.tmpdir(), "flashdeck-lambda-"));
    service = createService(outputDir);
    handler = createHandler(() => service);
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(outputDir, { recursive: true, force: true });
  });

  it("answers preflight and unknown routes", async () => {
    expect((await handler(request("OPTIONS", "/api/generate"))).statusCode).toBe(204);
    expect(await handler(request("GET", "/api/unknown"))).toMatchObject({ statusCode: 404, body: '{"error":"Not found"}' });
  });

  it("rejects a generate request without terms", async () => {
    expect((await handler(request("POST", "/api/generate", { words: ["  ", ""] }))).statusCode).toBe(400);
    expect((await handler(request("POST", "/api/generate", "{not json"))).statusCode).toBe(400);
  });

  it("returns the batch events, then serves the cards and the package", async () => {
    const response = await handler(request("POST", "/api/generate", { words: "Tisch\n\n" }));

    expect(response.statusCode).toBe(200);
    expect(response.headers["content-type"]).toBe("application/x-ndjson; charset=utf-8");
    const events = response.body.trimEnd().split("\n").map((line) => JSON.parse(line));
    expect(events.map((event) => event.type)).toEqual(["start", "progress", "complete"]);

    const cards = await handler(request("GET", "/api/cards"));
    expect(JSON.parse(cards.body)).toEqual([
      { id: 0, kind: "word", sourceText: "Tisch", translations: ["table"], gender: "der", audioFileName: "tisch_pronunciation.mp3" }
    ]);

    const download = await handler(request("GET", "/api/download"));
    expect(download.statusCode).toBe(200);
    expect(download.isBase64Encoded).toBe(true);
    expect(download.headers["content-disposition"]).toBe('attachment; filename="german-vocabulary.apkg"');
    expect(Buffer.from(download.body, "base64").subarray(0, 2).toString("latin1")).toBe("PK");
  });

  it("has nothing to download before the first batch", async () => {
    expect((await handler(request("GET", "/api/download"))).statusCode).toBe(404);
  });

  it("maps regenerate outcomes to status codes", async () => {
    await handler(request("POST", "/api/generate", { words: ["Tisch"] }));

    expect((await handler(request("POST", "/api/regenerate", { word: "Stuhl" }))).statusCode).toBe(400);
    expect((await handler(request("POST", "/api/regenerate", { word: "Quatsch", id: 0 }))).statusCode).toBe(422);

    const updated = await handler(request("POST", "/api/regenerate", { word: "Stuhl", id: 0 }));
    expect(updated.statusCode).toBe(200);
    expect(JSON.parse(updated.body)).toMatchObject({ id: 0, sourceText: "Stuhl" });
  });

  it("answers 409 while a batch is running", async () => {
    let release: () => void = () => undefined;
    service = createService(
      outputDir,
      new Promise<void>((resolve) => {
        release = resolve;
      })
    );
    const running = service.runBatch(["Tisch"]);

    expect((await handler(request("POST", "/api/generate", { words: ["Stuhl"] }))).statusCode).toBe(409);
    expect((await handler(request("POST", "/api/regenerate", { word: "Stuhl", id: 0 }))).statusCode).toBe(409);

    release();
    await running;
  });

  it("reports configuration problems as server errors", async () => {
    const broken = createHandler(() => {
      throw new ConfigurationError("OPENAI_API_KEY is not set");
    });

    expect(await broken(request("GET", "/api/cards"))).toMatchObject({
      statusCode: 500,
      body: '{"error":"OPENAI_API_KEY is not set"}'
    });
  });
});
