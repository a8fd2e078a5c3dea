import type { BatchEvent } from "@shared/index";
import { BatchInProgressError, ClassificationError, describeError } from "./lib/errors";
import { DOWNLOAD_FILE_NAME, parseGenerateRequest, parseRegenerateRequest } from "./lib/requests";
import { getFlashcardService, type FlashcardService } from "./lib/service";
import { encodeEvent, NDJSON_CONTENT_TYPE, runBatchEvents } from "./lib/stream";

export type HttpEvent = {
  requestContext?: {
    http?: {
      method?: string;
      path?: string;
    };
    stage?: string;
  };
  rawPath?: string;
  headers?: Record<string, string | undefined>;
  body?: string | null;
  isBase64Encoded?: boolean;
};

export type HttpResponse = {
  statusCode: number;
  headers: Record<string, string>;
  body: string;
  isBase64Encoded?: boolean;
};

const CORS_HEADERS = {
  "access-control-allow-origin": "*",
  "access-control-allow-headers": "Content-Type",
  "access-control-allow-methods": "GET,POST,OPTIONS"
};

const JSON_HEADERS = {
  ...CORS_HEADERS,
  "content-type": "application/json; charset=utf-8"
};

function json(statusCode: number, body: unknown): HttpResponse {
  return {
    statusCode,
    headers: JSON_HEADERS,
    body: JSON.stringify(body)
  };
}

function getPath(event: HttpEvent): string {
  if (event.rawPath) return event.rawPath;
  return event.requestContext?.http?.path || "";
}

function getMethod(event: HttpEvent): string {
  return (event.requestContext?.http?.method || "GET").toUpperCase();
}

function decodeBody(event: HttpEvent): string {
  if (!event.body) return "";
  if (event.isBase64Encoded) {
    return Buffer.from(event.body, "base64").toString("utf8");
  }
  return event.body;
}

function readJson(event: HttpEvent): unknown {
  try {
    return JSON.parse(decodeBody(event) || "{}");
  } catch {
    return undefined;
  }
}

async function generate(event: HttpEvent, service: FlashcardService): Promise<HttpResponse> {
  const terms = parseGenerateRequest(readJson(event));
  if (!terms) return json(400, { error: "words must contain at least one term" });
  if (service.isBusy) return json(409, { error: new BatchInProgressError().message });

  const events: BatchEvent[] = [];
  await runBatchEvents(service, terms, (batchEvent) => events.push(batchEvent));
  return {
    statusCode: 200,
    headers: { ...CORS_HEADERS, "content-type": NDJSON_CONTENT_TYPE },
    body: events.map(encodeEvent).join("")
  };
}

async function download(service: FlashcardService): Promise<HttpResponse> {
  const bytes = await service.readPackage();
  if (!bytes) return json(404, { error: "No deck has been generated yet" });
  return {
    statusCode: 200,
    headers: {
      ...CORS_HEADERS,
      "content-type": "application/octet-stream",
      "content-disposition": `attachment; filename="${DOWNLOAD_FILE_NAME}"`
    },
    body: bytes.toString("base64"),
    isBase64Encoded: true
  };
}

async function regenerate(event: HttpEvent, service: FlashcardService): Promise<HttpResponse> {
  const request = parseRegenerateRequest(readJson(event));
  if (!request) return json(400, { error: "word and a non-negative integer id are required" });
  try {
    return json(200, await service.regenerate(request.word, request.id));
  } catch (error) {
    if (error instanceof BatchInProgressError) return json(409, { error: error.message });
    if (error instanceof ClassificationError) return json(422, { error: error.message });
    throw error;
  }
}

export function createHandler(resolveService: () => FlashcardService) {
  return async function handler(event: HttpEvent): Promise<HttpResponse> {
    try {
      const method = getMethod(event);
      const path = getPath(event);

      if (method === "OPTIONS") {
        return { statusCode: 204, headers: JSON_HEADERS, body: "" };
      }

      if (method === "POST" && path === "/api/generate") {
        return await generate(event, resolveService());
      }

      if (method === "GET" && path === "/api/download") {
        return await download(resolveService());
      }

      if (method === "POST" && path === "/api/regenerate") {
        return await regenerate(event, resolveService());
      }

      if (method === "GET" && path === "/api/cards") {
        return json(200, resolveService().currentCards());
      }

      return json(404, { error: "Not found" });
    } catch (error) {
      console.error("[lambda] request failed", error);
      return json(500, { error: describeError(error) });
    }
  };
}

export const handler = createHandler(getFlashcardService);
