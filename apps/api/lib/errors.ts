import OpenAI from "openai";

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class ClassificationError extends Error {
  constructor(readonly term: string) {
    super(`Could not classify "${term}"`);
    this.name = "ClassificationError";
  }
}

export class BatchInProgressError extends Error {
  constructor() {
    super("A batch is already running. Try again when it has finished.");
    this.name = "BatchInProgressError";
  }
}

export class BatchCancelledError extends Error {
  constructor() {
    super("The batch was cancelled.");
    this.name = "BatchCancelledError";
  }
}

export class PackagingError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PackagingError";
  }
}

const DEFAULT_MESSAGE = "Something went wrong. Please try again.";

function isQuotaError(error: unknown): boolean {
  return error instanceof OpenAI.APIError && (error.status === 429 || error.code === "insufficient_quota");
}

export function describeError(error: unknown): string {
  if (isQuotaError(error)) {
    return "The language service quota is exhausted. Check your plan and try again later.";
  }
  if (error instanceof Error) return error.message || DEFAULT_MESSAGE;
  if (typeof error === "string") return error || DEFAULT_MESSAGE;
  return DEFAULT_MESSAGE;
}
