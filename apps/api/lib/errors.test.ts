import OpenAI from "openai";
import { describe, expect, it } from "vitest";
import { describeError, PackagingError } from "./errors";

const QUOTA_MESSAGE = "The language service quota is exhausted. Check your plan and try again later.";

describe("describeError", () => {
  it("maps rate-limit and quota responses from the language service", () => {
    expect(describeError(new OpenAI.APIError(429, undefined, "Rate limit reached", {}))).toBe(QUOTA_MESSAGE);
    expect(describeError(new OpenAI.APIError(400, { code: "insufficient_quota" }, "quota", {}))).toBe(QUOTA_MESSAGE);
  });

  it("keeps messages that merely contain the digits 429", () => {
    const error = new PackagingError("Could not write /tmp/flashdeck-429/anki-deck.apkg");
    expect(describeError(error)).toBe("Could not write /tmp/flashdeck-429/anki-deck.apkg");
    expect(describeError("term 429 failed")).toBe("term 429 failed");
  });

  it("falls back to a generic message", () => {
    expect(describeError(new Error(""))).toBe("Something went wrong. Please try again.");
    expect(describeError({ reason: "unknown" })).toBe("Something went wrong. Please try again.");
  });
});
