import { mkdtemp, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadProjectEnv } from "./env";

describe("loadProjectEnv", () => {
  let rootDir: string;

  beforeEach(async () => {
    rootDir = await mkdtemp(path.join(os.tmpdir(), "flashdeck-env-"));
  });

  afterEach(async () => {
    await rm(rootDir, { recursive: true, force: true });
  });

  it("reads the .env file at the root and resolves the output directory there", async () => {
    await writeFile(path.join(rootDir, ".env"), "OPENAI_API_KEY=test-secret\nFLASHDECK_OUTPUT_DIR=out\n");
    const env: NodeJS.ProcessEnv = {};

    loadProjectEnv(rootDir, env);

    expect(env.OPENAI_API_KEY).toBe("test-secret");
    expect(env.FLASHDECK_OUTPUT_DIR).toBe(path.join(rootDir, "out"));
  });

  it("keeps variables that are already set", async () => {
    await writeFile(path.join(rootDir, ".env"), "OPENAI_API_KEY=test-secret\n");
    const env: NodeJS.ProcessEnv = { OPENAI_API_KEY: "test-override" };

    loadProjectEnv(rootDir, env);

    expect(env.OPENAI_API_KEY).toBe("test-override");
  });

  it("defaults the output directory to the root when there is no .env file", () => {
    const env: NodeJS.ProcessEnv = {};

    loadProjectEnv(rootDir, env);

    expect(env).toEqual({ FLASHDECK_OUTPUT_DIR: rootDir });
  });
});
