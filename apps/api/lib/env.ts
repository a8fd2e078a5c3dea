import path from "path";
import { config as loadEnvFile } from "dotenv";

/**
 * Reads `<rootDir>/.env` into `env` without overriding variables that are
 * already set, and anchors the output directory at `rootDir`. A missing file
 * is not an error.
 */
export function loadProjectEnv(rootDir: string, env: NodeJS.ProcessEnv = process.env): void {
  const { parsed = {} } = loadEnvFile({ path: path.join(rootDir, ".env"), processEnv: {} });
  for (const [key, value] of Object.entries(parsed)) {
    env[key] ??= value;
  }
  env.FLASHDECK_OUTPUT_DIR = path.resolve(rootDir, env.FLASHDECK_OUTPUT_DIR ?? ".");
}
