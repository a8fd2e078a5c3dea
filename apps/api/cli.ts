import { runCommand } from "./lib/command";
import { loadProjectEnv } from "./lib/env";

// npm runs scripts from the repository root.
loadProjectEnv(process.cwd());

const controller = new AbortController();
process.once("SIGINT", () => controller.abort());

runCommand(process.argv.slice(2), { signal: controller.signal })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error("[cli] unexpected failure", error);
    process.exitCode = 1;
  });
