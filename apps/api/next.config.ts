import path from "path";
import type { NextConfig } from "next";
import { loadProjectEnv } from "./lib/env";

// `next dev` runs from apps/api; settings and outputs live at the repository root,
// where `npm run cli` reads and writes them too.
loadProjectEnv(path.resolve(process.cwd(), "../.."));

const nextConfig: NextConfig = {
  serverExternalPackages: ["better-sqlite3"],
  experimental: {
    externalDir: true
  }
};

export default nextConfig;
