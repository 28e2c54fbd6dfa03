/**
 * Entry point: loads .env, then starts the server.
 *
 * The server module is imported dynamically so configuration constants,
 * read when their modules load, see the .env values.
 */

import dotenv from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { existsSync } from "node:fs";

// Load .env from the repository root (handles both src and dist execution)
const __dirname = path.dirname(fileURLToPath(import.meta.url));
const envPaths = [
  path.resolve(__dirname, "../../../.env"), // from packages/server/src
  path.resolve(__dirname, "../.env"), // from dist
  path.resolve(process.cwd(), ".env"),
];
for (const envPath of envPaths) {
  if (existsSync(envPath)) {
    dotenv.config({ path: envPath });
    break;
  }
}

const { startServer } = await import("./server.js");

startServer().catch((error: unknown) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
