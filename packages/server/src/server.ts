/**
 * HTTP server lifecycle: telemetry, config validation, serving, shutdown.
 */

import { serve } from "@hono/node-server";
import { Hono } from "hono";
import { initTelemetry, shutdownTelemetry } from "./telemetry/index.js";
import { validateConfigOrThrow, logConfigSummary } from "./config/validation.js";
import { API_HOST, API_PORT, API_PREFIX, SHUTDOWN_TIMEOUT_MS } from "./config/index.js";
import { createApiRouter } from "./api/router.js";
import type { AppEnv } from "./api/context.js";
import { closeSiteDb } from "./site-db/index.js";
import { colors } from "./utils/colors.js";
import { getErrorMessage } from "./utils/errors.js";

/**
 * Create the root app with the API mounted under API_PREFIX.
 */
export function createApp(api: Hono<AppEnv> = createApiRouter()): Hono {
  const app = new Hono();
  app.route(API_PREFIX, api);
  return app;
}

export async function startServer(): Promise<void> {
  initTelemetry();
  validateConfigOrThrow();

  process.on("unhandledRejection", (reason) => {
    console.error(`${colors.red}[FATAL]${colors.reset} Unhandled Rejection:`, reason);
  });

  console.log(`${colors.bold}Site briefing server${colors.reset}`);
  if (process.env.DEBUG) {
    logConfigSummary();
  }

  const server = serve({
    fetch: createApp().fetch,
    port: API_PORT,
    hostname: API_HOST,
  });
  console.log(`API server: ${colors.cyan}http://${API_HOST}:${API_PORT}${API_PREFIX}${colors.reset}`);

  const shutdown = async (signal: string): Promise<void> => {
    console.log();
    console.log(`${colors.dim}${signal} received, shutting down...${colors.reset}`);

    // Force exit if cleanup hangs
    const shutdownTimeout = setTimeout(() => {
      console.error(`${colors.yellow}[WARN]${colors.reset} Shutdown timed out, forcing exit`);
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);

    try {
      server.close();
      closeSiteDb();
      await shutdownTelemetry();
    } catch (error) {
      console.error(`${colors.red}[SHUTDOWN]${colors.reset} ${getErrorMessage(error)}`);
    } finally {
      clearTimeout(shutdownTimeout);
      process.exit(0);
    }
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));

  console.log(`${colors.green}✓${colors.reset} Ready`);
}
