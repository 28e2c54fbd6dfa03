/**
 * Hono API router for the briefing engine.
 */

import { Hono } from "hono";
import { cors } from "hono/cors";
import { createEngine, type Engine } from "../engine/index.js";
import { requireRequestContext, type AppEnv } from "./context.js";
import { createActivityRoutes } from "./routes/activities.js";
import { createBriefingRoutes } from "./routes/briefings.js";
import { createContractorRoutes } from "./routes/contractors.js";
import { createStatsRoutes } from "./routes/stats.js";

/**
 * Create the API router. Mount it under API_PREFIX.
 */
export function createApiRouter(engine: Engine = createEngine()): Hono<AppEnv> {
  const api = new Hono<AppEnv>();

  // Allow browser clients served from localhost
  api.use(
    "*",
    cors({
      origin: (origin) => {
        if (!origin) return origin;
        try {
          const url = new URL(origin);
          if (url.hostname === "localhost" || url.hostname === "127.0.0.1") {
            return origin;
          }
          return null;
        } catch {
          return null;
        }
      },
      credentials: true,
    })
  );

  // Registered before the context check, so it answers without headers
  api.get("/health", (c) => c.json({ success: true, status: "ok", timestamp: new Date().toISOString() }));

  api.use("*", requireRequestContext);

  api.route("/briefings", createBriefingRoutes(engine));
  api.route("/activities", createActivityRoutes(engine));
  api.route("/stats", createStatsRoutes(engine));
  api.route("/contractors", createContractorRoutes(engine));

  return api;
}
