/**
 * Briefing API routes.
 *
 * Routes:
 * - GET /briefings/:date - Get the briefing for a date (404 when absent)
 * - GET /briefings/:date/previous - Get the latest briefing before a date
 * - POST /briefings/:date - Get or create the briefing for a date
 */

import { Hono } from "hono";
import type { Engine } from "../../engine/index.js";
import { NotFoundError } from "../../engine/errors.js";
import { runOperation } from "../../engine/operation.js";
import type { AppEnv } from "../context.js";
import { sendResult } from "../respond.js";
import { normalizeDate } from "../../engine/fields.js";

export function createBriefingRoutes(engine: Engine): Hono<AppEnv> {
  const briefings = new Hono<AppEnv>();

  briefings.get("/:date", (c) => {
    const ctx = c.get("requestContext");
    const date = normalizeDate(c.req.param("date"));
    const result = runOperation("findBriefing", ctx, () => {
      const briefing = engine.briefings.findBriefing(ctx, date);
      if (!briefing) {
        throw new NotFoundError("Briefing for", date);
      }
      return briefing;
    });
    return sendResult(c, result, (briefing) => ({ briefing }));
  });

  briefings.get("/:date/previous", (c) => {
    const ctx = c.get("requestContext");
    const date = normalizeDate(c.req.param("date"));
    const result = runOperation("findPreviousBriefing", ctx, () =>
      engine.briefings.findPreviousBriefing(ctx, date)
    );
    return sendResult(c, result, (briefing) => ({ briefing: briefing ?? null }));
  });

  briefings.post("/:date", (c) => {
    const ctx = c.get("requestContext");
    const date = normalizeDate(c.req.param("date"));
    const result = runOperation("getOrCreateBriefing", ctx, () =>
      engine.briefings.getOrCreateBriefing(ctx, date)
    );
    return sendResult(c, result, (briefing) => ({ briefing }));
  });

  return briefings;
}
