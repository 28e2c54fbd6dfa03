/**
 * Statistics API routes.
 *
 * Routes:
 * - GET /stats/daily?date= - Totals for one date
 * - GET /stats/range?start=&end= - Totals over a range (default: this week)
 * - GET /stats/weekly?date= - Totals over the Monday-Sunday week of a date
 * - GET /stats/contractors/daily?end=&window= - Rolling labour per contractor
 * - GET /stats/areas - Lifetime usage per area
 */

import { Hono } from "hono";
import { z } from "zod";
import type { Engine } from "../../engine/index.js";
import { runOperation } from "../../engine/operation.js";
import { normalizeDate } from "../../engine/fields.js";
import { todayIn, weekBounds } from "../../engine/calendar.js";
import type { AppEnv } from "../context.js";
import { errorResponse, parseWith, queriesToObject, sendResult } from "../respond.js";
import { DateParamSchema } from "./params.js";

const DailyQuerySchema = z.object({
  date: DateParamSchema,
});

const RangeQuerySchema = z.object({
  start: z.string().optional(),
  end: z.string().optional(),
});

const RollingQuerySchema = z.object({
  end: DateParamSchema,
  window: z.coerce.number().optional(),
});

export function createStatsRoutes(engine: Engine): Hono<AppEnv> {
  const stats = new Hono<AppEnv>();

  stats.get("/daily", (c) => {
    const ctx = c.get("requestContext");
    const query = parseWith(DailyQuerySchema, queriesToObject(c.req.queries()));
    if (!query.success) return errorResponse(c, query);

    const result = runOperation("dailyTotals", ctx, () => engine.statistics.dailyTotals(ctx, query.data.date));
    return sendResult(c, result, (totals) => ({ stats: totals }));
  });

  stats.get("/range", (c) => {
    const ctx = c.get("requestContext");
    const query = parseWith(RangeQuerySchema, queriesToObject(c.req.queries()));
    if (!query.success) return errorResponse(c, query);

    const week = weekBounds(todayIn());
    const start = query.data.start ? normalizeDate(query.data.start) : week.start;
    const end = query.data.end ? normalizeDate(query.data.end) : week.end;

    const result = runOperation("rangeTotals", ctx, () => engine.statistics.rangeTotals(ctx, start, end));
    return sendResult(c, result, (totals) => ({ stats: totals }));
  });

  stats.get("/weekly", (c) => {
    const ctx = c.get("requestContext");
    const query = parseWith(DailyQuerySchema, queriesToObject(c.req.queries()));
    if (!query.success) return errorResponse(c, query);

    const result = runOperation("weeklyTotals", ctx, () => engine.statistics.weeklyTotals(ctx, query.data.date));
    return sendResult(c, result, (totals) => ({ stats: totals }));
  });

  stats.get("/contractors/daily", (c) => {
    const ctx = c.get("requestContext");
    const query = parseWith(RollingQuerySchema, queriesToObject(c.req.queries()));
    if (!query.success) return errorResponse(c, query);

    const result = runOperation("rollingContractorDaily", ctx, () =>
      engine.statistics.rollingContractorDaily(ctx, query.data.end, query.data.window)
    );
    return sendResult(c, result, (totals) => ({ stats: totals }));
  });

  stats.get("/areas", (c) => {
    const ctx = c.get("requestContext");
    const result = runOperation("areaUsageStats", ctx, () => engine.statistics.areaUsageStats(ctx));
    return sendResult(c, result, (areas) => ({ areas }));
  });

  return stats;
}
