/**
 * Activity API routes.
 *
 * Routes:
 * - GET /activities?date= - List a date's activities, also grouped by area
 * - GET /activities/:id - Get an activity
 * - POST /activities - Add an activity (to `briefingId`, or to `date`'s briefing)
 * - POST /activities/copy - Copy one date's activities into another
 * - PUT /activities/:id - Replace an activity
 * - DELETE /activities/:id - Delete an activity
 */

import { Hono } from "hono";
import { z } from "zod";
import type { Engine } from "../../engine/index.js";
import { NoSourceDataError } from "../../engine/errors.js";
import { runOperation } from "../../engine/operation.js";
import { ActivityInputSchema, normalizeDate } from "../../engine/fields.js";
import { addDays } from "../../engine/calendar.js";
import type { ResolvedActivity } from "../../engine/types.js";
import type { AppEnv } from "../context.js";
import { errorResponse, parseJsonBody, parseWith, queriesToObject, sendResult } from "../respond.js";
import { DateParamSchema, IdParamSchema } from "./params.js";

const ListQuerySchema = z.object({
  date: DateParamSchema,
});

const AddActivitySchema = ActivityInputSchema.extend({
  date: z.string().optional(),
  briefingId: z.number().int().positive().optional(),
});

const UpdateActivitySchema = ActivityInputSchema.extend({
  briefingId: z.number().int().positive().optional(),
});

const CopyDaySchema = z.object({
  sourceDate: z.string().optional(),
  targetDate: z.string().optional(),
});

export interface AreaGroup {
  area: string | null;
  activities: ResolvedActivity[];
}

/**
 * Group an ordered activity list by area, keeping the list order.
 */
export function groupByArea(activities: readonly ResolvedActivity[]): AreaGroup[] {
  const groups: AreaGroup[] = [];
  for (const activity of activities) {
    const last = groups[groups.length - 1];
    if (last && last.area === activity.area) {
      last.activities.push(activity);
    } else {
      groups.push({ area: activity.area, activities: [activity] });
    }
  }
  return groups;
}

export function createActivityRoutes(engine: Engine): Hono<AppEnv> {
  const activities = new Hono<AppEnv>();

  activities.get("/", (c) => {
    const ctx = c.get("requestContext");
    const query = parseWith(ListQuerySchema, queriesToObject(c.req.queries()));
    if (!query.success) return errorResponse(c, query);

    const { date } = query.data;
    const result = runOperation("listActivitiesForDate", ctx, () => ({
      briefing: engine.briefings.findBriefing(ctx, date) ?? null,
      activities: engine.activities.listActivitiesForDate(ctx, date),
    }));
    return sendResult(c, result, (data) => ({
      date,
      briefing: data.briefing,
      activities: data.activities,
      by_area: groupByArea(data.activities),
    }));
  });

  activities.post("/copy", async (c) => {
    const ctx = c.get("requestContext");
    const body = await parseJsonBody(c, CopyDaySchema);
    if (!body.success) return errorResponse(c, body);

    const targetDate = normalizeDate(body.data.targetDate);
    const result = runOperation("copyDay", ctx, () => {
      // Default source: the latest briefing before the target
      const sourceDate = body.data.sourceDate
        ? normalizeDate(body.data.sourceDate)
        : engine.briefings.findPreviousBriefing(ctx, targetDate)?.date;
      if (!sourceDate) {
        throw new NoSourceDataError(addDays(targetDate, -1));
      }
      return engine.dayCopy.copyDay(ctx, sourceDate, targetDate);
    });
    return sendResult(c, result, (copy) => ({ copy }));
  });

  activities.get("/:id", (c) => {
    const ctx = c.get("requestContext");
    const id = parseWith(IdParamSchema, c.req.param("id"));
    if (!id.success) return errorResponse(c, id);

    const result = runOperation("getActivity", ctx, () => engine.activities.getActivity(ctx, id.data));
    return sendResult(c, result, (activity) => ({ activity }));
  });

  activities.post("/", async (c) => {
    const ctx = c.get("requestContext");
    const body = await parseJsonBody(c, AddActivitySchema);
    if (!body.success) return errorResponse(c, body);

    const { date, briefingId, ...fields } = body.data;
    const result = runOperation("addActivity", ctx, () =>
      briefingId !== undefined
        ? engine.activities.addActivity(ctx, briefingId, fields)
        : engine.activities.addActivityForDate(ctx, normalizeDate(date), fields)
    );
    return sendResult(c, result, (activity) => ({ id: activity.id, activity }), 201);
  });

  activities.put("/:id", async (c) => {
    const ctx = c.get("requestContext");
    const id = parseWith(IdParamSchema, c.req.param("id"));
    if (!id.success) return errorResponse(c, id);
    const body = await parseJsonBody(c, UpdateActivitySchema);
    if (!body.success) return errorResponse(c, body);

    const { briefingId, ...fields } = body.data;
    const result = runOperation("updateActivity", ctx, () =>
      engine.activities.updateActivity(ctx, id.data, fields, briefingId)
    );
    return sendResult(c, result, (activity) => ({ activity }));
  });

  activities.delete("/:id", (c) => {
    const ctx = c.get("requestContext");
    const id = parseWith(IdParamSchema, c.req.param("id"));
    if (!id.success) return errorResponse(c, id);

    const result = runOperation("deleteActivity", ctx, () => engine.activities.deleteActivity(ctx, id.data));
    return sendResult(c, result, (deletion) => ({ deleted: deletion.deleted, activity: deletion.prior }));
  });

  return activities;
}
