/**
 * Repository for activity persistence.
 * Activities are always reached through their briefing's project.
 */

import { eq, and, asc, desc, gte, lte, ne, isNotNull, sql } from "drizzle-orm";
import { getSiteDb, schema, type SiteDb } from "./index.js";
import type { ActivityRow, NewActivityRow } from "./schema.js";
import { PRIORITY_RANK } from "../config/site.js";

/** Writable columns; id and briefing-derived fields are set by the caller */
export type ActivityValues = Omit<NewActivityRow, "id">;

/** An activity row paired with its briefing's date */
export interface DatedActivityRow {
  activity: ActivityRow;
  briefingDate: string;
}

export interface AreaUsageRow {
  area: string;
  activityCount: number;
  totalLabor: number;
  monthsActive: number;
  firstUsed: string;
  lastUsed: string;
}

/** critical > high > medium > low > unspecified */
const priorityRank = sql<number>`CASE ${schema.activities.priority}
  WHEN 'critical' THEN ${PRIORITY_RANK.critical}
  WHEN 'high' THEN ${PRIORITY_RANK.high}
  WHEN 'medium' THEN ${PRIORITY_RANK.medium}
  WHEN 'low' THEN ${PRIORITY_RANK.low}
  ELSE 0 END`;

/** Listing order: area, then most urgent first, then title */
const listingOrder = [
  asc(schema.activities.area),
  desc(priorityRank),
  asc(schema.activities.title),
  asc(schema.activities.id),
];

/**
 * Repository for managing activities in the site database.
 */
export class ActivityRepo {
  constructor(private readonly db: SiteDb = getSiteDb()) {}

  /**
   * Get the activities of a briefing in listing order.
   */
  listByBriefing(briefingId: number): ActivityRow[] {
    return this.db
      .select()
      .from(schema.activities)
      .where(eq(schema.activities.briefingId, briefingId))
      .orderBy(...listingOrder)
      .all();
  }

  /**
   * Count the activities of a briefing.
   */
  countByBriefing(briefingId: number): number {
    const result = this.db
      .select({ count: sql<number>`COUNT(*)`.mapWith(Number) })
      .from(schema.activities)
      .where(eq(schema.activities.briefingId, briefingId))
      .get();
    return result?.count ?? 0;
  }

  /**
   * Get an activity by ID, only if its briefing belongs to the project.
   */
  getInProject(activityId: number, projectId: string): ActivityRow | undefined {
    const row = this.db
      .select({ activity: schema.activities })
      .from(schema.activities)
      .innerJoin(schema.briefings, eq(schema.activities.briefingId, schema.briefings.id))
      .where(and(eq(schema.activities.id, activityId), eq(schema.briefings.projectId, projectId)))
      .get();
    return row?.activity;
  }

  /**
   * Get every activity of the project whose briefing date is in
   * [startDate, endDate], ordered by date then listing order.
   */
  listInRange(projectId: string, startDate: string, endDate: string): DatedActivityRow[] {
    return this.db
      .select({ activity: schema.activities, briefingDate: schema.briefings.date })
      .from(schema.activities)
      .innerJoin(schema.briefings, eq(schema.activities.briefingId, schema.briefings.id))
      .where(
        and(
          eq(schema.briefings.projectId, projectId),
          gte(schema.briefings.date, startDate),
          lte(schema.briefings.date, endDate)
        )
      )
      .orderBy(asc(schema.briefings.date), ...listingOrder)
      .all();
  }

  /**
   * Insert an activity and return the stored row.
   */
  insert(values: ActivityValues): ActivityRow {
    const [row] = this.db.insert(schema.activities).values(values).returning().all();
    if (!row) {
      throw new Error("Activity insert returned no row");
    }
    return row;
  }

  /**
   * Overwrite every writable column of an activity.
   *
   * @returns The stored row, or undefined if the activity no longer exists
   */
  replace(activityId: number, values: Omit<ActivityValues, "createdAt">): ActivityRow | undefined {
    const [row] = this.db
      .update(schema.activities)
      .set(values)
      .where(eq(schema.activities.id, activityId))
      .returning()
      .all();
    return row;
  }

  /**
   * Delete an activity by ID.
   *
   * @returns Number of rows removed
   */
  delete(activityId: number): number {
    return this.db.delete(schema.activities).where(eq(schema.activities.id, activityId)).run().changes;
  }

  /**
   * Lifetime usage per named area, busiest first.
   */
  areaUsage(projectId: string): AreaUsageRow[] {
    const activityCount = sql<number>`COUNT(${schema.activities.id})`.mapWith(Number);
    const rows = this.db
      .select({
        area: schema.activities.area,
        activityCount,
        totalLabor: sql<number>`COALESCE(SUM(${schema.activities.laborCount}), 0)`.mapWith(Number),
        monthsActive: sql<number>`COUNT(DISTINCT substr(${schema.briefings.date}, 1, 7))`.mapWith(Number),
        firstUsed: sql<string>`MIN(${schema.briefings.date})`,
        lastUsed: sql<string>`MAX(${schema.briefings.date})`,
      })
      .from(schema.activities)
      .innerJoin(schema.briefings, eq(schema.activities.briefingId, schema.briefings.id))
      .where(
        and(
          eq(schema.briefings.projectId, projectId),
          isNotNull(schema.activities.area),
          ne(schema.activities.area, "")
        )
      )
      .groupBy(schema.activities.area)
      .orderBy(desc(activityCount), asc(schema.activities.area))
      .all();

    const usage: AreaUsageRow[] = [];
    for (const row of rows) {
      if (row.area !== null) {
        usage.push({ ...row, area: row.area });
      }
    }
    return usage;
  }
}
