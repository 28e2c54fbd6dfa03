/**
 * Repository for briefing persistence.
 * One briefing per (project, date), inserted idempotently.
 */

import { eq, and, asc, desc, lt, gte, lte } from "drizzle-orm";
import { getSiteDb, schema, type SiteDb } from "./index.js";
import type { Briefing } from "./schema.js";

/** Text sections written when a briefing is created */
export type BriefingContent = Pick<Briefing, "overview" | "safetyInfo" | "notes">;
import { BRIEFING_STATUS } from "../config/site.js";

/**
 * Repository for managing briefings in the site database.
 */
export class BriefingRepo {
  constructor(private readonly db: SiteDb = getSiteDb()) {}

  /**
   * Get a briefing by ID, only if it belongs to the project.
   */
  getInProject(briefingId: number, projectId: string): Briefing | undefined {
    return this.db
      .select()
      .from(schema.briefings)
      .where(and(eq(schema.briefings.id, briefingId), eq(schema.briefings.projectId, projectId)))
      .get();
  }

  /**
   * Get the briefing for a project and date.
   */
  findByDate(projectId: string, date: string): Briefing | undefined {
    return this.db
      .select()
      .from(schema.briefings)
      .where(and(eq(schema.briefings.projectId, projectId), eq(schema.briefings.date, date)))
      .get();
  }

  /**
   * Get the latest briefing strictly before a date.
   */
  findLatestBefore(projectId: string, date: string): Briefing | undefined {
    return this.db
      .select()
      .from(schema.briefings)
      .where(and(eq(schema.briefings.projectId, projectId), lt(schema.briefings.date, date)))
      .orderBy(desc(schema.briefings.date))
      .limit(1)
      .get();
  }

  /**
   * Get briefings with dates in [startDate, endDate], oldest first.
   */
  listInRange(projectId: string, startDate: string, endDate: string): Briefing[] {
    return this.db
      .select()
      .from(schema.briefings)
      .where(
        and(
          eq(schema.briefings.projectId, projectId),
          gte(schema.briefings.date, startDate),
          lte(schema.briefings.date, endDate)
        )
      )
      .orderBy(asc(schema.briefings.date))
      .all();
  }

  /**
   * Insert a draft briefing unless one exists for (project, date).
   * An existing row keeps its content.
   * Relies on the unique constraint, so concurrent callers cannot create two.
   *
   * @returns true if this call created the row
   */
  insertIfAbsent(projectId: string, date: string, createdBy: string, content: BriefingContent): boolean {
    const result = this.db
      .insert(schema.briefings)
      .values({
        projectId,
        date,
        ...content,
        status: BRIEFING_STATUS.DRAFT,
        createdBy,
        lastUpdated: new Date().toISOString(),
      })
      .onConflictDoNothing({ target: [schema.briefings.projectId, schema.briefings.date] })
      .run();

    return result.changes > 0;
  }
}
