/**
 * Append-only audit trail of briefing and registry changes.
 */

import { eq, desc } from "drizzle-orm";
import { getSiteDb, schema, type SiteDb } from "./index.js";
import type { AuditLogEntry } from "./schema.js";
import type { AUDIT_ACTION } from "../config/site.js";
import { createLogger } from "../utils/logger.js";
import { getErrorMessage } from "../utils/errors.js";

const logger = createLogger("AUDIT");

export type AuditAction = (typeof AUDIT_ACTION)[keyof typeof AUDIT_ACTION];

/** Destination for audit entries */
export interface AuditSink {
  record(projectId: string, actorId: string, action: AuditAction, details: string): void;
}

/**
 * Repository for the activity_log table.
 */
export class AuditLogRepo implements AuditSink {
  constructor(private readonly db: SiteDb = getSiteDb()) {}

  /**
   * Append an entry (fire and forget).
   * A failed write is logged and never reaches the caller.
   */
  record(projectId: string, actorId: string, action: AuditAction, details: string): void {
    try {
      this.db
        .insert(schema.activityLog)
        .values({
          projectId,
          actorId,
          action,
          details,
          createdAt: new Date().toISOString(),
        })
        .run();
    } catch (error) {
      logger.error(`Failed to record ${action} for project ${projectId}`, getErrorMessage(error));
    }
  }

  /**
   * Get the newest entries for a project.
   */
  listRecent(projectId: string, limit: number = 50): AuditLogEntry[] {
    return this.db
      .select()
      .from(schema.activityLog)
      .where(eq(schema.activityLog.projectId, projectId))
      .orderBy(desc(schema.activityLog.createdAt), desc(schema.activityLog.id))
      .limit(limit)
      .all();
  }
}
