/**
 * Day-copy operator: duplicates one date's activities into another date.
 *
 * Phases: idle -> source_validated -> target_validated -> copying -> done,
 * or rejected at any check. Copy never merges into a target that already
 * has activities.
 */

import type { ActivityRepo } from "../site-db/activity-repo.js";
import type { AuditSink } from "../site-db/audit-log-repo.js";
import { AUDIT_ACTION } from "../config/site.js";
import {
  EngineError,
  NoSourceDataError,
  NothingToCopyError,
  TargetNotEmptyError,
  ValidationError,
} from "./errors.js";
import type { BriefingStore } from "./briefing-store.js";
import type { RequestContext } from "./types.js";
import { createLogger } from "../utils/logger.js";
import { getErrorMessage } from "../utils/errors.js";

const logger = createLogger("COPY");

export type CopyPhase = "idle" | "source_validated" | "target_validated" | "copying" | "done" | "rejected";

export interface CopyDayResult {
  sourceDate: string;
  targetDate: string;
  targetBriefingId: number;
  /** Activities inserted */
  copiedCount: number;
  /** Inserts that failed; already-copied rows are kept */
  failedCount: number;
}

export class DayCopyOperator {
  constructor(
    private readonly activities: ActivityRepo,
    private readonly briefings: BriefingStore,
    private readonly audit: AuditSink
  ) {}

  /**
   * Copy every activity of sourceDate into targetDate's briefing.
   *
   * The target briefing is created before the source's activity count is
   * checked, so a NothingToCopyError can leave an empty target briefing.
   */
  copyDay(ctx: RequestContext, sourceDate: string, targetDate: string): CopyDayResult {
    let phase: CopyPhase = "idle";
    const advance = (next: CopyPhase): void => {
      logger.debug(`${sourceDate} -> ${targetDate}: ${phase} -> ${next}`);
      phase = next;
    };

    try {
      if (sourceDate === targetDate) {
        throw new ValidationError("Source and target dates must differ");
      }

      const source = this.briefings.findBriefing(ctx, sourceDate);
      if (!source) {
        throw new NoSourceDataError(sourceDate);
      }
      advance("source_validated");

      // A new target carries the source's safety info and notes
      const target = this.briefings.getOrCreateBriefing(ctx, targetDate, source);
      const existing = this.activities.countByBriefing(target.id);
      if (existing > 0) {
        throw new TargetNotEmptyError(targetDate, existing);
      }
      advance("target_validated");

      const sourceRows = this.activities.listByBriefing(source.id);
      if (sourceRows.length === 0) {
        throw new NothingToCopyError(sourceDate);
      }
      advance("copying");

      let copiedCount = 0;
      let failedCount = 0;
      for (const row of sourceRows) {
        const now = new Date().toISOString();
        try {
          this.activities.insert({
            briefingId: target.id,
            date: target.date,
            time: row.time,
            title: row.title,
            description: row.description,
            area: row.area,
            priority: row.priority,
            laborCount: row.laborCount,
            contractors: row.contractors, // copied verbatim, already filtered on write
            assignedTo: row.assignedTo,
            createdAt: now,
            updatedAt: now,
          });
          copiedCount++;
        } catch (error) {
          failedCount++;
          logger.error(`Failed to copy activity ${row.id} to ${targetDate}`, getErrorMessage(error));
        }
      }
      advance("done");

      this.audit.record(
        ctx.projectId,
        ctx.actorId,
        AUDIT_ACTION.COPY_ACTIVITIES,
        `Copied ${copiedCount} activities from ${sourceDate} to ${targetDate} by ${ctx.actorId}`
      );
      logger.info(`Copied ${copiedCount}/${sourceRows.length} activities ${sourceDate} -> ${targetDate} (${ctx.projectId})`);

      return { sourceDate, targetDate, targetBriefingId: target.id, copiedCount, failedCount };
    } catch (error) {
      if (error instanceof EngineError) {
        advance("rejected");
      }
      throw error;
    }
  }
}
