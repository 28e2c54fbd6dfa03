/**
 * Briefing store: one briefing per project per calendar date.
 */

import { BriefingRepo, type BriefingContent } from "../site-db/briefing-repo.js";
import type { AuditSink } from "../site-db/audit-log-repo.js";
import { AUDIT_ACTION, DEFAULT_SAFETY_INFO } from "../config/site.js";
import { formatUkDate } from "./calendar.js";
import { StorageError } from "./errors.js";
import type { Briefing, RequestContext } from "./types.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("BRIEFINGS");

/**
 * Content of a new briefing. Non-empty safety info and notes are carried
 * over from `seed` when one is given.
 */
export function defaultBriefingContent(date: string, seed?: BriefingContent): BriefingContent {
  const day = formatUkDate(date);
  return {
    overview: `Daily briefing for ${day}`,
    safetyInfo: seed?.safetyInfo || DEFAULT_SAFETY_INFO,
    notes: seed?.notes || `Daily briefing notes for ${day}`,
  };
}

export class BriefingStore {
  constructor(
    private readonly repo: BriefingRepo,
    private readonly audit: AuditSink
  ) {}

  /**
   * Return the briefing for the date, creating a draft if there is none.
   * A new draft gets the default content, seeded from `seed` if given; an
   * existing briefing is returned unchanged.
   *
   * The insert is conflict-tolerant, so racing callers share one row and
   * only the caller that created it writes the audit entry.
   */
  getOrCreateBriefing(ctx: RequestContext, date: string, seed?: BriefingContent): Briefing {
    const created = this.repo.insertIfAbsent(ctx.projectId, date, ctx.actorId, defaultBriefingContent(date, seed));

    const briefing = this.repo.findByDate(ctx.projectId, date);
    if (!briefing) {
      throw new StorageError(`Briefing for ${date} missing after insert`);
    }

    if (created) {
      logger.info(`Created briefing ${briefing.id} for ${ctx.projectId} on ${date}`);
      this.audit.record(ctx.projectId, ctx.actorId, AUDIT_ACTION.CREATE_BRIEFING, `Created briefing for ${date}`);
    }
    return briefing;
  }

  /** Read-only lookup; never creates */
  findBriefing(ctx: RequestContext, date: string): Briefing | undefined {
    return this.repo.findByDate(ctx.projectId, date);
  }

  /** Latest briefing strictly before the date */
  findPreviousBriefing(ctx: RequestContext, date: string): Briefing | undefined {
    return this.repo.findLatestBefore(ctx.projectId, date);
  }

  /** Briefing by ID within the caller's project */
  getBriefingById(ctx: RequestContext, briefingId: number): Briefing | undefined {
    return this.repo.getInProject(briefingId, ctx.projectId);
  }

  /** Briefings dated within [startDate, endDate] */
  listBriefingsInRange(ctx: RequestContext, startDate: string, endDate: string): Briefing[] {
    return this.repo.listInRange(ctx.projectId, startDate, endDate);
  }
}
