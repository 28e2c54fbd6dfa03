/**
 * Activity store: scheduled tasks within a briefing.
 *
 * Every read resolves contractor ids through one set of lookup maps per call,
 * and every write filters ids against the project's registry first.
 */

import { ActivityRepo } from "../site-db/activity-repo.js";
import type { AuditSink } from "../site-db/audit-log-repo.js";
import type { ActivityRow } from "../site-db/schema.js";
import { AUDIT_ACTION, PRIORITIES } from "../config/site.js";
import { NotFoundError, ValidationError } from "./errors.js";
import { normalizeActivityFields, type ActivityInput } from "./fields.js";
import {
  parseContractorIds,
  serializeContractorIds,
  resolveActivities,
  resolveActivityContractors,
  type ContractorLookupMaps,
} from "./contractor-resolution.js";
import type { BriefingStore } from "./briefing-store.js";
import type { ContractorRegistry } from "./contractor-registry.js";
import type { Activity, ActivityFields, Briefing, RequestContext, ResolvedActivity } from "./types.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("ACTIVITIES");

export interface DeleteActivityResult {
  deleted: boolean;
  prior: ResolvedActivity;
}

/**
 * Map a stored row to the domain shape.
 */
export function toActivity(row: ActivityRow): Activity {
  return {
    id: row.id,
    briefingId: row.briefingId,
    date: row.date,
    time: row.time,
    title: row.title,
    description: row.description,
    area: row.area,
    priority: PRIORITIES.find((priority) => priority === row.priority) ?? null,
    laborCount: row.laborCount,
    contractorIds: parseContractorIds(row.contractors),
    assignedTo: row.assignedTo,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

/**
 * Keep only ids registered in the caller's project, in input order.
 */
function filterToProject(ids: readonly number[], maps: ContractorLookupMaps): number[] {
  return ids.filter((id) => maps.descriptorById.has(id));
}

export class ActivityStore {
  constructor(
    private readonly repo: ActivityRepo,
    private readonly briefings: BriefingStore,
    private readonly registry: ContractorRegistry,
    private readonly audit: AuditSink
  ) {}

  /**
   * Activities of a briefing: area, then priority (critical first), then title.
   * A briefing outside the project lists as empty.
   */
  listActivities(ctx: RequestContext, briefingId: number): ResolvedActivity[] {
    const briefing = this.briefings.getBriefingById(ctx, briefingId);
    if (!briefing) {
      return [];
    }
    const maps = this.registry.buildLookupMaps(ctx);
    return resolveActivities(this.repo.listByBriefing(briefing.id).map(toActivity), maps);
  }

  /** Activities for a date; empty when the date has no briefing */
  listActivitiesForDate(ctx: RequestContext, date: string): ResolvedActivity[] {
    const briefing = this.briefings.findBriefing(ctx, date);
    return briefing ? this.listActivities(ctx, briefing.id) : [];
  }

  getActivity(ctx: RequestContext, activityId: number): ResolvedActivity {
    const activity = this.requireActivity(ctx, activityId);
    const maps = this.registry.buildLookupMaps(ctx);
    return { ...activity, contractors: resolveActivityContractors(activity, maps) };
  }

  addActivity(ctx: RequestContext, briefingId: number, input: ActivityInput): ResolvedActivity {
    const fields = normalizeActivityFields(input);
    const briefing = this.requireBriefing(ctx, briefingId);
    return this.insertActivity(ctx, briefing, fields);
  }

  /** Add to the date's briefing, creating the briefing if needed */
  addActivityForDate(ctx: RequestContext, date: string, input: ActivityInput): ResolvedActivity {
    const fields = normalizeActivityFields(input);
    const briefing = this.briefings.getOrCreateBriefing(ctx, date);
    return this.insertActivity(ctx, briefing, fields);
  }

  /**
   * Replace every field of an activity. Passing `briefingId` moves it to
   * that briefing, and its date follows.
   */
  updateActivity(
    ctx: RequestContext,
    activityId: number,
    input: ActivityInput,
    briefingId?: number
  ): ResolvedActivity {
    const fields = normalizeActivityFields(input);
    const existing = this.requireActivity(ctx, activityId);
    const briefing = this.requireBriefing(ctx, briefingId ?? existing.briefingId);

    const maps = this.registry.buildLookupMaps(ctx);
    const contractorIds = filterToProject(fields.contractorIds, maps);

    const row = this.repo.replace(existing.id, {
      briefingId: briefing.id,
      date: briefing.date,
      ...this.toColumns(fields, contractorIds),
      updatedAt: new Date().toISOString(),
    });
    if (!row) {
      throw new NotFoundError("Activity", activityId);
    }

    this.audit.record(
      ctx.projectId,
      ctx.actorId,
      AUDIT_ACTION.UPDATE_ACTIVITY,
      `Updated activity: ${row.title} for ${briefing.date}`
    );

    const activity = toActivity(row);
    return { ...activity, contractors: resolveActivityContractors(activity, maps) };
  }

  /**
   * Remove an activity.
   *
   * @returns The record as it was before deletion
   */
  deleteActivity(ctx: RequestContext, activityId: number): DeleteActivityResult {
    const prior = this.getActivity(ctx, activityId);
    const deleted = this.repo.delete(prior.id) > 0;

    if (deleted) {
      this.audit.record(
        ctx.projectId,
        ctx.actorId,
        AUDIT_ACTION.DELETE_ACTIVITY,
        `Deleted activity: ${prior.title} for ${prior.date}`
      );
    }
    return { deleted, prior };
  }

  private insertActivity(ctx: RequestContext, briefing: Briefing, fields: ActivityFields): ResolvedActivity {
    const maps = this.registry.buildLookupMaps(ctx);
    const contractorIds = filterToProject(fields.contractorIds, maps);
    if (contractorIds.length < fields.contractorIds.length) {
      logger.debug(
        `Dropped ${fields.contractorIds.length - contractorIds.length} contractor id(s) not in ${ctx.projectId}`
      );
    }

    const now = new Date().toISOString();
    const row = this.repo.insert({
      briefingId: briefing.id,
      date: briefing.date,
      ...this.toColumns(fields, contractorIds),
      createdAt: now,
      updatedAt: now,
    });

    this.audit.record(
      ctx.projectId,
      ctx.actorId,
      AUDIT_ACTION.ADD_ACTIVITY,
      `Added activity: ${row.title} for ${briefing.date}`
    );

    const activity = toActivity(row);
    return { ...activity, contractors: resolveActivityContractors(activity, maps) };
  }

  private toColumns(fields: ActivityFields, contractorIds: readonly number[]) {
    return {
      time: fields.time,
      title: fields.title,
      description: fields.description,
      area: fields.area,
      priority: fields.priority,
      laborCount: fields.laborCount,
      contractors: serializeContractorIds(contractorIds),
      assignedTo: fields.assignedTo,
    };
  }

  private requireActivity(ctx: RequestContext, activityId: number): Activity {
    const row = this.repo.getInProject(activityId, ctx.projectId);
    if (!row) {
      throw new NotFoundError("Activity", activityId);
    }
    return toActivity(row);
  }

  private requireBriefing(ctx: RequestContext, briefingId: number): Briefing {
    const briefing = this.briefings.getBriefingById(ctx, briefingId);
    if (!briefing) {
      throw new ValidationError(`Briefing ${briefingId} does not belong to this project`);
    }
    return briefing;
  }
}
