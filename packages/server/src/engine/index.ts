/**
 * Engine wiring: repositories and services over one database handle.
 */

import { getSiteDb, type SiteDb } from "../site-db/index.js";
import { ActivityRepo } from "../site-db/activity-repo.js";
import { BriefingRepo } from "../site-db/briefing-repo.js";
import { ContractorRepo } from "../site-db/contractor-repo.js";
import { AuditLogRepo, type AuditSink } from "../site-db/audit-log-repo.js";
import { ActivityStore } from "./activity-store.js";
import { BriefingStore } from "./briefing-store.js";
import { ContractorRegistry } from "./contractor-registry.js";
import { DayCopyOperator } from "./day-copy.js";
import { StatisticsAggregator } from "./statistics.js";

export interface Engine {
  contractors: ContractorRegistry;
  briefings: BriefingStore;
  activities: ActivityStore;
  statistics: StatisticsAggregator;
  dayCopy: DayCopyOperator;
}

/**
 * Build the engine. Audit entries go to the activity_log table unless
 * another sink is given.
 */
export function createEngine(db: SiteDb = getSiteDb(), audit: AuditSink = new AuditLogRepo(db)): Engine {
  const activityRepo = new ActivityRepo(db);

  const contractors = new ContractorRegistry(new ContractorRepo(db), audit);
  const briefings = new BriefingStore(new BriefingRepo(db), audit);
  const activities = new ActivityStore(activityRepo, briefings, contractors, audit);

  return {
    contractors,
    briefings,
    activities,
    statistics: new StatisticsAggregator(activityRepo, briefings, contractors),
    dayCopy: new DayCopyOperator(activityRepo, briefings, audit),
  };
}

export * from "./errors.js";
export { runOperation, toEngineError, type OperationResult } from "./operation.js";
export type * from "./types.js";
export type { ActivityInput, ContractorInput } from "./fields.js";
export type { ContractorLookupMaps } from "./contractor-resolution.js";
export type { CopyDayResult } from "./day-copy.js";
export type { DeleteActivityResult } from "./activity-store.js";
export type * from "./statistics.js";
