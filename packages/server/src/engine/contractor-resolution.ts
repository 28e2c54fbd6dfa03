/**
 * Contractor resolution: turns the id list stored on an activity into
 * contractor descriptors using per-request lookup maps.
 */

import type { ContractorRow } from "../site-db/schema.js";
import type { Activity, ContractorDescriptor, ResolvedActivity } from "./types.js";
import { UNNAMED_CONTRACTOR, UNKNOWN_TRADE } from "../config/site.js";
import { dedupeIds } from "./fields.js";
import { decodeContacts } from "./contractor-contacts.js";
import { logSilentError } from "../utils/logger.js";

export interface ContractorLookupMaps {
  nameById: Map<number, string>;
  tradeById: Map<number, string>;
  descriptorById: Map<number, ContractorDescriptor>;
}

/**
 * Build lookup maps from a project's contractor rows.
 * Blank names and trades read as display placeholders.
 */
export function buildLookupMapsFromRows(rows: readonly ContractorRow[]): ContractorLookupMaps {
  const maps: ContractorLookupMaps = {
    nameById: new Map(),
    tradeById: new Map(),
    descriptorById: new Map(),
  };

  for (const row of rows) {
    const name = row.name.trim() || UNNAMED_CONTRACTOR;
    const trade = row.trade.trim() || UNKNOWN_TRADE;
    maps.nameById.set(row.id, name);
    maps.tradeById.set(row.id, trade);
    maps.descriptorById.set(row.id, {
      id: row.id,
      name,
      trade,
      status: row.status,
      contacts: decodeContacts(row),
    });
  }

  return maps;
}

/**
 * Descriptors for an activity's contractors, in stored order.
 * Ids with no match (e.g. deleted contractors) are skipped.
 */
export function resolveActivityContractors(
  activity: Pick<Activity, "contractorIds">,
  maps: ContractorLookupMaps
): ContractorDescriptor[] {
  const descriptors: ContractorDescriptor[] = [];
  for (const id of activity.contractorIds) {
    const descriptor = maps.descriptorById.get(id);
    if (descriptor) {
      descriptors.push(descriptor);
    }
  }
  return descriptors;
}

/**
 * Resolve a batch of activities against one set of maps.
 */
export function resolveActivities(
  activities: readonly Activity[],
  maps: ContractorLookupMaps
): ResolvedActivity[] {
  return activities.map((activity) => ({
    ...activity,
    contractors: resolveActivityContractors(activity, maps),
  }));
}

function toIdList(values: readonly unknown[]): number[] {
  const ids: number[] = [];
  for (const value of values) {
    const id = typeof value === "string" ? Number(value.trim()) : value;
    if (typeof id === "number") {
      ids.push(id);
    }
  }
  return dedupeIds(ids);
}

/**
 * Decode the stored contractor list.
 * Reads a JSON array, or a legacy comma-joined list such as "4,7".
 * Anything else reads as no contractors.
 */
export function parseContractorIds(raw: string | null | undefined): number[] {
  const text = raw?.trim();
  if (!text) {
    return [];
  }

  if (text.startsWith("[")) {
    try {
      const parsed: unknown = JSON.parse(text);
      if (Array.isArray(parsed)) {
        return toIdList(parsed);
      }
    } catch (error) {
      logSilentError(`Malformed contractor list ${JSON.stringify(text)}`, error);
    }
    return [];
  }

  if (/^\d+(\s*,\s*\d+)*$/.test(text)) {
    return toIdList(text.split(","));
  }

  logSilentError("Unrecognised contractor list", JSON.stringify(text));
  return [];
}

/**
 * Encode a contractor list for storage; empty lists store as null.
 */
export function serializeContractorIds(ids: readonly number[]): string | null {
  return ids.length > 0 ? JSON.stringify(ids) : null;
}
