/**
 * Contractor registry: per-project subcontractor records.
 */

import { ContractorRepo } from "../site-db/contractor-repo.js";
import type { AuditSink } from "../site-db/audit-log-repo.js";
import type { ContractorRow } from "../site-db/schema.js";
import { AUDIT_ACTION } from "../config/site.js";
import { DuplicateNameError, NotFoundError, isUniqueViolation } from "./errors.js";
import { contractorNameKey, normalizeContractorFields, type ContractorInput } from "./fields.js";
import { decodeContacts, encodeContacts } from "./contractor-contacts.js";
import { buildLookupMapsFromRows, type ContractorLookupMaps } from "./contractor-resolution.js";
import type { Contractor, ContractorFields, RequestContext } from "./types.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("CONTRACTORS");

function toContractor(row: ContractorRow): Contractor {
  return {
    id: row.id,
    projectId: row.projectId,
    name: row.name,
    trade: row.trade,
    status: row.status,
    contacts: decodeContacts(row),
    createdBy: row.createdBy,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

function toColumns(fields: ContractorFields) {
  return {
    name: fields.name,
    nameKey: contractorNameKey(fields.name),
    trade: fields.trade,
    status: fields.status,
    ...encodeContacts(fields.contacts),
  };
}

export class ContractorRegistry {
  constructor(
    private readonly repo: ContractorRepo,
    private readonly audit: AuditSink
  ) {}

  /**
   * All contractors of the project: Active, Standby, Delayed, Complete,
   * Offsite, then unknown statuses; name order within each.
   */
  listContractors(ctx: RequestContext): Contractor[] {
    return this.repo.listByProject(ctx.projectId).map(toContractor);
  }

  /**
   * Fresh lookup maps for resolving contractor ids. Never cached.
   */
  buildLookupMaps(ctx: RequestContext): ContractorLookupMaps {
    return buildLookupMapsFromRows(this.repo.listByProject(ctx.projectId));
  }

  getContractor(ctx: RequestContext, contractorId: number): Contractor {
    const row = this.repo.getInProject(contractorId, ctx.projectId);
    if (!row) {
      throw new NotFoundError("Contractor", contractorId);
    }
    return toContractor(row);
  }

  addContractor(ctx: RequestContext, input: ContractorInput): Contractor {
    const fields = normalizeContractorFields(input);
    this.assertNameFree(ctx, fields.name);

    const now = new Date().toISOString();
    const row = this.writeOrReportDuplicate(fields.name, () =>
      this.repo.insert({
        projectId: ctx.projectId,
        ...toColumns(fields),
        createdBy: ctx.actorId,
        createdAt: now,
        updatedAt: now,
      })
    );

    logger.info(`Added contractor ${row.id} "${row.name}" (${row.trade}) to ${ctx.projectId}`);
    this.audit.record(ctx.projectId, ctx.actorId, AUDIT_ACTION.ADD_CONTRACTOR, `Added contractor: ${row.name}`);
    return toContractor(row);
  }

  /**
   * Replace every writable field. A contractor may keep its own name.
   */
  updateContractor(ctx: RequestContext, contractorId: number, input: ContractorInput): Contractor {
    const fields = normalizeContractorFields(input);
    const existing = this.getContractor(ctx, contractorId);
    this.assertNameFree(ctx, fields.name, existing.id);

    const row = this.writeOrReportDuplicate(fields.name, () =>
      this.repo.replace(existing.id, { ...toColumns(fields), updatedAt: new Date().toISOString() })
    );
    if (!row) {
      throw new NotFoundError("Contractor", contractorId);
    }

    this.audit.record(ctx.projectId, ctx.actorId, AUDIT_ACTION.UPDATE_CONTRACTOR, `Updated contractor: ${row.name}`);
    return toContractor(row);
  }

  /**
   * Remove a contractor. Activities keep the id; resolution skips it.
   *
   * @returns The record as it was before deletion
   */
  deleteContractor(ctx: RequestContext, contractorId: number): Contractor {
    const existing = this.getContractor(ctx, contractorId);
    this.repo.delete(existing.id);

    this.audit.record(ctx.projectId, ctx.actorId, AUDIT_ACTION.DELETE_CONTRACTOR, `Deleted contractor: ${existing.name}`);
    return existing;
  }

  /**
   * Distinct names of contractors currently Active.
   */
  countActiveContractors(ctx: RequestContext): number {
    return this.repo.countActive(ctx.projectId);
  }

  private assertNameFree(ctx: RequestContext, name: string, ownId?: number): void {
    const clash = this.repo.findByNameKey(ctx.projectId, contractorNameKey(name));
    if (clash && clash.id !== ownId) {
      throw new DuplicateNameError(name);
    }
  }

  /** A concurrent writer can take the name between the check and the write */
  private writeOrReportDuplicate<T>(name: string, write: () => T): T {
    try {
      return write();
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateNameError(name);
      }
      throw error;
    }
  }
}
