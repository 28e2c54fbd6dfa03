/**
 * Repository for the per-project contractor registry.
 */

import { eq, and, asc, sql } from "drizzle-orm";
import { getSiteDb, schema, type SiteDb } from "./index.js";
import type { ContractorRow, NewContractorRow } from "./schema.js";
import { CONTRACTOR_STATUSES, DEFAULT_CONTRACTOR_STATUS } from "../config/site.js";

/** Writable columns (everything but the surrogate key) */
export type ContractorValues = Omit<NewContractorRow, "id">;

/** Active, Standby, Delayed, Complete, Offsite, then anything else */
const statusRank = sql<number>`CASE ${schema.contractors.status}
  ${sql.join(
    CONTRACTOR_STATUSES.map((status, index) => sql`WHEN ${status} THEN ${index + 1}`),
    sql` `
  )}
  ELSE ${CONTRACTOR_STATUSES.length + 1} END`;

/**
 * Repository for managing contractors in the site database.
 */
export class ContractorRepo {
  constructor(private readonly db: SiteDb = getSiteDb()) {}

  /**
   * Get all contractors of a project, status order then name.
   * The name column collates NOCASE, so the name order ignores case.
   */
  listByProject(projectId: string): ContractorRow[] {
    return this.db
      .select()
      .from(schema.contractors)
      .where(eq(schema.contractors.projectId, projectId))
      .orderBy(asc(statusRank), asc(schema.contractors.name), asc(schema.contractors.id))
      .all();
  }

  /**
   * Get a contractor by ID, only if it belongs to the project.
   */
  getInProject(contractorId: number, projectId: string): ContractorRow | undefined {
    return this.db
      .select()
      .from(schema.contractors)
      .where(and(eq(schema.contractors.id, contractorId), eq(schema.contractors.projectId, projectId)))
      .get();
  }

  /**
   * Find a contractor by its name key (see `contractorNameKey`).
   */
  findByNameKey(projectId: string, nameKey: string): ContractorRow | undefined {
    return this.db
      .select()
      .from(schema.contractors)
      .where(and(eq(schema.contractors.projectId, projectId), eq(schema.contractors.nameKey, nameKey)))
      .get();
  }

  /**
   * Insert a contractor and return the stored row.
   * Throws the driver's constraint error if the name is taken.
   */
  insert(values: ContractorValues): ContractorRow {
    const [row] = this.db.insert(schema.contractors).values(values).returning().all();
    if (!row) {
      throw new Error("Contractor insert returned no row");
    }
    return row;
  }

  /**
   * Overwrite a contractor's writable fields.
   *
   * @returns The stored row, or undefined if the contractor no longer exists
   */
  replace(
    contractorId: number,
    values: Pick<ContractorValues, "name" | "nameKey" | "trade" | "status" | "contactName" | "phone" | "email" | "updatedAt">
  ): ContractorRow | undefined {
    const [row] = this.db
      .update(schema.contractors)
      .set(values)
      .where(eq(schema.contractors.id, contractorId))
      .returning()
      .all();
    return row;
  }

  /**
   * Delete a contractor by ID.
   *
   * @returns Number of rows removed
   */
  delete(contractorId: number): number {
    return this.db.delete(schema.contractors).where(eq(schema.contractors.id, contractorId)).run().changes;
  }

  /**
   * Count distinct contractor names with Active status.
   * Name keys are unique, so this is the number of Active rows.
   */
  countActive(projectId: string): number {
    const result = this.db
      .select({ count: sql<number>`COUNT(DISTINCT ${schema.contractors.nameKey})`.mapWith(Number) })
      .from(schema.contractors)
      .where(
        and(
          eq(schema.contractors.projectId, projectId),
          eq(schema.contractors.status, DEFAULT_CONTRACTOR_STATUS)
        )
      )
      .get();
    return result?.count ?? 0;
  }
}
