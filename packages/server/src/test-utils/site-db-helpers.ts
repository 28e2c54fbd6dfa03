/**
 * Site database test helpers.
 *
 * Provides isolated database instances and fixture generators for testing.
 */

import type Database from "better-sqlite3";
import { mkdtempSync, rmSync, existsSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { openSiteDatabase, type SiteDb } from "../site-db/index.js";
import * as schema from "../site-db/schema.js";
import { BRIEFING_STATUS } from "../config/site.js";
import type { RequestContext } from "../engine/types.js";
import { contractorNameKey } from "../engine/fields.js";

export interface TestDbContext {
  db: SiteDb;
  sqlite: Database.Database;
  dbPath: string;
  tempDir: string;
  close: () => void;
}

/**
 * Create an isolated test database with the production DDL.
 * Returns a context with database, path, and cleanup function.
 */
export function createTestDb(): TestDbContext {
  const tempDir = mkdtempSync(join(tmpdir(), "site-briefing-test-"));
  const dbPath = join(tempDir, "briefing.db");
  const { db, sqlite } = openSiteDatabase(dbPath);

  return {
    db,
    sqlite,
    dbPath,
    tempDir,
    close: () => {
      sqlite.close();
      if (existsSync(tempDir)) {
        rmSync(tempDir, { recursive: true });
      }
    },
  };
}

/**
 * Clear all tables in the test database.
 */
export function clearAllTables(sqlite: Database.Database): void {
  sqlite.exec(`
    DELETE FROM activity_log;
    DELETE FROM activities;
    DELETE FROM briefings;
    DELETE FROM contractors;
  `);
}

/**
 * Request context for a test project.
 */
export function createTestContext(overrides: Partial<RequestContext> = {}): RequestContext {
  return {
    projectId: "project-alpha",
    actorId: "user-1",
    ...overrides,
  };
}

/**
 * Fixture factory for briefing rows.
 */
export function createBriefingFixture(
  projectId: string,
  date: string,
  overrides: Partial<schema.NewBriefing> = {}
): schema.NewBriefing {
  return {
    projectId,
    date,
    status: BRIEFING_STATUS.DRAFT,
    createdBy: "user-1",
    lastUpdated: new Date().toISOString(),
    ...overrides,
  };
}

/**
 * Fixture factory for contractor rows.
 */
export function createContractorFixture(
  projectId: string,
  overrides: Partial<schema.NewContractorRow> = {}
): schema.NewContractorRow {
  const now = new Date().toISOString();
  const name = overrides.name ?? "Acme Electrical";
  return {
    projectId,
    name,
    nameKey: contractorNameKey(name),
    trade: "Electrical",
    status: "Active",
    contactName: "",
    phone: "",
    email: "",
    createdBy: "user-1",
    createdAt: now,
    updatedAt: now,
    ...overrides,
  };
}

/**
 * Fixture factory for activity rows.
 */
export function createActivityFixture(
  briefing: Pick<schema.Briefing, "id" | "date">,
  overrides: Partial<schema.NewActivityRow> = {}
): schema.NewActivityRow {
  const now = new Date().toISOString();
  return {
    briefingId: briefing.id,
    date: briefing.date,
    time: "08:00",
    title: "Install cable tray",
    description: "",
    area: "Level 1",
    priority: "medium",
    laborCount: 2,
    contractors: null,
    assignedTo: "",
    createdAt: now,
    updatedAt: now,
    ...overrides,
  };
}

function firstRow<T>(rows: T[], table: string): T {
  const [row] = rows;
  if (!row) {
    throw new Error(`Insert into ${table} returned no row`);
  }
  return row;
}

/**
 * Insert a briefing and return it with generated ID.
 */
export function insertBriefing(
  db: SiteDb,
  projectId: string,
  date: string,
  overrides: Partial<schema.NewBriefing> = {}
): schema.Briefing {
  const rows = db.insert(schema.briefings).values(createBriefingFixture(projectId, date, overrides)).returning().all();
  return firstRow(rows, "briefings");
}

/**
 * Insert a contractor and return it with generated ID.
 */
export function insertContractor(
  db: SiteDb,
  projectId: string,
  overrides: Partial<schema.NewContractorRow> = {}
): schema.ContractorRow {
  const rows = db.insert(schema.contractors).values(createContractorFixture(projectId, overrides)).returning().all();
  return firstRow(rows, "contractors");
}

/**
 * Insert an activity and return it with generated ID.
 */
export function insertActivity(
  db: SiteDb,
  briefing: Pick<schema.Briefing, "id" | "date">,
  overrides: Partial<schema.NewActivityRow> = {}
): schema.ActivityRow {
  const rows = db.insert(schema.activities).values(createActivityFixture(briefing, overrides)).returning().all();
  return firstRow(rows, "activities");
}

/**
 * Get table row counts for verification.
 */
export function getTableCounts(db: SiteDb): {
  briefings: number;
  activities: number;
  contractors: number;
  activityLog: number;
} {
  return {
    briefings: db.select().from(schema.briefings).all().length,
    activities: db.select().from(schema.activities).all().length,
    contractors: db.select().from(schema.contractors).all().length,
    activityLog: db.select().from(schema.activityLog).all().length,
  };
}
