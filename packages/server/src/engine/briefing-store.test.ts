/**
 * Briefing Store Tests
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach } from "vitest";
import {
  createTestDb,
  clearAllTables,
  createTestContext,
  getTableCounts,
  type TestDbContext,
} from "../test-utils/site-db-helpers.js";
import { createEngine, type Engine } from "./index.js";
import { AuditLogRepo } from "../site-db/audit-log-repo.js";
import { openSiteDatabase } from "../site-db/index.js";
import { DEFAULT_SAFETY_INFO } from "../config/site.js";

describe("BriefingStore", () => {
  let db: TestDbContext;
  let engine: Engine;
  let audit: AuditLogRepo;
  const ctx = createTestContext();

  beforeAll(() => {
    db = createTestDb();
    audit = new AuditLogRepo(db.db);
    engine = createEngine(db.db, audit);
  });

  afterAll(() => {
    db.close();
  });

  beforeEach(() => {
    clearAllTables(db.sqlite);
  });

  it("creates a draft once and returns it afterwards", () => {
    const first = engine.briefings.getOrCreateBriefing(ctx, "2025-06-23");
    const second = engine.briefings.getOrCreateBriefing(createTestContext({ actorId: "user-2" }), "2025-06-23");

    expect(second.id).toBe(first.id);
    expect(first).toMatchObject({ projectId: "project-alpha", date: "2025-06-23", status: "draft", createdBy: "user-1" });
    expect(getTableCounts(db.db).briefings).toBe(1);
  });

  it("fills a new briefing with the default content", () => {
    const briefing = engine.briefings.getOrCreateBriefing(ctx, "2025-06-23");

    expect(briefing).toMatchObject({
      overview: "Daily briefing for 23/06/2025",
      safetyInfo: DEFAULT_SAFETY_INFO,
      notes: "Daily briefing notes for 23/06/2025",
    });
  });

  it("seeds safety info and notes, keeping defaults for blank sections", () => {
    const seeded = engine.briefings.getOrCreateBriefing(ctx, "2025-06-24", {
      overview: "Monday overview",
      safetyInfo: "Crane lift in bay 3: exclusion zone",
      notes: "",
    });

    expect(seeded).toMatchObject({
      overview: "Daily briefing for 24/06/2025",
      safetyInfo: "Crane lift in bay 3: exclusion zone",
      notes: "Daily briefing notes for 24/06/2025",
    });
  });

  it("leaves an existing briefing's content alone when seeded", () => {
    const first = engine.briefings.getOrCreateBriefing(ctx, "2025-06-23");
    const again = engine.briefings.getOrCreateBriefing(ctx, "2025-06-23", {
      overview: "x",
      safetyInfo: "Other",
      notes: "Other",
    });

    expect(again.safetyInfo).toBe(first.safetyInfo);
    expect(again.notes).toBe("Daily briefing notes for 23/06/2025");
  });

  it("audits only the call that created the briefing", () => {
    engine.briefings.getOrCreateBriefing(ctx, "2025-06-23");
    engine.briefings.getOrCreateBriefing(ctx, "2025-06-23");

    const entries = audit.listRecent(ctx.projectId);
    expect(entries.map((entry) => [entry.action, entry.actorId, entry.details])).toEqual([
      ["create_briefing", "user-1", "Created briefing for 2025-06-23"],
    ]);
  });

  it("yields one briefing when two connections race on a date", () => {
    const second = openSiteDatabase(db.dbPath);
    try {
      const otherEngine = createEngine(second.db);

      const a = engine.briefings.getOrCreateBriefing(ctx, "2025-06-24");
      const b = otherEngine.briefings.getOrCreateBriefing(createTestContext({ actorId: "user-2" }), "2025-06-24");

      expect(b.id).toBe(a.id);
      expect(getTableCounts(db.db).briefings).toBe(1);
    } finally {
      second.sqlite.close();
    }
  });

  it("never creates on find", () => {
    expect(engine.briefings.findBriefing(ctx, "2025-06-23")).toBeUndefined();
    expect(engine.briefings.findBriefing(ctx, "2025-06-23")).toBeUndefined();
    expect(getTableCounts(db.db).briefings).toBe(0);
  });

  it("keeps projects apart", () => {
    const own = engine.briefings.getOrCreateBriefing(ctx, "2025-06-23");
    const other = engine.briefings.getOrCreateBriefing(createTestContext({ projectId: "project-beta" }), "2025-06-23");

    expect(other.id).not.toBe(own.id);
    expect(engine.briefings.getBriefingById(ctx, other.id)).toBeUndefined();
  });

  it("finds the previous briefing day", () => {
    engine.briefings.getOrCreateBriefing(ctx, "2025-06-19");
    engine.briefings.getOrCreateBriefing(ctx, "2025-06-23");

    expect(engine.briefings.findPreviousBriefing(ctx, "2025-06-23")?.date).toBe("2025-06-19");
    expect(engine.briefings.findPreviousBriefing(ctx, "2025-06-19")).toBeUndefined();
  });
});
