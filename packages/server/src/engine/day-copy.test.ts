/**
 * Day-Copy Operator Tests
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach, vi } from "vitest";
import {
  createTestDb,
  clearAllTables,
  createTestContext,
  getTableCounts,
  insertActivity,
  insertBriefing,
  insertContractor,
  type TestDbContext,
} from "../test-utils/site-db-helpers.js";
import { createEngine, type Engine } from "./index.js";
import { DayCopyOperator } from "./day-copy.js";
import { NoSourceDataError, NothingToCopyError, TargetNotEmptyError, ValidationError } from "./errors.js";
import { ActivityRepo, type ActivityValues } from "../site-db/activity-repo.js";
import { AuditLogRepo } from "../site-db/audit-log-repo.js";
import type { ActivityRow } from "../site-db/schema.js";

/** Fails the nth insert */
class FailingActivityRepo extends ActivityRepo {
  private inserts = 0;

  constructor(
    db: TestDbContext["db"],
    private readonly failOn: number
  ) {
    super(db);
  }

  override insert(values: ActivityValues): ActivityRow {
    this.inserts++;
    if (this.inserts === this.failOn) {
      throw new Error("disk I/O error");
    }
    return super.insert(values);
  }
}

describe("DayCopyOperator", () => {
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

  it("copies every activity into the target date", () => {
    const acme = insertContractor(db.db, ctx.projectId, { name: "Acme Electrical" });
    const source = insertBriefing(db.db, ctx.projectId, "2025-06-23");
    insertActivity(db.db, source, { title: "Cable pulling", contractors: `[${acme.id},999]`, laborCount: 4 });
    insertActivity(db.db, source, { title: "Conduit", contractors: "4, 7", laborCount: 2, priority: "high" });

    const result = engine.dayCopy.copyDay(ctx, "2025-06-23", "2025-06-24");

    expect(result).toMatchObject({ sourceDate: "2025-06-23", targetDate: "2025-06-24", copiedCount: 2, failedCount: 0 });
    const copied = new ActivityRepo(db.db).listByBriefing(result.targetBriefingId);
    expect(copied.map((row) => [row.title, row.date, row.laborCount, row.priority, row.contractors])).toEqual([
      ["Cable pulling", "2025-06-24", 4, "medium", `[${acme.id},999]`],
      ["Conduit", "2025-06-24", 2, "high", "4, 7"],
    ]);
    expect(audit.listRecent(ctx.projectId, 1).map((entry) => [entry.action, entry.details])).toEqual([
      ["copy_activities", "Copied 2 activities from 2025-06-23 to 2025-06-24 by user-1"],
    ]);
  });

  it("carries the source's safety info and notes into a new target briefing", () => {
    const source = insertBriefing(db.db, ctx.projectId, "2025-06-23", {
      safetyInfo: "Crane lift in bay 3: exclusion zone",
      notes: "Deliveries via north gate",
    });
    insertActivity(db.db, source);

    engine.dayCopy.copyDay(ctx, "2025-06-23", "2025-06-24");

    expect(engine.briefings.findBriefing(ctx, "2025-06-24")).toMatchObject({
      overview: "Daily briefing for 24/06/2025",
      safetyInfo: "Crane lift in bay 3: exclusion zone",
      notes: "Deliveries via north gate",
    });
  });

  it("keeps an existing empty target briefing's content", () => {
    const source = insertBriefing(db.db, ctx.projectId, "2025-06-23", { notes: "Deliveries via north gate" });
    insertActivity(db.db, source);
    insertBriefing(db.db, ctx.projectId, "2025-06-24", { notes: "Own notes" });

    engine.dayCopy.copyDay(ctx, "2025-06-23", "2025-06-24");

    expect(engine.briefings.findBriefing(ctx, "2025-06-24")?.notes).toBe("Own notes");
  });

  it("refuses a target that already has activities", () => {
    const source = insertBriefing(db.db, ctx.projectId, "2025-06-23");
    insertActivity(db.db, source);
    const target = insertBriefing(db.db, ctx.projectId, "2025-06-24");
    insertActivity(db.db, target, { title: "Already planned" });

    expect(() => engine.dayCopy.copyDay(ctx, "2025-06-23", "2025-06-24")).toThrow(TargetNotEmptyError);
    expect(new ActivityRepo(db.db).countByBriefing(target.id)).toBe(1);
  });

  it("fails without a source briefing and leaves the target alone", () => {
    expect(() => engine.dayCopy.copyDay(ctx, "2025-06-23", "2025-06-24")).toThrow(NoSourceDataError);
    expect(engine.briefings.findBriefing(ctx, "2025-06-24")).toBeUndefined();
  });

  it("fails on an empty source after creating the target briefing", () => {
    insertBriefing(db.db, ctx.projectId, "2025-06-23");

    expect(() => engine.dayCopy.copyDay(ctx, "2025-06-23", "2025-06-24")).toThrow(NothingToCopyError);
    expect(engine.briefings.findBriefing(ctx, "2025-06-24")?.status).toBe("draft");
    expect(getTableCounts(db.db).activities).toBe(0);
  });

  it("rejects copying a date onto itself", () => {
    expect(() => engine.dayCopy.copyDay(ctx, "2025-06-23", "2025-06-23")).toThrow(ValidationError);
  });

  it("does not read another project's source", () => {
    const foreign = insertBriefing(db.db, "project-beta", "2025-06-23");
    insertActivity(db.db, foreign);

    expect(() => engine.dayCopy.copyDay(ctx, "2025-06-23", "2025-06-24")).toThrow(NoSourceDataError);
  });

  it("keeps earlier copies when a later insert fails", () => {
    const consoleError = vi.spyOn(console, "error").mockImplementation(() => {});
    try {
      const source = insertBriefing(db.db, ctx.projectId, "2025-06-23");
      insertActivity(db.db, source, { title: "First" });
      insertActivity(db.db, source, { title: "Second" });
      insertActivity(db.db, source, { title: "Third" });

      const operator = new DayCopyOperator(new FailingActivityRepo(db.db, 2), engine.briefings, audit);
      const result = operator.copyDay(ctx, "2025-06-23", "2025-06-24");

      expect(result.copiedCount).toBe(2);
      expect(result.failedCount).toBe(1);
      const titles = new ActivityRepo(db.db).listByBriefing(result.targetBriefingId).map((row) => row.title);
      expect(titles).toEqual(["First", "Third"]);
      expect(consoleError).toHaveBeenCalledTimes(1);
    } finally {
      consoleError.mockRestore();
    }
  });
});
