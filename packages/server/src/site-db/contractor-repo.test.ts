/**
 * ContractorRepo Tests
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach } from "vitest";
import { createTestDb, clearAllTables, createContractorFixture, insertContractor, type TestDbContext } from "../test-utils/site-db-helpers.js";
import { ContractorRepo } from "./contractor-repo.js";
import { isUniqueViolation } from "../engine/errors.js";

describe("ContractorRepo", () => {
  let db: TestDbContext;
  let repo: ContractorRepo;

  beforeAll(() => {
    db = createTestDb();
    repo = new ContractorRepo(db.db);
  });

  afterAll(() => {
    db.close();
  });

  beforeEach(() => {
    clearAllTables(db.sqlite);
  });

  describe("listByProject", () => {
    it("orders by status, then name ignoring case", () => {
      insertContractor(db.db, "project-alpha", { name: "zeta Steel", status: "Active" });
      insertContractor(db.db, "project-alpha", { name: "Alpha Roofing", status: "Offsite" });
      insertContractor(db.db, "project-alpha", { name: "beta Plumbing", status: "Standby" });
      insertContractor(db.db, "project-alpha", { name: "Acme Electrical", status: "Active" });
      insertContractor(db.db, "project-beta", { name: "Other Co" });

      const names = repo.listByProject("project-alpha").map((row) => row.name);

      expect(names).toEqual(["Acme Electrical", "zeta Steel", "beta Plumbing", "Alpha Roofing"]);
    });

    it("sorts unknown statuses last", () => {
      insertContractor(db.db, "project-alpha", { name: "Legacy", status: "Retired" });
      insertContractor(db.db, "project-alpha", { name: "Current", status: "Complete" });

      expect(repo.listByProject("project-alpha").map((row) => row.name)).toEqual(["Current", "Legacy"]);
    });
  });

  describe("findByNameKey", () => {
    it("matches the key within the project", () => {
      const row = insertContractor(db.db, "project-alpha", { name: "Acme Electrical" });

      expect(repo.findByNameKey("project-alpha", "acme electrical")?.id).toBe(row.id);
      expect(repo.findByNameKey("project-beta", "acme electrical")).toBeUndefined();
    });
  });

  describe("insert", () => {
    it("rejects a name already used in the project, ignoring case", () => {
      insertContractor(db.db, "project-alpha", { name: "Acme Electrical" });

      let caught: unknown;
      try {
        repo.insert(createContractorFixture("project-alpha", { name: "acme electrical" }));
      } catch (error) {
        caught = error;
      }
      expect(isUniqueViolation(caught)).toBe(true);
    });

    it("rejects a name whose key is taken, beyond ASCII case", () => {
      insertContractor(db.db, "project-alpha", { name: "Élan Électrique" });

      let caught: unknown;
      try {
        repo.insert(createContractorFixture("project-alpha", { name: "ÉLAN ÉLECTRIQUE" }));
      } catch (error) {
        caught = error;
      }
      expect(isUniqueViolation(caught)).toBe(true);
    });

    it("allows the same name in another project", () => {
      insertContractor(db.db, "project-alpha", { name: "Acme Electrical" });

      const row = repo.insert(createContractorFixture("project-beta", { name: "Acme Electrical" }));

      expect(row.projectId).toBe("project-beta");
    });
  });

  describe("getInProject", () => {
    it("hides contractors of other projects", () => {
      const row = insertContractor(db.db, "project-beta");

      expect(repo.getInProject(row.id, "project-alpha")).toBeUndefined();
      expect(repo.getInProject(row.id, "project-beta")?.name).toBe("Acme Electrical");
    });
  });

  describe("replace and delete", () => {
    it("returns undefined when replacing a missing row", () => {
      const result = repo.replace(9999, {
        name: "Ghost",
        nameKey: "ghost",
        trade: "None",
        status: "Active",
        contactName: "",
        phone: "",
        email: "",
        updatedAt: new Date().toISOString(),
      });

      expect(result).toBeUndefined();
    });

    it("reports the number of deleted rows", () => {
      const row = insertContractor(db.db, "project-alpha");

      expect(repo.delete(row.id)).toBe(1);
      expect(repo.delete(row.id)).toBe(0);
    });
  });

  describe("countActive", () => {
    it("counts active contractors of the project only", () => {
      insertContractor(db.db, "project-alpha", { name: "One", status: "Active" });
      insertContractor(db.db, "project-alpha", { name: "Two", status: "Active" });
      insertContractor(db.db, "project-alpha", { name: "Three", status: "Delayed" });
      insertContractor(db.db, "project-beta", { name: "Four", status: "Active" });

      expect(repo.countActive("project-alpha")).toBe(2);
      expect(repo.countActive("project-gamma")).toBe(0);
    });
  });
});
