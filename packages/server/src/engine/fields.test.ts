import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import {
  contractorNameKey,
  dedupeIds,
  normalizeActivityFields,
  normalizeContractorFields,
  normalizeContractorStatus,
  normalizeDate,
  normalizeLaborCount,
  normalizePriority,
  normalizeTime,
} from "./fields.js";
import { ValidationError } from "./errors.js";

describe("default substitution", () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date("2025-06-30T23:30:00Z"));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("keeps ISO dates and converts DD/MM/YYYY", () => {
    expect(normalizeDate("2025-06-23")).toBe("2025-06-23");
    expect(normalizeDate(" 23/06/2025 ")).toBe("2025-06-23");
  });

  it("replaces unreadable dates with today in the site timezone", () => {
    expect(normalizeDate("31/02/2025", "Europe/London")).toBe("2025-07-01");
    expect(normalizeDate("next tuesday", "Europe/London")).toBe("2025-07-01");
    expect(normalizeDate(undefined, "UTC")).toBe("2025-06-30");
  });

  it("replaces dates before year 1000 with today", () => {
    expect(normalizeDate("0999-12-31", "UTC")).toBe("2025-06-30");
    expect(normalizeDate("9999-12-31", "UTC")).toBe("9999-12-31");
  });

  it("defaults unknown priorities to medium", () => {
    expect(normalizePriority("urgent")).toBe("medium");
    expect(normalizePriority(null)).toBe("medium");
    expect(normalizePriority("HIGH")).toBe("high");
    expect(normalizePriority("critical")).toBe("critical");
  });

  it("defaults unknown contractor statuses to Active", () => {
    expect(normalizeContractorStatus("Retired")).toBe("Active");
    expect(normalizeContractorStatus(undefined)).toBe("Active");
    expect(normalizeContractorStatus("Standby")).toBe("Standby");
  });

  it("defaults malformed times to 08:00", () => {
    expect(normalizeTime("07:30")).toBe("07:30");
    expect(normalizeTime("7:30")).toBe("08:00");
    expect(normalizeTime("24:00")).toBe("08:00");
    expect(normalizeTime(undefined)).toBe("08:00");
  });

  it("treats a missing labor count as zero and rejects bad counts", () => {
    expect(normalizeLaborCount(undefined)).toBe(0);
    expect(normalizeLaborCount(null)).toBe(0);
    expect(normalizeLaborCount(6)).toBe(6);
    expect(() => normalizeLaborCount(-1)).toThrow("Labor count cannot be negative");
    expect(() => normalizeLaborCount(2.5)).toThrow(ValidationError);
  });

  it("rejects labor counts beyond exact integer range", () => {
    expect(normalizeLaborCount(Number.MAX_SAFE_INTEGER)).toBe(Number.MAX_SAFE_INTEGER);
    expect(() => normalizeLaborCount(1e20)).toThrow("Labor count is too large");
  });

  it("de-duplicates ids in first-seen order", () => {
    expect(dedupeIds([3, 1, 3, 0, -2, 1.5, 2])).toEqual([3, 1, 2]);
  });
});

describe("normalizeActivityFields", () => {
  it("fills defaults around a title", () => {
    expect(normalizeActivityFields({ title: "  Pour slab  ", area: "   " })).toEqual({
      time: "08:00",
      title: "Pour slab",
      description: "",
      area: null,
      priority: "medium",
      laborCount: 0,
      contractorIds: [],
      assignedTo: "",
    });
  });

  it("requires a title", () => {
    expect(() => normalizeActivityFields({ title: "   " })).toThrow("Title is required");
    expect(() => normalizeActivityFields({})).toThrow(ValidationError);
  });
});

describe("normalizeContractorFields", () => {
  it("trims fields and defaults the status", () => {
    expect(normalizeContractorFields({ name: " Acme ", trade: "Electrical", status: "Gone" })).toEqual({
      name: "Acme",
      trade: "Electrical",
      status: "Active",
      contacts: [],
    });
  });

  it("reads a single contact from the flat fields", () => {
    expect(
      normalizeContractorFields({ name: "Acme", trade: "Electrical", contactName: " Sam ", phone: "01632 960000" })
        .contacts
    ).toEqual([{ name: "Sam", phone: "01632 960000", email: "" }]);
  });

  it("prefers the contacts list and drops blank entries", () => {
    const fields = normalizeContractorFields({
      name: "Acme",
      trade: "Electrical",
      contactName: "Ignored",
      contacts: [{ name: "Sam", email: "sam@example.com" }, { name: " ", phone: "" }, { phone: "01632 960002" }],
    });

    expect(fields.contacts).toEqual([
      { name: "Sam", phone: "", email: "sam@example.com" },
      { name: "", phone: "01632 960002", email: "" },
    ]);
  });

  it("requires a name and a trade", () => {
    expect(() => normalizeContractorFields({ name: "", trade: "Electrical" })).toThrow(
      "Contractor name is required"
    );
    expect(() => normalizeContractorFields({ name: "Acme", trade: " " })).toThrow("Trade is required");
  });
});

describe("contractorNameKey", () => {
  it("folds case beyond ASCII", () => {
    expect(contractorNameKey("Élan Électrique")).toBe(contractorNameKey("élan électrique"));
    expect(contractorNameKey(" ACME ")).toBe("acme");
  });

  it("matches decomposed and composed accents", () => {
    expect(contractorNameKey("E\u0301lan")).toBe(contractorNameKey("\u00c9lan"));
  });
});
