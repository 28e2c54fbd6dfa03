import { describe, it, expect } from "vitest";
import {
  buildLookupMapsFromRows,
  parseContractorIds,
  resolveActivities,
  resolveActivityContractors,
  serializeContractorIds,
} from "./contractor-resolution.js";
import type { ContractorRow } from "../site-db/schema.js";
import type { Activity } from "./types.js";
import { contractorNameKey } from "./fields.js";

function contractorRow(overrides: Partial<ContractorRow> & Pick<ContractorRow, "id" | "name">): ContractorRow {
  return {
    projectId: "project-alpha",
    nameKey: contractorNameKey(overrides.name),
    trade: "Electrical",
    status: "Active",
    contactName: "",
    phone: "",
    email: "",
    createdBy: "user-1",
    createdAt: "2025-06-01T08:00:00.000Z",
    updatedAt: "2025-06-01T08:00:00.000Z",
    ...overrides,
  };
}

function activity(id: number, contractorIds: number[]): Activity {
  return {
    id,
    briefingId: 1,
    date: "2025-06-23",
    time: "08:00",
    title: `Task ${id}`,
    description: "",
    area: null,
    priority: "medium",
    laborCount: 4,
    contractorIds,
    assignedTo: "",
    createdAt: "2025-06-23T08:00:00.000Z",
    updatedAt: "2025-06-23T08:00:00.000Z",
  };
}

describe("contractor id codec", () => {
  it("reads JSON arrays, keeping first occurrences", () => {
    expect(parseContractorIds("[1,2,2,3]")).toEqual([1, 2, 3]);
    expect(parseContractorIds('["4", 7]')).toEqual([4, 7]);
  });

  it("reads legacy comma-joined lists", () => {
    expect(parseContractorIds("4, 7")).toEqual([4, 7]);
    expect(parseContractorIds("12")).toEqual([12]);
  });

  it("reads malformed content as no contractors", () => {
    expect(parseContractorIds(null)).toEqual([]);
    expect(parseContractorIds("")).toEqual([]);
    expect(parseContractorIds("[1,")).toEqual([]);
    expect(parseContractorIds('{"id":1}')).toEqual([]);
    expect(parseContractorIds("Acme")).toEqual([]);
  });

  it("stores empty lists as null", () => {
    expect(serializeContractorIds([])).toBeNull();
    expect(serializeContractorIds([4, 7])).toBe("[4,7]");
  });
});

describe("resolution", () => {
  const maps = buildLookupMapsFromRows([
    contractorRow({ id: 1, name: "Acme Electrical" }),
    contractorRow({ id: 3, name: "Brick & Co", contactName: "Sam", phone: "01632 960001" }),
    contractorRow({ id: 2, name: "  ", trade: "" }),
  ]);

  it("skips ids with no contractor", () => {
    expect(resolveActivityContractors(activity(10, [1, 99]), maps)).toEqual([
      {
        id: 1,
        name: "Acme Electrical",
        trade: "Electrical",
        status: "Active",
        contacts: [],
      },
    ]);
  });

  it("exposes decoded contacts", () => {
    expect(resolveActivityContractors(activity(12, [3]), maps)[0]?.contacts).toEqual([
      { name: "Sam", phone: "01632 960001", email: "" },
    ]);
  });

  it("uses placeholders for blank names and trades", () => {
    expect(maps.nameById.get(2)).toBe("Unnamed Contractor");
    expect(maps.tradeById.get(2)).toBe("No Trade");
  });

  it("keeps stored order across a batch", () => {
    const resolved = resolveActivities([activity(10, [2, 1]), activity(11, [])], maps);
    expect(resolved.map((item) => item.contractors.map((c) => c.id))).toEqual([[2, 1], []]);
    expect(resolved[0]?.title).toBe("Task 10");
  });
});
