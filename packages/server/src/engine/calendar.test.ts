import { describe, it, expect } from "vitest";
import {
  addDays,
  daysBetween,
  enumerateDates,
  formatUkDate,
  isValidIsoDate,
  todayIn,
  weekBounds,
} from "./calendar.js";
import { ValidationError } from "./errors.js";

describe("calendar", () => {
  it("accepts only real ISO calendar dates", () => {
    expect(isValidIsoDate("2024-02-29")).toBe(true);
    expect(isValidIsoDate("2023-02-29")).toBe(false);
    expect(isValidIsoDate("2024-13-01")).toBe(false);
    expect(isValidIsoDate("24-01-01")).toBe(false);
    expect(isValidIsoDate("2024-1-1")).toBe(false);
  });

  it("adds days across month and year boundaries", () => {
    expect(addDays("2025-03-30", 1)).toBe("2025-03-31");
    expect(addDays("2025-03-31", 1)).toBe("2025-04-01");
    expect(addDays("2025-01-01", -1)).toBe("2024-12-31");
    expect(daysBetween("2025-06-01", "2025-06-08")).toBe(7);
  });

  it("enumerates an inclusive range", () => {
    expect(enumerateDates("2025-06-29", "2025-07-02")).toEqual([
      "2025-06-29",
      "2025-06-30",
      "2025-07-01",
      "2025-07-02",
    ]);
    expect(enumerateDates("2025-06-23", "2025-06-23")).toEqual(["2025-06-23"]);
    expect(enumerateDates("2025-06-24", "2025-06-23")).toEqual([]);
  });

  it("finds the Monday-to-Sunday week", () => {
    expect(weekBounds("2025-06-25")).toEqual({ start: "2025-06-23", end: "2025-06-29" });
    expect(weekBounds("2025-06-23")).toEqual({ start: "2025-06-23", end: "2025-06-29" });
    expect(weekBounds("2025-06-29")).toEqual({ start: "2025-06-23", end: "2025-06-29" });
  });

  it("resolves today in the site timezone", () => {
    const lateEvening = new Date("2025-06-30T23:30:00Z");
    expect(todayIn("Europe/London", lateEvening)).toBe("2025-07-01");
    expect(todayIn("UTC", lateEvening)).toBe("2025-06-30");
  });

  it("limits valid years to 1000-9999", () => {
    expect(isValidIsoDate("1000-01-01")).toBe(true);
    expect(isValidIsoDate("9999-12-31")).toBe(true);
    expect(isValidIsoDate("0999-12-31")).toBe(false);
    expect(isValidIsoDate("0050-02-29")).toBe(false);
  });

  it("refuses arithmetic past either end of the calendar", () => {
    expect(addDays("9999-12-30", 1)).toBe("9999-12-31");
    expect(() => addDays("9999-12-31", 1)).toThrow(ValidationError);
    expect(addDays("1000-01-02", -1)).toBe("1000-01-01");
    expect(() => addDays("1000-01-01", -1)).toThrow(ValidationError);
  });

  it("enumerates up to the last day of the calendar", () => {
    expect(enumerateDates("9999-12-30", "9999-12-31")).toEqual(["9999-12-30", "9999-12-31"]);
    expect(daysBetween("1000-01-01", "1000-03-01")).toBe(59);
  });

  it("cuts the final week short at 9999-12-31", () => {
    expect(weekBounds("9999-12-31")).toEqual({ start: "9999-12-27", end: "9999-12-31" });
  });

  it("formats dates as DD/MM/YYYY", () => {
    expect(formatUkDate("2025-06-03")).toBe("03/06/2025");
  });
});
