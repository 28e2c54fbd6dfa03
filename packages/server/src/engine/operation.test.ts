import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from "vitest";
import { runOperation } from "./operation.js";
import { NotFoundError } from "./errors.js";
import { createTestContext } from "../test-utils/site-db-helpers.js";
import { colors } from "../utils/colors.js";

describe("runOperation", () => {
  const ctx = createTestContext();
  let consoleError: MockInstance<typeof console.error>;

  beforeEach(() => {
    consoleError = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    consoleError.mockRestore();
  });

  it("wraps a return value", () => {
    expect(runOperation("count", ctx, () => 3)).toEqual({ success: true, data: 3 });
  });

  it("reports domain errors by code without error logging", () => {
    const result = runOperation("getActivity", ctx, () => {
      throw new NotFoundError("Activity", 5);
    });

    expect(result).toEqual({ success: false, code: "NOT_FOUND", error: "Activity 5 not found" });
    expect(consoleError).not.toHaveBeenCalled();
  });

  it("reports a busy database as a storage timeout", () => {
    const busy = Object.assign(new Error("database is locked"), { code: "SQLITE_BUSY" });
    const result = runOperation("copyDay", ctx, () => {
      throw busy;
    });

    expect(result).toEqual({
      success: false,
      code: "STORAGE_ERROR",
      error: "copyDay timed out waiting for the database",
    });
    expect(consoleError).toHaveBeenCalledWith(
      `${colors.red}[ENGINE]${colors.reset} copyDay failed (project=project-alpha, actor=user-1): database is locked [SQLITE_BUSY]`
    );
  });

  it("reports other failures as storage errors", () => {
    const result = runOperation("addActivity", ctx, () => {
      throw new Error("disk I/O error");
    });

    expect(result).toEqual({
      success: false,
      code: "STORAGE_ERROR",
      error: "addActivity failed: disk I/O error",
    });
  });
});
