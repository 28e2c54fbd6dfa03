/**
 * Error taxonomy for engine operations.
 *
 * Every failure an operation can report is an EngineError carrying a stable
 * `code` and the HTTP status the API layer answers with.
 */

import { getErrorCode, getErrorMessage } from "../utils/errors.js";

export type EngineErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "DUPLICATE_NAME"
  | "NO_SOURCE_DATA"
  | "TARGET_NOT_EMPTY"
  | "NOTHING_TO_COPY"
  | "STORAGE_ERROR";

export type EngineHttpStatus = 400 | 404 | 409 | 422 | 500;

/** Status the API layer answers with, per error code */
export const ERROR_HTTP_STATUS: Record<EngineErrorCode, EngineHttpStatus> = {
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
  DUPLICATE_NAME: 409,
  TARGET_NOT_EMPTY: 409,
  NO_SOURCE_DATA: 422,
  NOTHING_TO_COPY: 422,
  STORAGE_ERROR: 500,
};

export class EngineError extends Error {
  constructor(
    readonly code: EngineErrorCode,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }

  get httpStatus(): EngineHttpStatus {
    return ERROR_HTTP_STATUS[this.code];
  }
}

/** Malformed or missing required input */
export class ValidationError extends EngineError {
  constructor(message: string) {
    super("VALIDATION_ERROR", message);
  }
}

/** Entity absent, or owned by another project */
export class NotFoundError extends EngineError {
  constructor(entity: string, id: number | string) {
    super("NOT_FOUND", `${entity} ${id} not found`);
  }
}

export class DuplicateNameError extends EngineError {
  constructor(name: string) {
    super("DUPLICATE_NAME", `A contractor named "${name}" already exists`);
  }
}

export class NoSourceDataError extends EngineError {
  constructor(sourceDate: string) {
    super("NO_SOURCE_DATA", `No briefing exists for ${sourceDate}`);
  }
}

export class TargetNotEmptyError extends EngineError {
  constructor(targetDate: string, existing: number) {
    super(
      "TARGET_NOT_EMPTY",
      `${targetDate} already has ${existing} ${existing === 1 ? "activity" : "activities"}; clear it before copying`
    );
  }
}

export class NothingToCopyError extends EngineError {
  constructor(sourceDate: string) {
    super("NOTHING_TO_COPY", `No activities to copy from ${sourceDate}`);
  }
}

/** Any datastore failure, timeouts included */
export class StorageError extends EngineError {
  constructor(message: string, cause?: unknown) {
    super("STORAGE_ERROR", message);
    this.cause = cause;
  }

  /**
   * Wrap a driver error. SQLITE_BUSY means the busy timeout elapsed.
   */
  static from(operation: string, error: unknown): StorageError {
    const code = getErrorCode(error);
    if (code === "SQLITE_BUSY" || code === "SQLITE_LOCKED") {
      return new StorageError(`${operation} timed out waiting for the database`, error);
    }
    return new StorageError(`${operation} failed: ${getErrorMessage(error)}`, error);
  }
}

/**
 * True for a unique-constraint violation raised by better-sqlite3.
 */
export function isUniqueViolation(error: unknown): boolean {
  const code = getErrorCode(error);
  return code === "SQLITE_CONSTRAINT_UNIQUE" || code === "SQLITE_CONSTRAINT_PRIMARYKEY";
}
