/**
 * Configuration validation - creates the database directory on startup.
 * Fails fast with clear error messages rather than silent runtime failures.
 */

import fs from "node:fs";
import path from "node:path";
import { DB_PATH } from "./paths.js";
import { SITE_TIMEZONE } from "./site.js";

export interface ConfigError {
  field: string;
  message: string;
}

/**
 * Ensure a directory exists, creating it if necessary.
 * @returns Error message if creation fails, undefined if success
 */
function ensureDirectory(dirPath: string, fieldName: string): ConfigError | undefined {
  try {
    if (!fs.existsSync(dirPath)) {
      fs.mkdirSync(dirPath, { recursive: true });
    }
    const stat = fs.statSync(dirPath);
    if (!stat.isDirectory()) {
      return { field: fieldName, message: `Path exists but is not a directory: ${dirPath}` };
    }
    fs.accessSync(dirPath, fs.constants.W_OK);
    return undefined;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { field: fieldName, message: `Cannot create or access directory ${dirPath}: ${message}` };
  }
}

/**
 * Check that a timezone name is known to the runtime.
 */
function checkTimezone(timeZone: string, fieldName: string): ConfigError | undefined {
  try {
    new Intl.DateTimeFormat("en-GB", { timeZone });
    return undefined;
  } catch {
    return { field: fieldName, message: `Unknown timezone: ${timeZone}` };
  }
}

/**
 * Validate configuration and create required directories.
 * @returns Array of configuration errors (empty if valid)
 */
export function validateConfig(): ConfigError[] {
  const errors: ConfigError[] = [];

  const dbError = ensureDirectory(path.dirname(DB_PATH), "DB_PATH");
  if (dbError) errors.push(dbError);

  const tzError = checkTimezone(SITE_TIMEZONE, "SITE_TIMEZONE");
  if (tzError) errors.push(tzError);

  return errors;
}

/**
 * Validate configuration or throw with detailed error message.
 * Call this early in startup to fail fast.
 */
export function validateConfigOrThrow(): void {
  const errors = validateConfig();
  if (errors.length > 0) {
    const messages = errors.map((e) => `  - ${e.field}: ${e.message}`).join("\n");
    throw new Error(`Configuration validation failed:\n${messages}`);
  }
}

/**
 * Log configuration summary for debugging.
 */
export function logConfigSummary(): void {
  console.log("[CONFIG] Settings:");
  console.log(`  - DB_PATH: ${DB_PATH}`);
  console.log(`  - SITE_TIMEZONE: ${SITE_TIMEZONE}`);
}
