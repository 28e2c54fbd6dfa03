/**
 * Configuration helpers for parsing environment variables.
 */

import os from "node:os";
import path from "node:path";

/**
 * Parse an environment variable as a positive integer with validation.
 * Returns the default value if parsing fails or result is less than min.
 */
export function parsePositiveInt(value: string | undefined, defaultValue: number, min = 1): number {
  const parsed = parseInt(value ?? "", 10);
  if (isNaN(parsed) || parsed < min) {
    return defaultValue;
  }
  return parsed;
}

/**
 * Resolve a filesystem path from the environment, expanding a leading "~".
 */
export function resolvePath(value: string | undefined, defaultValue: string): string {
  const raw = value?.trim() ? value.trim() : defaultValue;
  if (raw === "~") {
    return os.homedir();
  }
  if (raw.startsWith("~/")) {
    return path.join(os.homedir(), raw.slice(2));
  }
  return path.resolve(raw);
}
