/**
 * Centralized configuration for the server.
 * All tunable constants and environment variables are defined here.
 *
 * This module re-exports from domain-specific config files:
 * - paths.ts: Database path and API configuration
 * - storage.ts: Storage timeouts
 * - site.ts: Domain enumerations and default-substitution values
 * - server.ts: Server lifecycle
 * - telemetry.ts: Trace export
 */

export { parsePositiveInt, resolvePath } from "./helpers.js";

export { DB_PATH, API_HOST, API_PORT, API_PREFIX } from "./paths.js";

export { STORAGE_BUSY_TIMEOUT_MS } from "./storage.js";

export { SHUTDOWN_TIMEOUT_MS } from "./server.js";

export {
  SITE_TIMEZONE,
  ROLLING_WINDOW_DAYS,
  BRIEFING_STATUS,
  PRIORITIES,
  DEFAULT_PRIORITY,
  PRIORITY_RANK,
  CONTRACTOR_STATUSES,
  DEFAULT_CONTRACTOR_STATUS,
  DEFAULT_ACTIVITY_TIME,
  UNNAMED_CONTRACTOR,
  UNKNOWN_TRADE,
  UNASSIGNED_CONTRACTOR,
  AUDIT_ACTION,
  DEFAULT_SAFETY_INFO,
} from "./site.js";

export { TELEMETRY_CONFIG } from "./telemetry.js";
