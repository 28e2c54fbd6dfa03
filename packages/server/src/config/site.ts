/**
 * Site briefing domain configuration.
 * Enumerations, default-substitution values and calendar settings.
 */

import { parsePositiveInt } from "./helpers.js";

/** IANA timezone that defines the project-local calendar ("today") */
export const SITE_TIMEZONE = process.env.SITE_TIMEZONE ?? "Europe/London";

/** Default window for the rolling per-contractor breakdown (days) */
export const ROLLING_WINDOW_DAYS = parsePositiveInt(process.env.ROLLING_WINDOW_DAYS, 7);

/** Status values for briefings. The engine only creates drafts. */
export const BRIEFING_STATUS = {
  DRAFT: "draft",
} as const;

/** Safety section of a new briefing when there is none to carry forward */
export const DEFAULT_SAFETY_INFO =
  "<ul><li>Follow all standard safety protocols</li><li>Wear appropriate PPE at all times</li><li>Report any safety concerns immediately</li></ul>";

/** Activity priorities, lowest first */
export const PRIORITIES = ["low", "medium", "high", "critical"] as const;

/** Priority used when none (or an unknown one) is given */
export const DEFAULT_PRIORITY = "medium";

/**
 * Sort rank per priority; higher sorts first.
 * Rows with no recorded priority rank 0.
 */
export const PRIORITY_RANK = {
  critical: 4,
  high: 3,
  medium: 2,
  low: 1,
} as const;

/** Contractor statuses in display order */
export const CONTRACTOR_STATUSES = ["Active", "Standby", "Delayed", "Complete", "Offsite"] as const;

/** Status used when none (or an unknown one) is given */
export const DEFAULT_CONTRACTOR_STATUS = "Active";

/** Time of day used when none (or a malformed one) is given */
export const DEFAULT_ACTIVITY_TIME = "08:00";

/** Display fallbacks for contractor lookups */
export const UNNAMED_CONTRACTOR = "Unnamed Contractor";
export const UNKNOWN_TRADE = "No Trade";

/** Bucket for labour with no resolved contractor in the rolling breakdown */
export const UNASSIGNED_CONTRACTOR = "Unassigned";

/** Audit log actions */
export const AUDIT_ACTION = {
  CREATE_BRIEFING: "create_briefing",
  ADD_ACTIVITY: "add_activity",
  UPDATE_ACTIVITY: "update_activity",
  DELETE_ACTIVITY: "delete_activity",
  COPY_ACTIVITIES: "copy_activities",
  ADD_CONTRACTOR: "add_contractor",
  UPDATE_CONTRACTOR: "update_contractor",
  DELETE_CONTRACTOR: "delete_contractor",
} as const;
