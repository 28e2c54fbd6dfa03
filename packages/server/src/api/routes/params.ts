/**
 * Shared path and query parameter schemas.
 */

import { z } from "zod";
import { normalizeDate } from "../../engine/fields.js";

/** Positive integer path id */
export const IdParamSchema = z.coerce.number().int().positive();

/** Calendar date; missing or unreadable values become today */
export const DateParamSchema = z
  .string()
  .optional()
  .transform((value) => normalizeDate(value));
