/**
 * Input shapes and default-substitution rules for writable fields.
 *
 * Shape schemas reject values of the wrong type (HTTP 400). Values of the
 * right type but outside a field's domain are replaced by that field's
 * default, except where a field is required or a count would be wrong.
 *
 * | Field            | Out-of-domain value             | Result            |
 * |------------------|---------------------------------|-------------------|
 * | priority         | not low/medium/high/critical    | "medium"          |
 * | status           | not a contractor status         | "Active"          |
 * | date             | not YYYY-MM-DD or DD/MM/YYYY    | today (site tz)   |
 * | time             | not HH:MM                       | "08:00"           |
 * | laborCount       | missing                         | 0                 |
 * | laborCount       | negative, fractional or unsafe  | ValidationError   |
 * | area             | blank                           | null              |
 * | title/name/trade | blank                           | ValidationError   |
 * | contacts         | blank entries                   | dropped           |
 */

import { z } from "zod";
import {
  PRIORITIES,
  DEFAULT_PRIORITY,
  CONTRACTOR_STATUSES,
  DEFAULT_CONTRACTOR_STATUS,
  DEFAULT_ACTIVITY_TIME,
  SITE_TIMEZONE,
} from "../config/site.js";
import { isValidIsoDate, todayIn } from "./calendar.js";
import { ValidationError } from "./errors.js";
import type { ActivityFields, ContractorContact, ContractorFields } from "./types.js";

export const ActivityInputSchema = z.object({
  time: z.string().optional(),
  title: z.string().optional(),
  description: z.string().optional(),
  area: z.string().nullish(),
  priority: z.string().nullish(),
  laborCount: z.number().nullish(),
  contractorIds: z.array(z.number()).optional(),
  assignedTo: z.string().optional(),
});

export type ActivityInput = z.infer<typeof ActivityInputSchema>;

const ContactInputSchema = z.object({
  name: z.string().optional(),
  phone: z.string().optional(),
  email: z.string().optional(),
});

/**
 * `contacts` lists every contact. Without it, `contactName`, `phone` and
 * `email` describe a single one.
 */
export const ContractorInputSchema = z.object({
  name: z.string().optional(),
  trade: z.string().optional(),
  status: z.string().nullish(),
  contacts: z.array(ContactInputSchema).optional(),
  contactName: z.string().optional(),
  phone: z.string().optional(),
  email: z.string().optional(),
});

export type ContractorInput = z.infer<typeof ContractorInputSchema>;

const PrioritySchema = z.enum(PRIORITIES).catch(DEFAULT_PRIORITY);
const ContractorStatusSchema = z.enum(CONTRACTOR_STATUSES).catch(DEFAULT_CONTRACTOR_STATUS);
const TimeSchema = z
  .string()
  .regex(/^([01]\d|2[0-3]):[0-5]\d$/)
  .catch(DEFAULT_ACTIVITY_TIME);

const UK_DATE = /^(\d{2})\/(\d{2})\/(\d{4})$/;

/**
 * Normalise a calendar date to YYYY-MM-DD.
 * Accepts ISO or DD/MM/YYYY; anything else becomes today in the site timezone.
 */
export function normalizeDate(raw: string | null | undefined, timeZone: string = SITE_TIMEZONE): string {
  const value = raw?.trim() ?? "";
  if (isValidIsoDate(value)) {
    return value;
  }
  const uk = UK_DATE.exec(value);
  if (uk) {
    const iso = `${uk[3]}-${uk[2]}-${uk[1]}`;
    if (isValidIsoDate(iso)) {
      return iso;
    }
  }
  return todayIn(timeZone);
}

export function normalizePriority(raw: string | null | undefined): ActivityFields["priority"] {
  return PrioritySchema.parse(raw?.trim().toLowerCase());
}

export function normalizeContractorStatus(raw: string | null | undefined): ContractorFields["status"] {
  return ContractorStatusSchema.parse(raw?.trim());
}

export function normalizeTime(raw: string | undefined): string {
  return TimeSchema.parse(raw?.trim());
}

export function normalizeLaborCount(raw: number | null | undefined): number {
  if (raw === null || raw === undefined) {
    return 0;
  }
  if (!Number.isInteger(raw)) {
    throw new ValidationError("Labor count must be a whole number");
  }
  if (raw < 0) {
    throw new ValidationError("Labor count cannot be negative");
  }
  if (!Number.isSafeInteger(raw)) {
    throw new ValidationError("Labor count is too large");
  }
  return raw;
}

/**
 * Key that makes contractor names unique per project: case-folded with
 * composed accents, so "Élan" and "élan" collide.
 */
export function contractorNameKey(name: string): string {
  return name.trim().normalize("NFC").toLowerCase();
}

/**
 * Keep positive integer ids, first occurrence wins.
 */
export function dedupeIds(ids: readonly number[]): number[] {
  const seen = new Set<number>();
  const result: number[] = [];
  for (const id of ids) {
    if (Number.isInteger(id) && id > 0 && !seen.has(id)) {
      seen.add(id);
      result.push(id);
    }
  }
  return result;
}

function requireText(raw: string | undefined, label: string): string {
  const value = raw?.trim() ?? "";
  if (!value) {
    throw new ValidationError(`${label} is required`);
  }
  return value;
}

/**
 * Apply the substitution rules to an activity write.
 * Contractor ids are only de-duplicated here; project filtering needs the registry.
 */
export function normalizeActivityFields(input: ActivityInput): ActivityFields {
  const area = input.area?.trim();
  return {
    time: normalizeTime(input.time),
    title: requireText(input.title, "Title"),
    description: input.description?.trim() ?? "",
    area: area ? area : null,
    priority: normalizePriority(input.priority),
    laborCount: normalizeLaborCount(input.laborCount),
    contractorIds: dedupeIds(input.contractorIds ?? []),
    assignedTo: input.assignedTo?.trim() ?? "",
  };
}

/**
 * Apply the substitution rules to a contractor write.
 */
export function normalizeContractorFields(input: ContractorInput): ContractorFields {
  return {
    name: requireText(input.name, "Contractor name"),
    trade: requireText(input.trade, "Trade"),
    status: normalizeContractorStatus(input.status),
    contacts: normalizeContacts(input),
  };
}

function normalizeContacts(input: ContractorInput): ContractorContact[] {
  const entries =
    input.contacts && input.contacts.length > 0
      ? input.contacts
      : [{ name: input.contactName, phone: input.phone, email: input.email }];

  return entries
    .map((entry) => ({
      name: entry.name?.trim() ?? "",
      phone: entry.phone?.trim() ?? "",
      email: entry.email?.trim() ?? "",
    }))
    .filter((contact) => contact.name || contact.phone || contact.email);
}
