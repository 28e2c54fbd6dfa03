/**
 * Calendar-date arithmetic on YYYY-MM-DD strings.
 *
 * Dates are project-local calendar days with no time component, so all
 * arithmetic runs in UTC to stay clear of DST shifts. Valid dates have
 * four-digit years (1000-9999); arithmetic that leaves that span throws a
 * ValidationError.
 */

import { SITE_TIMEZONE } from "../config/site.js";
import { ValidationError } from "./errors.js";

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 86_400_000;

export const MIN_YEAR = 1000;
export const MAX_YEAR = 9999;

function utcDate(year: number, month: number, day: number): Date {
  // Date.UTC reads years 0-99 as 1900-1999; setUTCFullYear does not
  const value = new Date(0);
  value.setUTCFullYear(year, month - 1, day);
  return value;
}

function toUtc(date: string): Date {
  const match = ISO_DATE.exec(date);
  if (!match) {
    throw new ValidationError(`Not a YYYY-MM-DD date: ${date}`);
  }
  return utcDate(Number(match[1]), Number(match[2]), Number(match[3]));
}

function fromUtc(value: Date): string {
  const year = value.getUTCFullYear();
  if (year < MIN_YEAR || year > MAX_YEAR) {
    throw new ValidationError(`Date outside years ${MIN_YEAR}-${MAX_YEAR}`);
  }
  const month = String(value.getUTCMonth() + 1).padStart(2, "0");
  const day = String(value.getUTCDate()).padStart(2, "0");
  return `${year}-${month}-${day}`;
}

/**
 * True when the string is YYYY-MM-DD, names a real calendar day and its year
 * is within 1000-9999.
 */
export function isValidIsoDate(date: string): boolean {
  const match = ISO_DATE.exec(date);
  if (!match) return false;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (year < MIN_YEAR || year > MAX_YEAR) return false;
  const check = utcDate(year, month, day);
  return check.getUTCFullYear() === year && check.getUTCMonth() === month - 1 && check.getUTCDate() === day;
}

/**
 * Today's date in the given timezone.
 */
export function todayIn(timeZone: string = SITE_TIMEZONE, now: Date = new Date()): string {
  // en-CA formats as YYYY-MM-DD
  return new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
  }).format(now);
}

/** YYYY-MM-DD as DD/MM/YYYY */
export function formatUkDate(date: string): string {
  const match = ISO_DATE.exec(date);
  return match ? `${match[3]}/${match[2]}/${match[1]}` : date;
}

export function addDays(date: string, days: number): string {
  return fromUtc(new Date(toUtc(date).getTime() + days * MS_PER_DAY));
}

/**
 * Whole days from `start` to `end` (negative when end is earlier).
 */
export function daysBetween(start: string, end: string): number {
  return Math.round((toUtc(end).getTime() - toUtc(start).getTime()) / MS_PER_DAY);
}

/**
 * Every date in [start, end], inclusive. Empty when start > end.
 */
export function enumerateDates(start: string, end: string): string[] {
  const count = daysBetween(start, end) + 1;
  const first = toUtc(start).getTime();
  const dates: string[] = [];
  for (let offset = 0; offset < count; offset++) {
    dates.push(fromUtc(new Date(first + offset * MS_PER_DAY)));
  }
  return dates;
}

/**
 * Monday-to-Sunday week containing the date. A week that runs past
 * 9999-12-31 ends there.
 */
export function weekBounds(date: string): { start: string; end: string } {
  const weekday = toUtc(date).getUTCDay(); // 0 = Sunday
  const sinceMonday = (weekday + 6) % 7;
  const start = addDays(date, -sinceMonday);
  const remaining = daysBetween(start, `${MAX_YEAR}-12-31`);
  return { start, end: addDays(start, Math.min(6, remaining)) };
}
