/**
 * Event Date Parsing
 */

import { UNKNOWN_DATE, type EventDate } from "../types";

const ISO_PREFIX = /^(\d{4})-(\d{2})-(\d{2})(?:$|[T ])/;
const COMPACT = /^(\d{4})(\d{2})(\d{2})$/;
const US_SLASHED = /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:$|\s)/;

/**
 * Parse a feed date to YYYY-MM-DD.
 *
 * Accepts ISO dates and Socrata floating timestamps, compact YYYYMMDD
 * (DOB), and MM/DD/YYYY. Anything else returns the "unknown" sentinel.
 */
export function parseEventDate(raw: string | null | undefined): EventDate {
  if (!raw) return UNKNOWN_DATE;
  const value = raw.trim();

  let match = value.match(ISO_PREFIX);
  if (match) {
    return toCalendarDate(Number(match[1]), Number(match[2]), Number(match[3]));
  }

  match = value.match(COMPACT);
  if (match) {
    return toCalendarDate(Number(match[1]), Number(match[2]), Number(match[3]));
  }

  match = value.match(US_SLASHED);
  if (match) {
    return toCalendarDate(Number(match[3]), Number(match[1]), Number(match[2]));
  }

  return UNKNOWN_DATE;
}

function toCalendarDate(year: number, month: number, day: number): EventDate {
  if (month < 1 || month > 12 || day < 1 || day > 31) return UNKNOWN_DATE;

  // Rejects 2024-02-30 and friends
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return UNKNOWN_DATE;
  }

  return `${String(year).padStart(4, "0")}-${String(month).padStart(2, "0")}-${String(day).padStart(2, "0")}`;
}

export function isKnownDate(date: EventDate): boolean {
  return date !== UNKNOWN_DATE;
}

/**
 * Later of two event dates. Known dates win over "unknown";
 * YYYY-MM-DD strings compare correctly as text.
 */
export function latestDate(a: EventDate, b: EventDate): EventDate {
  if (!isKnownDate(a)) return b;
  if (!isKnownDate(b)) return a;
  return a >= b ? a : b;
}

/**
 * YYYY-MM-DD for the given instant (UTC).
 */
export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * YYYY-MM-DD `days` before `from` (UTC).
 */
export function daysBefore(from: Date, days: number): string {
  const cutoff = new Date(from.getTime());
  cutoff.setUTCDate(cutoff.getUTCDate() - days);
  return toIsoDate(cutoff);
}
