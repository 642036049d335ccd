import { addDays, formatISO, isValid, parse, parseISO } from "date-fns";
import type { DateKey } from "../types.js";

const DATE_KEY = /^\d{4}-\d{2}-\d{2}$/;

export function toDateKey(date: Date): DateKey {
  return formatISO(date, { representation: "date" });
}

/** Local midnight of the given day. */
export function parseDateKey(date: DateKey): Date {
  return parseISO(date);
}

export function isDateKey(value: string): boolean {
  // parseISO rolls nothing over, so "2025-02-30" comes back invalid
  return DATE_KEY.test(value) && isValid(parseISO(value));
}

export function shiftDate(date: DateKey, days: number): DateKey {
  return toDateKey(addDays(parseISO(date), days));
}

/** Every date in [start, end], inclusive. Empty when end < start. */
export function* eachDate(start: DateKey, end: DateKey): Generator<DateKey> {
  for (let d = start; d <= end; d = shiftDate(d, 1)) yield d;
}

export function yearOf(date: DateKey): number {
  return Number(date.slice(0, 4));
}

// Day-first formats are left out: "7/4" reads as July 4th.
const LOOSE_FORMATS = [
  // two-digit years first: "yyyy" would read "25" as year 25
  "M/d/yy",
  "M/d/yyyy",
  "EEE M/d/yy",
  "EEE M/d/yyyy",
  "MMMM d yyyy",
  "MMM d yyyy",
  "d MMMM yyyy",
  "MMMM d",
  "MMM d",
  "M/d",
];

/**
 * Reads the date forms found in schedule exports and questions: ISO dates
 * (with or without a time part), US numeric dates, and month names with an
 * optional ordinal suffix and year. Dates without a year take the year of
 * `reference`.
 */
export function parseLooseDate(text: string, reference: Date = new Date()): DateKey | null {
  const trimmed = text.trim();
  const iso = /^(\d{4}-\d{2}-\d{2})(?:[T ].*)?$/.exec(trimmed);
  if (iso) return isDateKey(iso[1]) ? iso[1] : null;

  const cleaned = trimmed
    .replace(/(\d)(st|nd|rd|th)\b/gi, "$1")
    .replace(/,/g, " ")
    .replace(/\s+/g, " ");
  for (const fmt of LOOSE_FORMATS) {
    const d = parse(cleaned, fmt, reference);
    if (isValid(d)) return toDateKey(d);
  }
  return null;
}
