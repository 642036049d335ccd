import { addDays, getDay, lastDayOfMonth, subDays } from "date-fns";
import type { DateKey } from "../types.js";
import { toDateKey, yearOf } from "./dates.js";

export interface HolidaySource {
  /** Holidays of one year keyed by date. Empty for years the source does not cover. */
  holidaysFor(year: number): ReadonlyMap<DateKey, string>;
}

type HolidayRule =
  | { name: string; kind: "fixed"; month: number; day: number; since?: number }
  | { name: string; kind: "weekday"; month: number; weekday: number; nth: number }; // nth -1 = last

// US federal holidays. weekday: 0=Sun..6=Sat
const US_FEDERAL_RULES: readonly HolidayRule[] = [
  { name: "New Year's Day", kind: "fixed", month: 1, day: 1 },
  { name: "Martin Luther King Jr. Day", kind: "weekday", month: 1, weekday: 1, nth: 3 },
  { name: "Washington's Birthday", kind: "weekday", month: 2, weekday: 1, nth: 3 },
  { name: "Memorial Day", kind: "weekday", month: 5, weekday: 1, nth: -1 },
  { name: "Juneteenth National Independence Day", kind: "fixed", month: 6, day: 19, since: 2021 },
  { name: "Independence Day", kind: "fixed", month: 7, day: 4 },
  { name: "Labor Day", kind: "weekday", month: 9, weekday: 1, nth: 1 },
  { name: "Columbus Day", kind: "weekday", month: 10, weekday: 1, nth: 2 },
  { name: "Veterans Day", kind: "fixed", month: 11, day: 11 },
  { name: "Thanksgiving Day", kind: "weekday", month: 11, weekday: 4, nth: 4 },
  { name: "Christmas Day", kind: "fixed", month: 12, day: 25 },
];

function nthWeekdayOf(year: number, month: number, weekday: number, nth: number): Date {
  if (nth < 0) {
    const last = lastDayOfMonth(new Date(year, month - 1, 1));
    return subDays(last, (getDay(last) - weekday + 7) % 7);
  }
  const first = new Date(year, month - 1, 1);
  return addDays(first, (weekday - getDay(first) + 7) % 7 + (nth - 1) * 7);
}

/** Fixed-date holidays on a weekend are observed on the Friday before or the Monday after. */
function observedDate(date: Date): Date | null {
  switch (getDay(date)) {
    case 6:
      return subDays(date, 1);
    case 0:
      return addDays(date, 1);
    default:
      return null;
  }
}

function computeYear(year: number, rules: readonly HolidayRule[]): Map<DateKey, string> {
  const res = new Map<DateKey, string>();

  for (const rule of rules) {
    if (rule.kind === "weekday") {
      res.set(toDateKey(nthWeekdayOf(year, rule.month, rule.weekday, rule.nth)), rule.name);
    } else if (rule.since === undefined || year >= rule.since) {
      res.set(toDateKey(new Date(year, rule.month - 1, rule.day)), rule.name);
    }
  }

  // Observed days, including a Saturday New Year's Day of year+1 landing on Dec 31.
  for (const y of [year, year + 1]) {
    for (const rule of rules) {
      if (rule.kind !== "fixed" || (rule.since !== undefined && y < rule.since)) continue;
      const observed = observedDate(new Date(y, rule.month - 1, rule.day));
      if (!observed) continue;
      const key = toDateKey(observed);
      if (yearOf(key) === year && !res.has(key)) res.set(key, `${rule.name} (observed)`);
    }
  }

  return new Map([...res.entries()].sort(([a], [b]) => (a < b ? -1 : 1)));
}

/** Rule-based US federal holidays for years in [firstYear, lastYear]. */
export function usFederalHolidays(range: { firstYear: number; lastYear: number }): HolidaySource {
  const cache = new Map<number, ReadonlyMap<DateKey, string>>();
  const empty: ReadonlyMap<DateKey, string> = new Map();
  return {
    holidaysFor(year) {
      if (year < range.firstYear || year > range.lastYear) return empty;
      let hit = cache.get(year);
      if (!hit) {
        hit = computeYear(year, US_FEDERAL_RULES);
        cache.set(year, hit);
      }
      return hit;
    },
  };
}

/** Fixed table of holidays, e.g. a company calendar. */
export function staticHolidays(table: Readonly<Record<DateKey, string>>): HolidaySource {
  return {
    holidaysFor(year) {
      return new Map(Object.entries(table).filter(([date]) => yearOf(date) === year));
    },
  };
}
