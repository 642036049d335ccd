import { getDay } from "date-fns";
import type { DateKey } from "../types.js";
import { eachDate, parseDateKey, shiftDate, yearOf } from "./dates.js";
import { CalendarConfigurationError } from "./errors.js";
import type { HolidaySource } from "./holidays.js";

export type NonWorkingStatus = {
  isHoliday: boolean;
  isWeekend: boolean;
  holidayName: string; // "" unless isHoliday
};

export type NonWorkingDate = {
  date: DateKey;
  reason: string; // "Holiday: <name>" or "Weekend"
};

export interface CalendarOracle {
  isNonWorking(date: DateKey): NonWorkingStatus;
  isHoliday(date: DateKey): boolean;
  isWeekend(date: DateKey): boolean;
  holidayName(date: DateKey): string;
  /** 1 for the first weekend day, 2 for the second, null on weekdays. */
  weekendOrdinal(date: DateKey): 1 | 2 | null;
  nextWorkingDay(date: DateKey): DateKey;
  countBusinessDays(start: DateKey, end: DateKey): number;
  enumerateNonWorking(start: DateKey, end: DateKey): NonWorkingDate[];
  holidaysIn(year: number): ReadonlyMap<DateKey, string>;
}

export type ProjectCalendarOptions = {
  holidays: HolidaySource;
  /** First and second weekend day, 0=Sun..6=Sat. Default Saturday then Sunday. */
  weekendDays?: readonly [number, number];
  /** Upper bound on days scanned by nextWorkingDay. */
  maxScanDays?: number;
};

export class ProjectCalendar implements CalendarOracle {
  private readonly holidays: HolidaySource;
  private readonly weekendDays: readonly [number, number];
  private readonly maxScanDays: number;

  constructor(opts: ProjectCalendarOptions) {
    this.holidays = opts.holidays;
    this.weekendDays = opts.weekendDays ?? [6, 0];
    this.maxScanDays = opts.maxScanDays ?? 366;
  }

  holidaysIn(year: number): ReadonlyMap<DateKey, string> {
    return this.holidays.holidaysFor(year);
  }

  holidayName(date: DateKey): string {
    return this.holidaysIn(yearOf(date)).get(date) ?? "";
  }

  isHoliday(date: DateKey): boolean {
    return this.holidaysIn(yearOf(date)).has(date);
  }

  weekendOrdinal(date: DateKey): 1 | 2 | null {
    const wd = getDay(parseDateKey(date));
    if (wd === this.weekendDays[0]) return 1;
    if (wd === this.weekendDays[1]) return 2;
    return null;
  }

  isWeekend(date: DateKey): boolean {
    return this.weekendOrdinal(date) !== null;
  }

  isNonWorking(date: DateKey): NonWorkingStatus {
    const holidayName = this.holidayName(date);
    return { isHoliday: holidayName !== "", isWeekend: this.isWeekend(date), holidayName };
  }

  private isWorkingDay(date: DateKey): boolean {
    return !this.isWeekend(date) && !this.isHoliday(date);
  }

  nextWorkingDay(date: DateKey): DateKey {
    let cur = date;
    for (let i = 0; i < this.maxScanDays; i++) {
      cur = shiftDate(cur, 1);
      if (this.isWorkingDay(cur)) return cur;
    }
    throw new CalendarConfigurationError(`No working day within ${this.maxScanDays} days after ${date}`, {
      date,
      maxScanDays: this.maxScanDays,
    });
  }

  countBusinessDays(start: DateKey, end: DateKey): number {
    let n = 0;
    for (const d of eachDate(start, end)) {
      if (this.isWorkingDay(d)) n += 1;
    }
    return n;
  }

  enumerateNonWorking(start: DateKey, end: DateKey): NonWorkingDate[] {
    const res: NonWorkingDate[] = [];
    for (const date of eachDate(start, end)) {
      const name = this.holidayName(date);
      if (name) res.push({ date, reason: `Holiday: ${name}` });
      else if (this.isWeekend(date)) res.push({ date, reason: "Weekend" });
    }
    return res;
  }
}
