import { describe, expect, it } from "vitest";
import { ProjectCalendar } from "./calendar.js";
import { CalendarConfigurationError } from "./errors.js";
import { staticHolidays, usFederalHolidays } from "./holidays.js";

const calendar = new ProjectCalendar({ holidays: usFederalHolidays({ firstYear: 2000, lastYear: 2099 }) });

describe("isNonWorking", () => {
  it("names a weekday holiday", () => {
    // 2025-07-04 = Friday
    expect(calendar.isNonWorking("2025-07-04")).toEqual({
      isHoliday: true,
      isWeekend: false,
      holidayName: "Independence Day",
    });
  });

  it("flags a plain weekend day", () => {
    expect(calendar.isNonWorking("2025-07-05")).toEqual({ isHoliday: false, isWeekend: true, holidayName: "" });
  });

  it("reports both when a holiday falls on a weekend", () => {
    // 2026-07-04 = Saturday
    expect(calendar.isNonWorking("2026-07-04")).toEqual({
      isHoliday: true,
      isWeekend: true,
      holidayName: "Independence Day",
    });
  });

  it("an ordinary weekday is working", () => {
    expect(calendar.isNonWorking("2025-07-08")).toEqual({ isHoliday: false, isWeekend: false, holidayName: "" });
  });

  it("dates outside the holiday range are not holidays", () => {
    const narrow = new ProjectCalendar({ holidays: usFederalHolidays({ firstYear: 2025, lastYear: 2025 }) });
    // 2026-12-25 = Friday
    expect(narrow.isNonWorking("2026-12-25")).toEqual({ isHoliday: false, isWeekend: false, holidayName: "" });
  });
});

describe("weekendOrdinal", () => {
  it("Saturday is the first weekend day, Sunday the second", () => {
    expect(calendar.weekendOrdinal("2025-07-05")).toBe(1);
    expect(calendar.weekendOrdinal("2025-07-06")).toBe(2);
    expect(calendar.weekendOrdinal("2025-07-07")).toBeNull();
  });

  it("follows configured weekend days", () => {
    // Friday/Saturday weekend
    const cal = new ProjectCalendar({ holidays: staticHolidays({}), weekendDays: [5, 6] });
    expect(cal.weekendOrdinal("2025-07-04")).toBe(1);
    expect(cal.weekendOrdinal("2025-07-05")).toBe(2);
    expect(cal.isWeekend("2025-07-06")).toBe(false);
  });
});

describe("nextWorkingDay", () => {
  it("skips a holiday and the weekend after it", () => {
    // Thu -> Fri (holiday) -> Sat, Sun -> Mon
    expect(calendar.nextWorkingDay("2025-07-03")).toBe("2025-07-07");
  });

  it("is strictly after the given date", () => {
    expect(calendar.nextWorkingDay("2025-07-07")).toBe("2025-07-08");
  });

  it("throws instead of scanning forever", () => {
    const cal = new ProjectCalendar({
      holidays: staticHolidays({ "2025-07-07": "Shutdown", "2025-07-08": "Shutdown" }),
      maxScanDays: 3,
    });
    expect(() => cal.nextWorkingDay("2025-07-04")).toThrow(CalendarConfigurationError);
    expect(cal.nextWorkingDay("2025-07-08")).toBe("2025-07-09");
  });
});

describe("countBusinessDays", () => {
  it("counts inclusively, leaving out weekends and holidays", () => {
    // Mon 06-30 .. Fri 07-11: 10 weekdays, minus Jul 4
    expect(calendar.countBusinessDays("2025-06-30", "2025-07-11")).toBe(9);
  });

  it("single working day counts 1, single weekend day 0", () => {
    expect(calendar.countBusinessDays("2025-07-08", "2025-07-08")).toBe(1);
    expect(calendar.countBusinessDays("2025-07-05", "2025-07-05")).toBe(0);
  });

  it("end before start => 0", () => {
    expect(calendar.countBusinessDays("2025-07-11", "2025-06-30")).toBe(0);
  });
});

describe("enumerateNonWorking", () => {
  it("lists holidays and weekend days in order", () => {
    expect(calendar.enumerateNonWorking("2025-07-03", "2025-07-07")).toEqual([
      { date: "2025-07-04", reason: "Holiday: Independence Day" },
      { date: "2025-07-05", reason: "Weekend" },
      { date: "2025-07-06", reason: "Weekend" },
    ]);
  });

  it("a holiday on a weekend is reported as the holiday", () => {
    expect(calendar.enumerateNonWorking("2026-07-03", "2026-07-05")).toEqual([
      { date: "2026-07-03", reason: "Holiday: Independence Day (observed)" },
      { date: "2026-07-04", reason: "Holiday: Independence Day" },
      { date: "2026-07-05", reason: "Weekend" },
    ]);
  });

  it("is empty for a working week and for a reversed range", () => {
    expect(calendar.enumerateNonWorking("2025-07-07", "2025-07-11")).toEqual([]);
    expect(calendar.enumerateNonWorking("2025-07-06", "2025-07-05")).toEqual([]);
  });
});
