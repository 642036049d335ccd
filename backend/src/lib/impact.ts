import type { AnalysisResult, DateKey, ImpactType, PlanOverview, Task, TaskImpact } from "../types.js";
import type { CalendarOracle } from "./calendar.js";
import { eachDate } from "./dates.js";

export const INVALID_QUERY_SUMMARY = "Invalid query type or missing required parameters";

/** Tasks starting or ending on a holiday. Only a holiday start counts as a day of delay. */
export function findHolidayTasks(tasks: readonly Task[], calendar: CalendarOracle): TaskImpact[] {
  const impacted: TaskImpact[] = [];

  for (const task of tasks) {
    const startHoliday = calendar.holidayName(task.start);
    const endHoliday = calendar.holidayName(task.end);
    if (!startHoliday && !endHoliday) continue;

    const desc: string[] = [];
    if (startHoliday) desc.push(`Task starts on holiday: ${startHoliday} (${task.start})`);
    if (endHoliday) desc.push(`Task ends on holiday: ${endHoliday} (${task.end})`);

    impacted.push({
      task,
      impactType: "holiday",
      impactDescription: desc.join("; "),
      delayDays: startHoliday ? 1 : 0,
    });
  }

  return impacted;
}

/**
 * Tasks starting or ending on a weekend day. Starting on the first weekend day
 * loses two days, on the second one day; a weekend end alone costs nothing.
 */
export function findWeekendTasks(tasks: readonly Task[], calendar: CalendarOracle): TaskImpact[] {
  const impacted: TaskImpact[] = [];

  for (const task of tasks) {
    const startOrdinal = calendar.weekendOrdinal(task.start);
    const endWeekend = calendar.isWeekend(task.end);
    if (startOrdinal === null && !endWeekend) continue;

    const desc: string[] = [];
    if (startOrdinal !== null) desc.push(`Task starts on weekend (${task.start})`);
    if (endWeekend) desc.push(`Task ends on weekend (${task.end})`);

    impacted.push({
      task,
      impactType: "weekend",
      impactDescription: desc.join("; "),
      delayDays: startOrdinal === 1 ? 2 : startOrdinal === 2 ? 1 : 0,
    });
  }

  return impacted;
}

/** Tasks whose span contains `date`, classified by what kind of day it is. */
export function findTasksImpactedByDate(
  tasks: readonly Task[],
  calendar: CalendarOracle,
  date: DateKey
): TaskImpact[] {
  const { isHoliday, isWeekend, holidayName } = calendar.isNonWorking(date);
  const impactType: ImpactType = isHoliday ? "holiday" : isWeekend ? "weekend" : "general";

  let impactDescription = `Task is active on ${date}`;
  if (isHoliday) impactDescription += ` which is a holiday: ${holidayName}`;
  else if (isWeekend) impactDescription += " which is a weekend";

  return tasks
    .filter((task) => task.start <= date && date <= task.end)
    .map((task) => ({
      task,
      impactType,
      impactDescription,
      delayDays: isHoliday || isWeekend ? 1 : 0,
    }));
}

/**
 * Delay if no work happens on weekends. Each task loses one day per weekend
 * day in its span; the project total is the worst single task, as there is
 * no dependency propagation.
 */
export function calculateWeekendImpact(tasks: readonly Task[], calendar: CalendarOracle): AnalysisResult {
  const impacted: TaskImpact[] = [];
  let totalDelay = 0;

  for (const task of tasks) {
    let weekendDays = 0;
    for (const d of eachDate(task.start, task.end)) {
      if (calendar.isWeekend(d)) weekendDays += 1;
    }
    if (weekendDays === 0) continue;

    impacted.push({
      task,
      impactType: "weekend",
      impactDescription: `Task spans ${weekendDays} weekend days`,
      delayDays: weekendDays,
    });
    totalDelay = Math.max(totalDelay, weekendDays);
  }

  // Array.prototype.sort is stable, ties keep task order
  impacted.sort((a, b) => b.delayDays - a.delayDays);

  return {
    impactedTasks: impacted,
    totalProjectDelay: totalDelay,
    analysisSummary: `Project would be delayed by approximately ${totalDelay} days if no weekend work is allowed.`,
  };
}

/** Single entry point. Unknown selectors and a date query without a date give an empty result. */
export function analyzeQuery(
  queryType: string,
  tasks: readonly Task[],
  calendar: CalendarOracle,
  specificDate?: DateKey
): AnalysisResult {
  switch (queryType) {
    case "holiday_impact": {
      const impacted = findHolidayTasks(tasks, calendar);
      return {
        impactedTasks: impacted,
        analysisSummary: `Found ${impacted.length} tasks impacted by holidays`,
      };
    }
    case "weekend_impact":
      return calculateWeekendImpact(tasks, calendar);
    case "specific_date": {
      if (!specificDate) break;
      const impacted = findTasksImpactedByDate(tasks, calendar, specificDate);
      return {
        impactedTasks: impacted,
        analysisSummary: `Found ${impacted.length} tasks impacted by date ${specificDate}`,
      };
    }
  }
  return { impactedTasks: [], analysisSummary: INVALID_QUERY_SUMMARY };
}

export function summarizePlan(tasks: readonly Task[], calendar: CalendarOracle): PlanOverview {
  return {
    taskCount: tasks.length,
    holidayTaskCount: findHolidayTasks(tasks, calendar).length,
    weekendTaskCount: findWeekendTasks(tasks, calendar).length,
  };
}
