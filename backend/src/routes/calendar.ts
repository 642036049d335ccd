import type { Request, RequestHandler, Response } from "express";
import { differenceInCalendarDays } from "date-fns";
import { z } from "zod";
import type { AppDeps } from "../deps.js";
import { isDateKey, parseDateKey } from "../lib/dates.js";
import { apiError, toHttpError } from "../lib/errors.js";

const MAX_RANGE_DAYS = 3660;

const dateKey = z.string().refine(isDateKey, { message: "expected a YYYY-MM-DD date" });

const rangeSchema = z
  .object({ start: dateKey, end: dateKey })
  .refine((q) => differenceInCalendarDays(parseDateKey(q.end), parseDateKey(q.start)) <= MAX_RANGE_DAYS, {
    message: `range is limited to ${MAX_RANGE_DAYS} days`,
  });

/** Non-working days and business-day count for [start, end], plus the first working day after end. */
export function calendarRangeRoute(deps: AppDeps): RequestHandler[] {
  return [
    (req: Request, res: Response): void => {
      const parsed = rangeSchema.safeParse(req.query);
      if (!parsed.success) {
        res.status(400).json(apiError("INVALID_INPUT", "start and end are required", { issues: parsed.error.format() }));
        return;
      }
      const { start, end } = parsed.data;
      try {
        res.json({
          start,
          end,
          businessDays: deps.calendar.countBusinessDays(start, end),
          nonWorking: deps.calendar.enumerateNonWorking(start, end),
          nextWorkingDay: deps.calendar.nextWorkingDay(end),
        });
      } catch (err) {
        const { status, payload } = toHttpError(err);
        deps.logger.error("Calendar lookup failed", err);
        res.status(status).json(payload);
      }
    },
  ];
}

export function holidaysRoute(deps: AppDeps): RequestHandler[] {
  return [
    (req: Request, res: Response): void => {
      const year = Number(req.params.year);
      if (!Number.isInteger(year)) {
        res.status(400).json(apiError("INVALID_INPUT", "year must be an integer"));
        return;
      }
      const holidays = [...deps.calendar.holidaysIn(year)].map(([date, name]) => ({ date, name }));
      res.json({ year, holidays });
    },
  ];
}
