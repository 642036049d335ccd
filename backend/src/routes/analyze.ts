import type { Request, RequestHandler, Response } from "express";
import { z } from "zod";
import type { AppDeps } from "../deps.js";
import { isDateKey } from "../lib/dates.js";
import { apiError, toHttpError } from "../lib/errors.js";
import { analyzeQuery } from "../lib/impact.js";

// analysis_type stays a free string: unknown types get the empty "invalid query" result
const bodySchema = z.object({
  analysis_type: z.string(),
  specific_date: z.string().refine(isDateKey, { message: "expected a YYYY-MM-DD date" }).optional(),
});

/** Runs one analysis directly, without intent resolution. */
export function analyzeRoute(deps: AppDeps): RequestHandler[] {
  return [
    (req: Request, res: Response): void => {
      const parsed = bodySchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json(apiError("INVALID_INPUT", "Invalid analysis request", { issues: parsed.error.format() }));
        return;
      }

      try {
        const { tasks } = deps.session.require();
        res.json(analyzeQuery(parsed.data.analysis_type, tasks, deps.calendar, parsed.data.specific_date));
      } catch (err) {
        const { status, payload } = toHttpError(err);
        res.status(status).json(payload);
      }
    },
  ];
}
