import type { Request, RequestHandler, Response } from "express";
import multer from "multer";
import type { AppDeps } from "../deps.js";
import { apiError, toHttpError } from "../lib/errors.js";
import { summarizePlan } from "../lib/impact.js";
import { parsePlan } from "../lib/plan.js";

export function showPlanRoute(deps: AppDeps): RequestHandler[] {
  return [
    (_req: Request, res: Response): void => {
      const plan = deps.session.get();
      if (!plan) {
        res.status(404).json(apiError("NOT_FOUND", "No project plan loaded"));
        return;
      }
      res.json({
        source: plan.source,
        loadedAt: plan.loadedAt,
        overview: summarizePlan(plan.tasks, deps.calendar),
        tasks: plan.tasks,
      });
    },
  ];
}

/** Multipart upload in field `file`: xlsx, xls, csv or json. Replaces the loaded plan. */
export function uploadPlanRoute(deps: AppDeps): RequestHandler[] {
  const upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: deps.uploadLimitBytes } });

  return [
    upload.single("file"),
    (req: Request, res: Response): void => {
      const file = req.file;
      if (!file) {
        res.status(400).json(apiError("INVALID_INPUT", "No plan file uploaded"));
        return;
      }

      try {
        const { tasks } = parsePlan(file.buffer, file.originalname, { logger: deps.logger });
        const plan = deps.session.load(tasks, file.originalname);
        deps.logger.info(`Loaded ${tasks.length} tasks from ${file.originalname}`);
        res.json({
          source: plan.source,
          loadedAt: plan.loadedAt,
          overview: summarizePlan(plan.tasks, deps.calendar),
        });
      } catch (err) {
        const { status, payload } = toHttpError(err);
        if (status >= 500) deps.logger.error("Plan upload failed", err);
        res.status(status).json(payload);
      }
    },
  ];
}
