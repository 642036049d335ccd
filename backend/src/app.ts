import express, { type ErrorRequestHandler, type Express } from "express";
import cors from "cors";
import multer from "multer";
import type { AppDeps } from "./deps.js";
import { apiError, toHttpError } from "./lib/errors.js";
import { analyzeRoute } from "./routes/analyze.js";
import { calendarRangeRoute, holidaysRoute } from "./routes/calendar.js";
import { showPlanRoute, uploadPlanRoute } from "./routes/plan.js";
import { queryRoute } from "./routes/query.js";

export function createApp(deps: AppDeps): Express {
  const app = express();
  app.use(cors());
  app.use(express.json());

  app.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.get("/plan", ...showPlanRoute(deps));
  app.post("/plan", ...uploadPlanRoute(deps));
  app.post("/query", ...queryRoute(deps));
  app.post("/analyze", ...analyzeRoute(deps));
  app.get("/calendar", ...calendarRangeRoute(deps));
  app.get("/calendar/holidays/:year", ...holidaysRoute(deps));

  app.use(errorHandler(deps));
  return app;
}

/** Body parser and multer failures arrive here; route handlers answer their own errors. */
export function errorHandler(deps: Pick<AppDeps, "logger">): ErrorRequestHandler {
  return (err, _req, res, _next) => {
    if (err instanceof multer.MulterError) {
      res.status(400).json(apiError("INVALID_INPUT", err.message, { code: err.code }));
      return;
    }
    if (err instanceof SyntaxError) {
      res.status(400).json(apiError("INVALID_INPUT", "Request body is not valid JSON"));
      return;
    }
    const { status, payload } = toHttpError(err);
    if (status >= 500) deps.logger.error("Unhandled error", err);
    res.status(status).json(payload);
  };
}
