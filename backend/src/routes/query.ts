import type { Request, RequestHandler, Response } from "express";
import { z } from "zod";
import type { AppDeps } from "../deps.js";
import { apiError, toHttpError } from "../lib/errors.js";
import { answerQuestion } from "../lib/query.js";

const bodySchema = z.object({ question: z.string().trim().min(1) });

/** Free-text question → resolved intent → analysis → reply. */
export function queryRoute(deps: AppDeps): RequestHandler[] {
  return [
    async (req: Request, res: Response): Promise<void> => {
      const parsed = bodySchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json(apiError("INVALID_INPUT", "A non-empty question is required", { issues: parsed.error.format() }));
        return;
      }

      try {
        const answer = await answerQuestion(deps, parsed.data.question);
        deps.logger.debug(`"${answer.question}" → ${answer.intent.analysisType} (${answer.intent.metadata.source})`);
        res.json(answer);
      } catch (err) {
        const { status, payload } = toHttpError(err);
        if (status >= 500) deps.logger.error("Query failed", err);
        res.status(status).json(payload);
      }
    },
  ];
}
