import { ProjectCalendar, type CalendarOracle } from "./lib/calendar.js";
import type { AppConfig } from "./lib/config.js";
import { usFederalHolidays } from "./lib/holidays.js";
import { KeywordIntentResolver, type IntentResolver } from "./lib/intent-resolver.js";
import { LlmIntentResolver } from "./lib/llm-resolver.js";
import type { Logger } from "./lib/logger.js";
import { chatCompletion, createOpenAI, type CompleteFn } from "./lib/openai.js";
import { PlanSession } from "./lib/session.js";

export type AppDeps = {
  session: PlanSession;
  calendar: CalendarOracle;
  resolver: IntentResolver;
  logger: Logger;
  uploadLimitBytes: number;
};

/** `complete` replaces the OpenAI client, for tests. */
export function createDeps(config: AppConfig, logger: Logger, complete?: CompleteFn): AppDeps {
  const calendar = new ProjectCalendar({ holidays: usFederalHolidays(config.calendar) });
  const keyword = new KeywordIntentResolver(calendar);

  const resolver: IntentResolver =
    config.intentResolver === "llm"
      ? new LlmIntentResolver({
          complete: complete ?? chatCompletion(createOpenAI(config.llm)),
          model: config.llm.model,
          temperature: config.llm.temperature,
          maxTokens: config.llm.maxTokens,
          fallback: keyword,
          logger,
        })
      : keyword;

  return {
    session: new PlanSession(),
    calendar,
    resolver,
    logger,
    uploadLimitBytes: config.uploadLimitBytes,
  };
}
