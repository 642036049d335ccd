import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { LogLevel } from "./logger.js";

// dotenv leaves `KEY=` as an empty string; treat that as unset.
const optional = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((v) => (v === "" ? undefined : v), schema.optional());

const envSchema = z.object({
  PORT: optional(z.coerce.number().int().positive()),
  LOG_LEVEL: optional(z.enum(["debug", "info", "warn", "error"])),
  PLAN_PATH: optional(z.string()),
  UPLOAD_LIMIT_MB: optional(z.coerce.number().positive()),
  INTENT_RESOLVER: optional(z.enum(["llm", "keyword"])),
  OPENAI_API_KEY: optional(z.string()),
  OPENAI_BASE_URL: optional(z.string().url()),
  MODEL_NAME: optional(z.string()),
  TEMPERATURE: optional(z.coerce.number().min(0).max(2)),
  MAX_TOKENS: optional(z.coerce.number().int().positive()),
  HOLIDAY_FIRST_YEAR: optional(z.coerce.number().int()),
  HOLIDAY_LAST_YEAR: optional(z.coerce.number().int()),
});

export type LlmConfig = {
  apiKey?: string;
  baseURL?: string;
  model: string;
  temperature: number;
  maxTokens: number;
};

export type CalendarConfig = {
  firstYear: number;
  lastYear: number;
};

export type AppConfig = {
  port: number;
  logLevel: LogLevel;
  planPath?: string;
  uploadLimitBytes: number;
  intentResolver: "llm" | "keyword";
  llm: LlmConfig;
  calendar: CalendarConfig;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError("Invalid environment configuration", parsed.error.flatten().fieldErrors);
  }
  const e = parsed.data;

  const calendar: CalendarConfig = {
    firstYear: e.HOLIDAY_FIRST_YEAR ?? 2000,
    lastYear: e.HOLIDAY_LAST_YEAR ?? 2099,
  };
  if (calendar.lastYear < calendar.firstYear) {
    throw new ConfigError("HOLIDAY_LAST_YEAR must not be before HOLIDAY_FIRST_YEAR", { ...calendar });
  }

  const intentResolver = e.INTENT_RESOLVER ?? (e.OPENAI_API_KEY ? "llm" : "keyword");
  if (intentResolver === "llm" && !e.OPENAI_API_KEY) {
    throw new ConfigError("OPENAI_API_KEY is required when INTENT_RESOLVER=llm");
  }

  return {
    port: e.PORT ?? 8080,
    logLevel: e.LOG_LEVEL ?? "info",
    planPath: e.PLAN_PATH,
    uploadLimitBytes: (e.UPLOAD_LIMIT_MB ?? 20) * 1024 * 1024,
    intentResolver,
    llm: {
      apiKey: e.OPENAI_API_KEY,
      baseURL: e.OPENAI_BASE_URL,
      model: e.MODEL_NAME ?? "gpt-4.1-mini",
      temperature: e.TEMPERATURE ?? 0.3,
      maxTokens: e.MAX_TOKENS ?? 2048,
    },
    calendar,
  };
}
