import { z } from "zod";
import type { ResolvedIntent } from "../types.js";
import { parseLooseDate } from "./dates.js";

const common = {
  query_understanding: z.string(),
  specific_date: z.string().nullish(),
  extracted_entities: z.record(z.unknown()).nullish(),
  follow_up_questions: z.array(z.string()).nullish(),
};

export const intentSchema = z.discriminatedUnion("response_type", [
  z.object({
    response_type: z.literal("task_analysis"),
    analysis_type: z.enum(["holiday_impact", "specific_date"]),
    impact_summary: z.string().nullish(),
    ...common,
  }),
  z.object({
    response_type: z.literal("schedule_impact"),
    analysis_type: z.literal("weekend_impact"),
    impact_summary: z.string().nullish(),
    affected_milestones: z.array(z.string()).nullish(),
    ...common,
  }),
  z.object({
    response_type: z.literal("general_query"),
    analysis_type: z.literal("general_query"),
    answer: z.string(),
    confidence: z.number().min(0).max(1).nullish(),
    ...common,
  }),
]);

export type LlmIntent = z.infer<typeof intentSchema>;

export const toolSchema = {
  name: "resolve_schedule_query",
  description: "Classify a question about the project schedule into one structured analysis request.",
  parameters: {
    type: "object",
    properties: {
      response_type: { type: "string", enum: ["task_analysis", "schedule_impact", "general_query"] },
      analysis_type: {
        type: "string",
        enum: ["holiday_impact", "weekend_impact", "specific_date", "general_query"],
        description:
          "holiday_impact and specific_date go with task_analysis, weekend_impact with schedule_impact, general_query with general_query",
      },
      query_understanding: { type: "string", description: "One sentence restating the question" },
      specific_date: { type: "string", description: "YYYY-MM-DD, only for specific_date", nullable: true },
      impact_summary: { type: "string", nullable: true },
      affected_milestones: { type: "array", items: { type: "string" }, nullable: true },
      answer: { type: "string", description: "Direct answer, only for general_query", nullable: true },
      confidence: { type: "number", minimum: 0, maximum: 1, nullable: true },
      extracted_entities: { type: "object", nullable: true },
      follow_up_questions: { type: "array", items: { type: "string" }, nullable: true },
    },
    required: ["response_type", "analysis_type", "query_understanding"],
  },
} as const;

/** Drops what the analysis does not use. An unreadable date is left out. */
export function toResolvedIntent(intent: LlmIntent, reference: Date): ResolvedIntent {
  const specificDate =
    intent.analysis_type === "specific_date" && intent.specific_date
      ? parseLooseDate(intent.specific_date, reference) ?? undefined
      : undefined;

  const resolved: ResolvedIntent = {
    analysisType: intent.analysis_type,
    specificDate,
    metadata: {
      source: "llm",
      queryUnderstanding: intent.query_understanding,
      followUpQuestions: intent.follow_up_questions ?? [],
      extractedEntities: intent.extracted_entities ?? {},
    },
  };

  switch (intent.response_type) {
    case "task_analysis":
    case "schedule_impact":
      if (intent.impact_summary) resolved.metadata.impactSummary = intent.impact_summary;
      break;
    case "general_query":
      resolved.metadata.answer = intent.answer;
      if (intent.confidence != null) resolved.metadata.confidence = intent.confidence;
      break;
  }
  return resolved;
}
