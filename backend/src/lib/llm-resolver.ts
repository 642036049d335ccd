import type { ResolvedIntent } from "../types.js";
import { toDateKey } from "./dates.js";
import type { IntentResolver } from "./intent-resolver.js";
import { intentSchema, toResolvedIntent, toolSchema } from "./intent-schema.js";
import type { Logger } from "./logger.js";
import type { CompleteFn } from "./openai.js";

export type LlmIntentResolverDeps = {
  complete: CompleteFn;
  model: string;
  temperature: number;
  maxTokens: number;
  /** Used when the model call fails or returns something unusable. */
  fallback: IntentResolver;
  logger: Logger;
  today?: () => Date;
};

const SYSTEM_PROMPT = [
  "You are a strict intent parser for questions about a project schedule.",
  "Output ONLY by calling the tool with a valid response_type and analysis_type.",
  "Use holiday_impact for tasks starting or ending on holidays,",
  "weekend_impact for delay caused by not working on weekends,",
  "specific_date when the question names one date or one holiday (resolve it to YYYY-MM-DD),",
  "and general_query for anything else, answering it directly.",
].join(" ");

export class LlmIntentResolver implements IntentResolver {
  private readonly today: () => Date;

  constructor(private readonly deps: LlmIntentResolverDeps) {
    this.today = deps.today ?? (() => new Date());
  }

  async resolve(question: string): Promise<ResolvedIntent> {
    const { complete, model, temperature, maxTokens, fallback, logger } = this.deps;
    const today = this.today();

    const userPrompt = [
      `User asked: "${question}"`,
      `Today is ${toDateKey(today)}. Dates without a year are in ${today.getFullYear()}.`,
    ].join("\n");

    try {
      const resp = await complete({
        model,
        temperature,
        max_tokens: maxTokens,
        messages: [
          { role: "system", content: SYSTEM_PROMPT },
          { role: "user", content: userPrompt },
        ],
        tools: [{ type: "function", function: toolSchema }],
        tool_choice: { type: "function", function: { name: toolSchema.name } },
      });

      const call = resp.choices[0]?.message.tool_calls?.[0];
      if (!call || call.type !== "function") throw new Error("No tool call returned by LLM");

      const parsed = intentSchema.safeParse(JSON.parse(call.function.arguments));
      if (!parsed.success) {
        logger.warn("Intent validation failed, using keyword rules", parsed.error.format());
        return fallback.resolve(question);
      }
      return toResolvedIntent(parsed.data, today);
    } catch (err) {
      logger.error(`Intent resolution failed: ${err instanceof Error ? err.message : String(err)}`);
      return fallback.resolve(question);
    }
  }
}
