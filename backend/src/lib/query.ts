import type { AnalysisResult, ResolvedIntent } from "../types.js";
import type { CalendarOracle } from "./calendar.js";
import { analyzeQuery } from "./impact.js";
import type { IntentResolver } from "./intent-resolver.js";
import { presentAnalysis, presentGeneral, type ChatReply } from "./present.js";
import type { PlanSession } from "./session.js";

export type QueryDeps = {
  session: PlanSession;
  calendar: CalendarOracle;
  resolver: IntentResolver;
};

export type QueryAnswer = {
  question: string;
  intent: ResolvedIntent;
  result: AnalysisResult | null; // null for general questions
  reply: ChatReply;
};

export async function answerQuestion(deps: QueryDeps, question: string): Promise<QueryAnswer> {
  const { tasks } = deps.session.require();
  const intent = await deps.resolver.resolve(question);

  if (intent.analysisType === "general_query") {
    return { question, intent, result: null, reply: presentGeneral(intent) };
  }

  const result = analyzeQuery(intent.analysisType, tasks, deps.calendar, intent.specificDate);
  return { question, intent, result, reply: presentAnalysis(intent, result) };
}
