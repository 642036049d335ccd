import type { AnalysisResult, DateKey, ImpactType, ResolvedIntent } from "../types.js";
import { INVALID_QUERY_SUMMARY } from "./impact.js";

export type ImpactRow = {
  taskId: string;
  taskName: string;
  start: DateKey;
  end: DateKey;
  impactType: ImpactType;
  impactDescription: string;
  delayDays: number;
};

export type ChartSpec =
  | {
      kind: "timeline";
      title: string;
      items: Array<{ task: string; start: DateKey; end: DateKey; impactType: ImpactType }>;
    }
  | {
      kind: "bar";
      title: string;
      bars: Array<{ task: string; delayDays: number; impactType: ImpactType }>;
    };

export type ChatReply = {
  text: string;
  followUp: string[];
  rows: ImpactRow[] | null;
  chart: ChartSpec | null;
};

const TOP_DELAYS = 10;

export function toRows(result: AnalysisResult): ImpactRow[] {
  return result.impactedTasks.map(({ task, impactType, impactDescription, delayDays }) => ({
    taskId: task.id,
    taskName: task.name,
    start: task.start,
    end: task.end,
    impactType,
    impactDescription,
    delayDays,
  }));
}

/** Weekend analyses get a bar chart of the largest delays, the rest a timeline of the flagged tasks. */
export function presentAnalysis(intent: ResolvedIntent, result: AnalysisResult): ChatReply {
  const followUp = intent.metadata.followUpQuestions;
  const schedule = intent.analysisType === "weekend_impact";

  if (result.impactedTasks.length === 0) {
    const text =
      result.analysisSummary === INVALID_QUERY_SUMMARY
        ? result.analysisSummary
        : schedule
          ? "No schedule impact found for your query."
          : "No tasks found matching your query.";
    return { text, followUp, rows: null, chart: null };
  }

  const rows = toRows(result);
  const chart: ChartSpec = schedule
    ? {
        kind: "bar",
        title: `Top ${TOP_DELAYS} Tasks with Highest Delay`,
        bars: [...rows]
          .sort((a, b) => b.delayDays - a.delayDays)
          .slice(0, TOP_DELAYS)
          .map((r) => ({ task: r.taskName, delayDays: r.delayDays, impactType: r.impactType })),
      }
    : {
        kind: "timeline",
        title: "Tasks Impacted by Holidays/Weekends",
        items: rows.map((r) => ({ task: r.taskName, start: r.start, end: r.end, impactType: r.impactType })),
      };

  return { text: result.analysisSummary, followUp, rows, chart };
}

export function presentGeneral(intent: ResolvedIntent): ChatReply {
  return {
    text: intent.metadata.answer ?? intent.metadata.queryUnderstanding,
    followUp: intent.metadata.followUpQuestions,
    rows: null,
    chart: null,
  };
}
