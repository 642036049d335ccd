export type DateKey = string; // "YYYY-MM-DD"

export type Task = {
  readonly id: string;
  readonly name: string;
  readonly start: DateKey;
  readonly end: DateKey;      // never before start
  readonly duration: number;  // working days, from the raw duration expression
  readonly predecessors: readonly string[]; // task ids, may dangle
  readonly successors: readonly string[];
};

export type Plan = { tasks: readonly Task[] };

export type ImpactType = "holiday" | "weekend" | "general";

export type TaskImpact = {
  readonly task: Task;
  readonly impactType: ImpactType;
  readonly impactDescription: string;
  readonly delayDays: number;
};

export type AnalysisResult = {
  impactedTasks: TaskImpact[];
  /** Worst single finding, not a sum. Only set by the project-wide weekend analysis. */
  totalProjectDelay?: number;
  analysisSummary: string;
};

export const ANALYSIS_MODES = ["holiday_impact", "weekend_impact", "specific_date"] as const;

export type AnalysisMode = (typeof ANALYSIS_MODES)[number];

export type QueryType = AnalysisMode | "general_query";

export type IntentMetadata = {
  source: "llm" | "keyword";
  queryUnderstanding: string;
  followUpQuestions: string[];
  extractedEntities: Record<string, unknown>;
  impactSummary?: string;
  answer?: string;
  confidence?: number;
};

export type ResolvedIntent = {
  analysisType: QueryType;
  specificDate?: DateKey;
  metadata: IntentMetadata;
};

export type PlanOverview = {
  taskCount: number;
  holidayTaskCount: number;
  weekendTaskCount: number;
};
