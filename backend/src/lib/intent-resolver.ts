import type { DateKey, QueryType, ResolvedIntent } from "../types.js";
import type { CalendarOracle } from "./calendar.js";
import { parseLooseDate } from "./dates.js";

export interface IntentResolver {
  resolve(question: string): Promise<ResolvedIntent>;
}

const HOLIDAY_KEYWORDS = ["holiday", "federal holiday", "national holiday"];
const WEEKEND_KEYWORDS = ["weekend", "saturday", "sunday"];

const MONTHS = "january|february|march|april|may|june|july|august|september|october|november|december";

const DATE_PATTERNS = [
  /\b\d{4}-\d{2}-\d{2}\b/,
  /\b\d{1,2}\/\d{1,2}(?:\/\d{2,4})?\b/,
  new RegExp(`\\b(?:${MONTHS})\\s+\\d{1,2}(?:st|nd|rd|th)?(?:,?\\s+\\d{4})?\\b`),
];

// Question phrasing → holiday name in the calendar
const NAMED_HOLIDAYS: ReadonlyArray<[RegExp, string]> = [
  [/\bnew\s+year/, "New Year's Day"],
  [/\b(?:mlk\s+day|martin\s+luther\s+king)\b/, "Martin Luther King Jr. Day"],
  [/\b(?:presidents'?\s+day|washington'?s\s+birthday)\b/, "Washington's Birthday"],
  [/\bmemorial\s+day\b/, "Memorial Day"],
  [/\bjuneteenth\b/, "Juneteenth National Independence Day"],
  [/\b(?:independence\s+day|fourth\s+of\s+july)\b/, "Independence Day"],
  [/\blabor\s+day\b/, "Labor Day"],
  [/\bcolumbus\s+day\b/, "Columbus Day"],
  [/\bveterans\s+day\b/, "Veterans Day"],
  [/\bthanksgiving\b/, "Thanksgiving Day"],
  [/\bchristmas\b/, "Christmas Day"],
];

const EXAMPLE_QUESTIONS: Record<QueryType, string[]> = {
  holiday_impact: [
    "Which tasks are impacted by July 4th?",
    "How many days would we prolong project delivery if no task can be completed during weekends?",
  ],
  weekend_impact: ["Which tasks start on a holiday?", "Which tasks are active on Christmas?"],
  specific_date: [
    "Which tasks start on a holiday?",
    "How many days would we prolong project delivery if no task can be completed during weekends?",
  ],
  general_query: [
    "Which tasks start on a holiday?",
    "Which tasks are impacted by July 4th?",
    "How many days would we prolong project delivery if no task can be completed during weekends?",
  ],
};

const UNDERSTANDING: Record<QueryType, string> = {
  holiday_impact: "Find tasks that start or end on a holiday",
  weekend_impact: "Estimate the project delay if no work happens on weekends",
  specific_date: "Find tasks active on a specific date",
  general_query: "General question about the project",
};

/**
 * Rule-based classifier: holiday words first, then weekend words, then
 * anything that reads as a date or a named holiday.
 */
export class KeywordIntentResolver implements IntentResolver {
  constructor(
    private readonly calendar: CalendarOracle,
    private readonly today: () => Date = () => new Date()
  ) {}

  async resolve(question: string): Promise<ResolvedIntent> {
    return this.classify(question);
  }

  classify(question: string): ResolvedIntent {
    const q = question.toLowerCase();

    if (HOLIDAY_KEYWORDS.some((k) => q.includes(k))) return this.intent("holiday_impact");
    if (WEEKEND_KEYWORDS.some((k) => q.includes(k))) return this.intent("weekend_impact");

    const named = NAMED_HOLIDAYS.find(([re]) => re.test(q));
    if (named) {
      const holiday = named[1];
      return this.intent("specific_date", this.findHoliday(holiday, q), { holiday });
    }

    for (const re of DATE_PATTERNS) {
      const m = re.exec(q);
      if (m) return this.intent("specific_date", parseLooseDate(m[0], this.today()) ?? undefined, { date_text: m[0] });
    }

    return this.intent("general_query");
  }

  private findHoliday(name: string, question: string): DateKey | undefined {
    const year = /\b(?:19|20)\d{2}\b/.exec(question);
    const holidays = this.calendar.holidaysIn(year ? Number(year[0]) : this.today().getFullYear());
    for (const [date, holidayName] of holidays) {
      if (holidayName === name) return date;
    }
    return undefined;
  }

  private intent(analysisType: QueryType, specificDate?: DateKey, entities: Record<string, unknown> = {}): ResolvedIntent {
    return {
      analysisType,
      specificDate,
      metadata: {
        source: "keyword",
        queryUnderstanding: UNDERSTANDING[analysisType],
        followUpQuestions: [...EXAMPLE_QUESTIONS[analysisType]],
        extractedEntities: specificDate ? { ...entities, date: specificDate } : entities,
      },
    };
  }
}
