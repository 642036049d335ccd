import { describe, expect, it } from "vitest";
import type { AppDeps } from "../deps.js";
import { ProjectCalendar } from "../lib/calendar.js";
import { usFederalHolidays } from "../lib/holidays.js";
import { KeywordIntentResolver } from "../lib/intent-resolver.js";
import { silentLogger } from "../lib/logger.js";
import { PlanSession } from "../lib/session.js";
import { mockReq, mockRes, runHandlers, task } from "../test/helpers.js";
import { analyzeRoute } from "./analyze.js";
import { calendarRangeRoute, holidaysRoute } from "./calendar.js";
import { showPlanRoute, uploadPlanRoute } from "./plan.js";
import { queryRoute } from "./query.js";

function makeDeps(withPlan = true): AppDeps {
  const calendar = new ProjectCalendar({ holidays: usFederalHolidays({ firstYear: 2000, lastYear: 2099 }) });
  const session = new PlanSession(() => new Date("2025-01-15T10:00:00.000Z"));
  if (withPlan) {
    session.load([task("1", "2025-07-04", "2025-07-10", "Foundation works"), task("2", "2025-07-07", "2025-07-09")], "plan.json");
  }
  return {
    session,
    calendar,
    resolver: new KeywordIntentResolver(calendar, () => new Date(2025, 0, 15)),
    logger: silentLogger,
    uploadLimitBytes: 1024 * 1024,
  };
}

describe("POST /query", () => {
  it("answers a question", async () => {
    const res = mockRes();
    await runHandlers(queryRoute(makeDeps()), mockReq({ body: { question: "Which tasks start on a holiday?" } }), res);
    expect(res.statusCode).toBe(200);
    expect(res.body).toMatchObject({
      question: "Which tasks start on a holiday?",
      intent: { analysisType: "holiday_impact" },
      reply: { text: "Found 1 tasks impacted by holidays" },
    });
  });

  it("blank question => 400", async () => {
    const res = mockRes();
    await runHandlers(queryRoute(makeDeps()), mockReq({ body: { question: "   " } }), res);
    expect(res.statusCode).toBe(400);
    expect(res.body).toMatchObject({ error: { code: "INVALID_INPUT", message: "A non-empty question is required" } });
  });

  it("no plan => 409", async () => {
    const res = mockRes();
    await runHandlers(queryRoute(makeDeps(false)), mockReq({ body: { question: "Any holidays?" } }), res);
    expect(res.statusCode).toBe(409);
    expect(res.body).toEqual({ error: { code: "NO_PLAN", message: "No project plan loaded. Upload a plan first." } });
  });
});

describe("POST /analyze", () => {
  it("runs the weekend analysis", async () => {
    const res = mockRes();
    await runHandlers(analyzeRoute(makeDeps()), mockReq({ body: { analysis_type: "weekend_impact" } }), res);
    expect(res.body).toMatchObject({
      totalProjectDelay: 2,
      analysisSummary: "Project would be delayed by approximately 2 days if no weekend work is allowed.",
    });
  });

  it("unknown analysis types get the invalid result, not an error", async () => {
    const res = mockRes();
    await runHandlers(analyzeRoute(makeDeps()), mockReq({ body: { analysis_type: "moon_phase" } }), res);
    expect(res.statusCode).toBe(200);
    expect(res.body).toEqual({ impactedTasks: [], analysisSummary: "Invalid query type or missing required parameters" });
  });

  it("malformed date => 400", async () => {
    const res = mockRes();
    const req = mockReq({ body: { analysis_type: "specific_date", specific_date: "07/04/2025" } });
    await runHandlers(analyzeRoute(makeDeps()), req, res);
    expect(res.statusCode).toBe(400);
    expect(res.body).toMatchObject({ error: { message: "Invalid analysis request" } });
  });
});

describe("GET /plan", () => {
  it("404 before any upload", async () => {
    const res = mockRes();
    await runHandlers(showPlanRoute(makeDeps(false)), mockReq(), res);
    expect(res.statusCode).toBe(404);
  });

  it("returns the loaded plan with its overview", async () => {
    const res = mockRes();
    await runHandlers(showPlanRoute(makeDeps()), mockReq(), res);
    expect(res.body).toMatchObject({
      source: "plan.json",
      loadedAt: "2025-01-15T10:00:00.000Z",
      overview: { taskCount: 2, holidayTaskCount: 1, weekendTaskCount: 0 },
    });
  });
});

describe("POST /plan", () => {
  // the multer middleware is skipped; req.file is set directly
  const [, handle] = uploadPlanRoute(makeDeps());

  it("replaces the session plan", async () => {
    const deps = makeDeps(false);
    const [, upload] = uploadPlanRoute(deps);
    const plan = { tasks: [{ id: "7", name: "Roofing", start: "2025-07-05", end: "2025-07-08" }] };
    const res = mockRes();
    await runHandlers(
      [upload],
      mockReq({ file: { buffer: Buffer.from(JSON.stringify(plan)), originalname: "roof.json" } }),
      res
    );

    expect(res.statusCode).toBe(200);
    expect(res.body).toEqual({
      source: "roof.json",
      loadedAt: "2025-01-15T10:00:00.000Z",
      overview: { taskCount: 1, holidayTaskCount: 0, weekendTaskCount: 1 },
    });
    expect(deps.session.require().tasks.map((t) => t.id)).toEqual(["7"]);
  });

  it("no file => 400", async () => {
    const res = mockRes();
    await runHandlers([handle], mockReq(), res);
    expect(res.statusCode).toBe(400);
    expect(res.body).toEqual({ error: { code: "INVALID_INPUT", message: "No plan file uploaded" } });
  });

  it("unreadable plan => 400", async () => {
    const res = mockRes();
    const req = mockReq({ file: { buffer: Buffer.from("id,name"), originalname: "plan.txt" } });
    await runHandlers([handle], req, res);
    expect(res.statusCode).toBe(400);
    expect(res.body).toEqual({ error: { code: "INVALID_INPUT", message: "Unsupported plan file type: .txt" } });
  });
});

describe("GET /calendar", () => {
  it("summarizes a range", async () => {
    const res = mockRes();
    await runHandlers(calendarRangeRoute(makeDeps()), mockReq({ query: { start: "2025-07-03", end: "2025-07-06" } }), res);
    expect(res.body).toEqual({
      start: "2025-07-03",
      end: "2025-07-06",
      businessDays: 1,
      nonWorking: [
        { date: "2025-07-04", reason: "Holiday: Independence Day" },
        { date: "2025-07-05", reason: "Weekend" },
        { date: "2025-07-06", reason: "Weekend" },
      ],
      nextWorkingDay: "2025-07-07",
    });
  });

  it("missing bounds => 400", async () => {
    const res = mockRes();
    await runHandlers(calendarRangeRoute(makeDeps()), mockReq({ query: { start: "2025-07-03" } }), res);
    expect(res.statusCode).toBe(400);
  });

  it("lists a year's holidays", async () => {
    const res = mockRes();
    await runHandlers(holidaysRoute(makeDeps()), mockReq({ params: { year: "2025" } }), res);
    expect(res.body).toMatchObject({ year: 2025 });
    expect(res.body).toHaveProperty(["holidays", 0], { date: "2025-01-01", name: "New Year's Day" });
  });

  it("non-numeric year => 400", async () => {
    const res = mockRes();
    await runHandlers(holidaysRoute(makeDeps()), mockReq({ params: { year: "next" } }), res);
    expect(res.statusCode).toBe(400);
  });
});
