import fs from "node:fs/promises";
import path from "node:path";
import { addDays } from "date-fns";
import * as XLSX from "xlsx";
import { z } from "zod";
import type { DateKey, Plan, Task } from "../types.js";
import { isDateKey, parseLooseDate, toDateKey } from "./dates.js";
import { PlanFormatError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";

export const REQUIRED_COLUMNS = [
  "Index",
  "Task Name",
  "Duration",
  "Start",
  "Finish",
  "Predecessors",
  "Successors",
] as const;

type Column = (typeof REQUIRED_COLUMNS)[number];
type Row = Partial<Record<Column, unknown>>;

export type IngestOptions = {
  logger?: Logger;
  /** Stands in for missing or unreadable dates. Defaults to the current day. */
  today?: DateKey;
};

// Excel day 0; serials before March 1900 are off by one, which no schedule cares about.
const EXCEL_EPOCH = new Date(1899, 11, 30);

const isBlank = (v: unknown) => v === null || v === undefined || (typeof v === "string" && v.trim() === "");

function freezeTask(task: Task): Task {
  return Object.freeze({
    ...task,
    end: task.end < task.start ? task.start : task.end,
    predecessors: Object.freeze([...task.predecessors]),
    successors: Object.freeze([...task.successors]),
  });
}

/** Working days from an MS Project style duration: "5 days", "2 wks", "16 hrs", "3d?", 4. */
export function parseDuration(raw: unknown, logger: Logger = silentLogger): number {
  if (isBlank(raw)) return 0;
  if (typeof raw === "number") return Number.isFinite(raw) && raw > 0 ? Math.trunc(raw) : 0;

  const text = String(raw).trim().toLowerCase();
  const m = /^(\d+(?:\.\d+)?)\s*(wks?|weeks?|w|days?|d|hours?|hrs?|h)?\s*\??$/.exec(text);
  if (!m) {
    logger.warn(`Could not parse duration '${text}'. Using 0.`);
    return 0;
  }
  const n = Number(m[1]);
  const unit = m[2] ?? "d";
  if (unit.startsWith("w")) return Math.trunc(n * 5);
  if (unit.startsWith("h")) return Math.trunc(n / 8);
  return Math.trunc(n);
}

export function parseDependencies(raw: unknown): string[] {
  if (isBlank(raw)) return [];
  return String(raw)
    .split(",")
    .map((dep) => dep.trim())
    .filter((dep) => dep.length > 0);
}

function parseDateCell(value: unknown): DateKey | null {
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : toDateKey(value);
  if (typeof value === "number") {
    return Number.isFinite(value) ? toDateKey(addDays(EXCEL_EPOCH, Math.floor(value))) : null;
  }
  if (typeof value === "string") return parseLooseDate(value);
  return null;
}

/** Rows missing an index or a name are skipped. */
export function rowsToTasks(rows: readonly Row[], opts: IngestOptions = {}): Task[] {
  const logger = opts.logger ?? silentLogger;
  const today = opts.today ?? toDateKey(new Date());

  const dateOrToday = (value: unknown, label: string, id: string): DateKey => {
    // a yyyymmdd number read as a serial lands in year 57344; only four-digit years pass
    const parsed = isBlank(value) ? null : parseDateCell(value);
    if (parsed && isDateKey(parsed)) return parsed;
    logger.warn(`Task ${id}: could not parse ${label} date '${String(value)}', using ${today}`);
    return today;
  };

  const tasks: Task[] = [];
  for (const row of rows) {
    if (isBlank(row.Index) || isBlank(row["Task Name"])) continue;
    const id = String(row.Index).trim();

    tasks.push(
      freezeTask({
        id,
        name: String(row["Task Name"]).trim(),
        start: dateOrToday(row.Start, "start", id),
        end: dateOrToday(row.Finish, "finish", id),
        duration: parseDuration(row.Duration, logger),
        predecessors: parseDependencies(row.Predecessors),
        successors: parseDependencies(row.Successors),
      })
    );
  }
  return tasks;
}

/** First sheet of an xlsx, xls or csv workbook. Date cells are read as serials. */
export function parseSpreadsheet(buffer: Buffer, opts: IngestOptions = {}): Task[] {
  // SheetJS builds Date cells from the local offset and can land a day early east of UTC
  const workbook = XLSX.read(buffer, { type: "buffer", cellDates: false });
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!sheet) throw new PlanFormatError("Workbook contains no sheets");

  const [header = [], ...body] = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    raw: true,
    defval: null,
    blankrows: false,
  });
  const columns = header.map((h) => (typeof h === "string" ? h.trim() : String(h ?? "")));

  const missing = REQUIRED_COLUMNS.filter((c) => !columns.includes(c));
  if (missing.length) {
    throw new PlanFormatError(`Missing required columns: ${missing.join(", ")}`, { missing });
  }

  const rows = body
    .filter((cells) => cells.some((c) => !isBlank(c)))
    .map((cells) => {
      const row: Row = {};
      for (const c of REQUIRED_COLUMNS) row[c] = cells[columns.indexOf(c)];
      return row;
    });

  return rowsToTasks(rows, opts);
}

const dateField = z.string().refine(isDateKey, { message: "expected a YYYY-MM-DD date" });

const jsonPlanSchema = z.object({
  tasks: z.array(
    z.object({
      id: z.union([z.string().min(1), z.number()]).transform(String),
      name: z.string().min(1),
      start: dateField,
      end: dateField,
      duration: z.union([z.number(), z.string()]).optional(),
      predecessors: z.array(z.string()).optional(),
      dependsOn: z.array(z.string()).optional(),
      successors: z.array(z.string()).optional(),
    })
  ),
});

/** `{ tasks: [...] }` with ISO dates; `dependsOn` is read as predecessors. */
export function parseJsonPlan(text: string, opts: IngestOptions = {}): Task[] {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new PlanFormatError(`Plan is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
  const parsed = jsonPlanSchema.safeParse(raw);
  if (!parsed.success) {
    throw new PlanFormatError("Plan validation failed", { issues: parsed.error.format() });
  }
  return parsed.data.tasks.map((t) =>
    freezeTask({
      id: t.id,
      name: t.name,
      start: t.start,
      end: t.end,
      duration: parseDuration(t.duration, opts.logger),
      predecessors: t.predecessors ?? t.dependsOn ?? [],
      successors: t.successors ?? [],
    })
  );
}

export function parsePlan(buffer: Buffer, filename: string, opts: IngestOptions = {}): Plan {
  const ext = path.extname(filename).toLowerCase();
  switch (ext) {
    case ".json":
      return { tasks: parseJsonPlan(buffer.toString("utf8"), opts) };
    case ".xlsx":
    case ".xls":
    case ".csv":
      return { tasks: parseSpreadsheet(buffer, opts) };
    default:
      throw new PlanFormatError(`Unsupported plan file type: ${ext || filename}`);
  }
}

export async function loadPlanFile(file: string, opts: IngestOptions = {}): Promise<Plan> {
  const buffer = await fs.readFile(path.resolve(process.cwd(), file));
  const plan = parsePlan(buffer, file, opts);
  opts.logger?.info(`Loaded ${plan.tasks.length} tasks from ${file}`);
  return plan;
}
