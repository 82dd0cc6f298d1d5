import fs from "node:fs";
import path from "node:path";
import { isScheduleInterval } from "../engine/recurrence.js";
import { daysInMonth, fromWallClock, toWallClock } from "../utils/timezone.js";
import { EMPTY_HISTORY, SCHEDULE_INTERVALS, type ScheduleInterval, type Task, type TaskStatus } from "./types.js";

/** Raw task fields as a user types them. */
export interface TaskInput {
  name: string;
  projectPath: string;
  entryModule: string;
  /** MM/DD/YYYY */
  startDate: string;
  /** h:mm */
  startTime: string;
  amPm: string;
  scheduleInterval: string;
  skipIntervals: string;
  /** MM/DD/YYYY, or empty for none */
  statusChangeDate: string;
  notifyOnRun: boolean;
  status: TaskStatus;
}

export type TaskFields = Pick<
  Task,
  "name" | "projectPath" | "entryModule" | "nextRunAtMs" | "scheduleInterval" | "skipIntervals" | "status" | "statusChangeAtMs" | "notifyOnRun"
>;

export class TaskInputError extends Error {
  override readonly name = "TaskInputError";

  constructor(readonly title: string, message: string) {
    super(message);
  }
}

const REQUIRED: Array<[keyof TaskInput, string]> = [
  ["name", "Name"],
  ["projectPath", "Project Path"],
  ["entryModule", "Entry Module"],
  ["startDate", "Start Date"],
  ["startTime", "Start Time"],
  ["amPm", "AM/PM"],
  ["scheduleInterval", "Schedule Interval"],
  ["skipIntervals", "Skip Intervals"],
];

const pad2 = (n: number) => String(n).padStart(2, "0");

function parseDate(value: string): { year: number; month: number; day: number } | null {
  const m = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/.exec(value.trim());
  if (!m) return null;
  const [month, day, year] = [Number(m[1]), Number(m[2]), Number(m[3])];
  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) return null;
  return { year, month, day };
}

function parseTime(value: string, amPm: string): { hour: number; minute: number } | null {
  const m = /^(\d{1,2}):(\d{2})$/.exec(value.trim());
  const meridiem = amPm.trim().toUpperCase();
  if (!m || (meridiem !== "AM" && meridiem !== "PM")) return null;
  const [hour12, minute] = [Number(m[1]), Number(m[2])];
  if (hour12 < 1 || hour12 > 12 || minute > 59) return null;
  return { hour: (hour12 % 12) + (meridiem === "PM" ? 12 : 0), minute };
}

function normalizeInterval(value: string): ScheduleInterval | null {
  const v = value.trim();
  const candidate = `${v.charAt(0).toUpperCase()}${v.slice(1).toLowerCase()}`;
  return isScheduleInterval(candidate) ? candidate : null;
}

export function formatDate(ms: number, timeZone: string): string {
  const w = toWallClock(ms, timeZone);
  return `${pad2(w.month)}/${pad2(w.day)}/${w.year}`;
}

/** Form values for a new task: tomorrow at 9:00 AM, weekly, notifications on. */
export function defaultTaskInput(nowMs: number, timeZone: string): TaskInput {
  return {
    name: "",
    projectPath: "",
    entryModule: "",
    startDate: formatDate(nowMs + 24 * 60 * 60_000, timeZone),
    startTime: "9:00",
    amPm: "AM",
    scheduleInterval: "Weeks",
    skipIntervals: "0",
    statusChangeDate: "",
    notifyOnRun: true,
    status: "Active",
  };
}

/** Form values that reproduce an existing task, for editing. */
export function taskInputFrom(task: Task, timeZone: string): TaskInput {
  const w = toWallClock(task.nextRunAtMs, timeZone);
  return {
    name: task.name,
    projectPath: task.projectPath,
    entryModule: task.entryModule,
    startDate: formatDate(task.nextRunAtMs, timeZone),
    startTime: `${w.hour % 12 || 12}:${pad2(w.minute)}`,
    amPm: w.hour < 12 ? "AM" : "PM",
    scheduleInterval: task.scheduleInterval,
    skipIntervals: String(task.skipIntervals),
    statusChangeDate: task.statusChangeAtMs === null ? "" : formatDate(task.statusChangeAtMs, timeZone),
    notifyOnRun: task.notifyOnRun,
    status: task.status,
  };
}

export interface ValidateOptions {
  nowMs: number;
  timeZone: string;
  /** Check that the project directory and entry module exist. */
  checkFiles?: boolean;
}

/** Validates form input in the order the form reports errors; the first failure throws. */
export function validateTaskInput(input: TaskInput, options: ValidateOptions): TaskFields {
  const { nowMs, timeZone } = options;

  const missing = REQUIRED.filter(([key]) => String(input[key]).trim() === "").map(([, label]) => label);
  if (missing.length) throw new TaskInputError("Missing Required Fields", `Missing required fields: ${missing.join(", ")}`);

  const start = parseDate(input.startDate);
  const statusChange = input.statusChangeDate.trim() ? parseDate(input.statusChangeDate) : null;
  const badDates = [
    ...(start ? [] : ["Start Date"]),
    ...(input.statusChangeDate.trim() && !statusChange ? ["Status Change Date"] : []),
  ];
  if (badDates.length) {
    throw new TaskInputError("Wrong Date Format", `Error in ${badDates.join(", ")}. Format should be MM/DD/YYYY.`);
  }

  const time = parseTime(input.startTime, input.amPm);
  if (!start || !time) throw new TaskInputError("Wrong Time Format", "Error in Start Time. Format should be h:mm followed by AM or PM.");

  const nextRunAtMs = fromWallClock({ ...start, ...time, second: 0, millisecond: 0 }, timeZone);
  if (nextRunAtMs <= nowMs) throw new TaskInputError("Start Date Error", "Start Date and Time must be in the future.");

  let statusChangeAtMs: number | null = null;
  if (statusChange) {
    statusChangeAtMs = fromWallClock({ ...statusChange, hour: 23, minute: 59, second: 0, millisecond: 0 }, timeZone);
    if (statusChangeAtMs < nextRunAtMs) {
      throw new TaskInputError("Status Change Date Before Start Date", "Status Change Date must be after Start Date.");
    }
  }

  const skip = Number(input.skipIntervals);
  if (!Number.isInteger(skip) || skip < 0) {
    throw new TaskInputError("Input Error", "Error in Skip Intervals. Value must be a non-negative integer.");
  }

  const scheduleInterval = normalizeInterval(input.scheduleInterval);
  if (!scheduleInterval) {
    throw new TaskInputError("Input Error", `Schedule Interval must be one of ${SCHEDULE_INTERVALS.join(", ")}.`);
  }

  const projectPath = path.resolve(input.projectPath.trim());
  const entryModule = input.entryModule.trim();
  if (options.checkFiles ?? true) {
    if (!fs.existsSync(projectPath)) throw new TaskInputError("Project Does Not Exist", `Project does not exist: ${projectPath}`);
    const modulePath = path.resolve(projectPath, entryModule);
    if (!fs.existsSync(modulePath) || !fs.statSync(modulePath).isFile()) {
      throw new TaskInputError("Module Not Found", `Module not found: ${modulePath}`);
    }
  }

  return {
    name: input.name.trim(),
    projectPath,
    entryModule,
    nextRunAtMs,
    scheduleInterval,
    skipIntervals: skip,
    status: input.status,
    statusChangeAtMs,
    notifyOnRun: input.notifyOnRun,
  };
}

export function newTask(fields: TaskFields, nowMs: number): Omit<Task, "id"> {
  return {
    ...fields,
    createdAtMs: nowMs,
    state: {
      lastRunAtMs: null,
      runCount: 0,
      lastExecTimeS: null,
      avgExecTimeS: null,
      prevFiveSuccess: EMPTY_HISTORY,
      lastNote: "",
    },
  };
}

/** Overwrites the user-editable fields; identity, creation time and run statistics stay. */
export function applyEdit(task: Task, fields: TaskFields): Task {
  return { ...task, ...fields };
}
