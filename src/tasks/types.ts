export const SCHEDULE_INTERVALS = ["Minutes", "Hours", "Days", "Weeks", "Months", "Years"] as const;
export type ScheduleInterval = (typeof SCHEDULE_INTERVALS)[number];

export const TASK_STATUSES = ["Active", "Paused"] as const;
export type TaskStatus = (typeof TASK_STATUSES)[number];

export type RunMark = "success" | "failure" | "unset";

/** Most recent run first. */
export type RunHistory = readonly [RunMark, RunMark, RunMark, RunMark, RunMark];

export const EMPTY_HISTORY: RunHistory = ["unset", "unset", "unset", "unset", "unset"];

export interface TaskState {
  lastRunAtMs: number | null;
  runCount: number;
  lastExecTimeS: number | null;
  avgExecTimeS: number | null;
  prevFiveSuccess: RunHistory;
  lastNote: string;
}

export interface Task {
  id: string;
  name: string;
  projectPath: string;
  entryModule: string;
  nextRunAtMs: number;
  scheduleInterval: ScheduleInterval;
  skipIntervals: number;
  status: TaskStatus;
  /** When a pending status flip should happen. Shown to the user, never applied automatically. */
  statusChangeAtMs: number | null;
  notifyOnRun: boolean;
  createdAtMs: number;
  state: TaskState;
}

export interface TaskStoreFile {
  version: 1;
  tasks: Task[];
}

/** The part of the store the execution engine depends on. */
export interface TaskRepository {
  fetchAll(): Task[];
  update(id: string, task: Task): void;
}
