import { EMPTY_HISTORY, type Task, type TaskRepository } from "../src/tasks/types.js";

export const T0 = Date.UTC(2024, 0, 15, 12, 0, 0);
export const MINUTE = 60_000;
export const WEEK = 7 * 24 * 60 * MINUTE;

export function makeTask(overrides: Partial<Task> = {}): Task {
  return {
    id: "task-1",
    name: "backup",
    projectPath: "/tmp/project",
    entryModule: "main.py",
    nextRunAtMs: T0,
    scheduleInterval: "Weeks",
    skipIntervals: 0,
    status: "Active",
    statusChangeAtMs: null,
    notifyOnRun: false,
    createdAtMs: T0 - WEEK,
    state: {
      lastRunAtMs: null,
      runCount: 0,
      lastExecTimeS: null,
      avgExecTimeS: null,
      prevFiveSuccess: EMPTY_HISTORY,
      lastNote: "",
    },
    ...overrides,
  };
}

export class MemoryRepository implements TaskRepository {
  readonly updates: string[] = [];

  constructor(public tasks: Task[]) {}

  fetchAll(): Task[] {
    return structuredClone(this.tasks);
  }

  update(id: string, task: Task): void {
    this.updates.push(id);
    this.tasks = this.tasks.map((t) => (t.id === id ? task : t));
  }

  byId(id: string): Task | undefined {
    return this.tasks.find((t) => t.id === id);
  }
}
