import fs from "node:fs";
import { nanoid } from "nanoid";
import { z } from "zod";
import { errorMessage, writeJsonFile } from "../utils/helpers.js";
import { SCHEDULE_INTERVALS, TASK_STATUSES, type Task, type TaskRepository, type TaskStatus, type TaskStoreFile } from "./types.js";

export class TaskStoreError extends Error {
  override readonly name = "TaskStoreError";
}

const runMark = z.enum(["success", "failure", "unset"]);
const instant = z.number().finite();

const taskSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  projectPath: z.string(),
  entryModule: z.string(),
  nextRunAtMs: instant,
  scheduleInterval: z.enum(SCHEDULE_INTERVALS),
  skipIntervals: z.number().int().nonnegative(),
  status: z.enum(TASK_STATUSES),
  statusChangeAtMs: instant.nullable(),
  notifyOnRun: z.boolean(),
  createdAtMs: instant,
  state: z.object({
    lastRunAtMs: instant.nullable(),
    runCount: z.number().int().nonnegative(),
    lastExecTimeS: z.number().nonnegative().nullable(),
    avgExecTimeS: z.number().nonnegative().nullable(),
    prevFiveSuccess: z.tuple([runMark, runMark, runMark, runMark, runMark]),
    lastNote: z.string(),
  }),
});

const storeFileSchema: z.ZodType<TaskStoreFile> = z.object({
  version: z.literal(1),
  tasks: z.array(taskSchema),
});

/**
 * JSON-file task repository. Every operation reads the file, applies its change and
 * writes it back, so edits made by another chronorun process between two calls are
 * never overwritten with a stale copy.
 */
export class TaskStore implements TaskRepository {
  constructor(readonly storePath: string) {}

  private read(): TaskStoreFile {
    if (!fs.existsSync(this.storePath)) return { version: 1, tasks: [] };
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.storePath, "utf8"));
    } catch (err) {
      throw new TaskStoreError(`Failed to read task store ${this.storePath}: ${errorMessage(err)}`);
    }
    const parsed = storeFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "root"}: ${i.message}`);
      throw new TaskStoreError(`Invalid task store ${this.storePath}: ${issues.join("; ")}`);
    }
    return parsed.data;
  }

  private write(store: TaskStoreFile): void {
    writeJsonFile(this.storePath, store);
  }

  fetchAll(): Task[] {
    return this.read().tasks;
  }

  get(id: string): Task | null {
    return this.read().tasks.find((t) => t.id === id) ?? null;
  }

  add(input: Omit<Task, "id">): Task {
    const store = this.read();
    const task: Task = { ...input, id: nanoid(10) };
    store.tasks.push(task);
    this.write(store);
    return task;
  }

  update(id: string, task: Task): void {
    const store = this.read();
    const idx = store.tasks.findIndex((t) => t.id === id);
    if (idx === -1) throw new TaskStoreError(`Task ${id} not found`);
    store.tasks[idx] = { ...task, id };
    this.write(store);
  }

  remove(id: string): boolean {
    const store = this.read();
    const before = store.tasks.length;
    store.tasks = store.tasks.filter((t) => t.id !== id);
    const removed = store.tasks.length < before;
    if (removed) this.write(store);
    return removed;
  }

  setStatus(id: string, status: TaskStatus): Task | null {
    const task = this.get(id);
    if (!task) return null;
    const next: Task = { ...task, status };
    this.update(id, next);
    return next;
  }

  setNotify(id: string, notifyOnRun: boolean): Task | null {
    const task = this.get(id);
    if (!task) return null;
    const next: Task = { ...task, notifyOnRun };
    this.update(id, next);
    return next;
  }
}
