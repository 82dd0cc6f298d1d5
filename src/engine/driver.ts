import { setTimeout as delay } from "node:timers/promises";
import type { Task, TaskRepository } from "../tasks/types.js";
import { systemClock, type Clock, type Logger, type Sleep } from "../types.js";
import { round3 } from "../utils/helpers.js";
import { formatWallClock } from "../utils/timezone.js";
import type { RunOutcome, TaskRunner } from "./runner.js";
import { applyRunResult } from "./stats.js";

export const DEFAULT_HORIZON_MS = 5 * 60_000;

export interface CycleDeps {
  repository: TaskRepository;
  runner: Pick<TaskRunner, "run">;
  timeZone: string;
  clock?: Clock;
  sleep?: Sleep;
  horizonMs?: number;
  logger?: Logger;
  onTaskComplete?: (task: Task, outcome: RunOutcome) => void | Promise<void>;
}

export interface TaskRunReport {
  id: string;
  name: string;
  ok: boolean;
  attempts: number;
  durationS: number;
  nextRunAtMs: number;
}

export interface CycleReport {
  startedAtMs: number;
  finishedAtMs: number;
  totalTasks: number;
  results: TaskRunReport[];
}

const defaultSleep: Sleep = (ms) => delay(ms);

/** Tasks due before `horizonMs`, earliest first. Paused tasks are included. */
export function selectDueTasks(tasks: readonly Task[], horizonMs: number): Task[] {
  return tasks.filter((t) => t.nextRunAtMs < horizonMs).sort((a, b) => a.nextRunAtMs - b.nextRunAtMs);
}

/** Soonest `nextRunAtMs` across every task; this is where the next wake-up goes. */
export function earliestDue(tasks: readonly Task[]): number | null {
  if (!tasks.length) return null;
  return Math.min(...tasks.map((t) => t.nextRunAtMs));
}

/** Runs one task, folds the result into its record and persists it. */
export async function executeTask(task: Task, deps: CycleDeps): Promise<TaskRunReport> {
  const clock = deps.clock ?? systemClock;
  const logger = deps.logger ?? console;

  logger.log(`[scheduler] Running ${task.name} (${task.id})`);
  const start = clock();
  const outcome = await deps.runner.run(task);
  const nowMs = clock();
  const durationS = round3((nowMs - start) / 1000);

  // The record may have been edited or removed while the cycle slept or the task ran.
  const current = deps.repository.fetchAll().find((t) => t.id === task.id);
  const updated = applyRunResult(current ?? task, { stdout: outcome.stdout, stderr: outcome.stderr, durationS }, { nowMs, timeZone: deps.timeZone });
  if (current) deps.repository.update(task.id, updated);
  else logger.warn(`[scheduler] ${task.name} (${task.id}) was removed during its run; result not saved`);

  const ok = outcome.stderr === "";
  const next = formatWallClock(updated.nextRunAtMs, deps.timeZone);
  if (ok) logger.log(`[scheduler] ${task.name} ok in ${durationS}s, next run ${next}`);
  else logger.warn(`[scheduler] ${task.name} failed after ${outcome.attempts} attempts (exit ${outcome.exitCode}), next run ${next}`);

  if (deps.onTaskComplete) await deps.onTaskComplete(updated, outcome);
  return { id: task.id, name: task.name, ok, attempts: outcome.attempts, durationS, nextRunAtMs: updated.nextRunAtMs };
}

/**
 * One wake cycle: every task due within the horizon runs in due-time order, each
 * one waited for until its exact due time and persisted before the next starts.
 */
export async function runCycle(deps: CycleDeps): Promise<CycleReport> {
  const clock = deps.clock ?? systemClock;
  const sleep = deps.sleep ?? defaultSleep;
  const logger = deps.logger ?? console;

  const startedAtMs = clock();
  const tasks = deps.repository.fetchAll();
  const due = selectDueTasks(tasks, startedAtMs + (deps.horizonMs ?? DEFAULT_HORIZON_MS));
  logger.log(`[scheduler] Cycle started: ${due.length} of ${tasks.length} tasks due`);

  const results: TaskRunReport[] = [];
  for (const task of due) {
    const wait = task.nextRunAtMs - clock();
    if (wait > 0) {
      logger.log(`[scheduler] Waiting ${Math.ceil(wait / 1000)}s for ${task.name}`);
      await sleep(wait);
    }
    results.push(await executeTask(task, deps));
  }

  const finishedAtMs = clock();
  logger.log(`[scheduler] Cycle finished: ${results.filter((r) => r.ok).length}/${results.length} succeeded`);
  return { startedAtMs, finishedAtMs, totalTasks: tasks.length, results };
}
