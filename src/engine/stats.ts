import type { RunHistory, RunMark, Task } from "../tasks/types.js";
import { round3 } from "../utils/helpers.js";
import { advance } from "./recurrence.js";

export interface RunResult {
  stdout: string;
  stderr: string;
  durationS: number;
}

export interface UpdateContext extends RunResult {
  nowMs: number;
  timeZone: string;
}

type Step = (task: Task, ctx: UpdateContext) => Task;

const advanceNextRun: Step = (task, ctx) => ({
  ...task,
  nextRunAtMs: advance(task.nextRunAtMs, task.scheduleInterval, task.skipIntervals, ctx.nowMs, ctx.timeZone),
});

const stampLastRun: Step = (task, ctx) => ({ ...task, state: { ...task.state, lastRunAtMs: ctx.nowMs } });

const incrementRunCount: Step = (task) => ({ ...task, state: { ...task.state, runCount: task.state.runCount + 1 } });

const recordExecTime: Step = (task, ctx) => ({ ...task, state: { ...task.state, lastExecTimeS: ctx.durationS } });

// Reads the run count and exec time written by the two steps before it.
const recomputeAverage: Step = (task) => {
  const { avgExecTimeS, runCount, lastExecTimeS } = task.state;
  const avg = round3(((avgExecTimeS ?? 0) * (runCount - 1) + (lastExecTimeS ?? 0)) / runCount);
  return { ...task, state: { ...task.state, avgExecTimeS: avg } };
};

export function pushHistory(history: RunHistory, mark: RunMark): RunHistory {
  return [mark, history[0], history[1], history[2], history[3]];
}

const recordOutcome: Step = (task, ctx) => ({
  ...task,
  state: { ...task.state, prevFiveSuccess: pushHistory(task.state.prevFiveSuccess, ctx.stderr ? "failure" : "success") },
});

const setLastNote: Step = (task, ctx) => ({ ...task, state: { ...task.state, lastNote: ctx.stderr || ctx.stdout } });

const PIPELINE: readonly Step[] = [
  advanceNextRun,
  stampLastRun,
  incrementRunCount,
  recordExecTime,
  recomputeAverage,
  recordOutcome,
  setLastNote,
];

/** Folds a finished run into a task record. The input record is left untouched. */
export function applyRunResult(task: Task, result: RunResult, env: { nowMs: number; timeZone: string }): Task {
  const ctx: UpdateContext = { ...result, ...env };
  return PIPELINE.reduce((acc, step) => step(acc, ctx), task);
}
