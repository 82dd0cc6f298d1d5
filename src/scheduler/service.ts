import { earliestDue, runCycle, type CycleDeps, type CycleReport } from "../engine/driver.js";
import type { ProcessLock } from "../engine/lock.js";
import { systemClock } from "../types.js";
import { errorMessage } from "../utils/helpers.js";

export interface SchedulerServiceOptions {
  /** Longest the timer sleeps before re-reading the store, so edits from other processes are noticed. */
  maxSleepMs?: number;
  /** Delay before trying again when a cycle was skipped because another one holds the lock. */
  lockRetryMs?: number;
  lock?: ProcessLock;
}

const DEFAULT_LOCK_RETRY_MS = 5_000;

/**
 * Keeps a timer armed at the soonest due task and runs a cycle whenever it fires.
 * The in-process counterpart of an OS wake-up, used by `chronorun daemon`.
 */
export class SchedulerService {
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private busy = false;
  private lastReport: CycleReport | null = null;
  private settle: { resolve: () => void; reject: (err: unknown) => void } | null = null;
  private readonly maxSleepMs: number;
  private readonly lockRetryMs: number;

  constructor(private readonly deps: CycleDeps, private readonly options: SchedulerServiceOptions = {}) {
    this.maxSleepMs = options.maxSleepMs ?? 60_000;
    this.lockRetryMs = options.lockRetryMs ?? DEFAULT_LOCK_RETRY_MS;
  }

  private get now(): number {
    return (this.deps.clock ?? systemClock)();
  }

  private getNextWakeMs(): number | null {
    return earliestDue(this.deps.repository.fetchAll());
  }

  private armTimer(minDelayMs = 0): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    if (!this.running) return;
    const next = this.getNextWakeMs();
    const untilDue = next === null ? this.maxSleepMs : next - this.now;
    const delay = Math.min(Math.max(0, untilDue, minDelayMs), this.maxSleepMs);
    this.timer = setTimeout(() => void this.onTimer(), delay);
  }

  private async onTimer(): Promise<void> {
    this.timer = null;
    try {
      const next = this.getNextWakeMs();
      let backoffMs = 0;
      if (next !== null && next <= this.now) {
        // Overdue work stays overdue until the other cycle finishes.
        if ((await this.runOnce()) === null) backoffMs = this.lockRetryMs;
      }
      this.armTimer(backoffMs);
    } catch (err) {
      (this.deps.logger ?? console).error(`[scheduler] Stopping: ${errorMessage(err)}`);
      this.halt(err);
    }
  }

  /** Runs one cycle now. Returns null when another chronorun process holds the lock. */
  async runOnce(): Promise<CycleReport | null> {
    if (this.busy) return null;
    const lock = this.options.lock;
    if (lock && !lock.tryAcquire()) {
      (this.deps.logger ?? console).warn("[scheduler] Another cycle is running; skipping");
      return null;
    }
    this.busy = true;
    try {
      this.lastReport = await runCycle(this.deps);
      return this.lastReport;
    } finally {
      this.busy = false;
      lock?.release();
    }
  }

  /** Resolves after `stop()`, rejects if a cycle fails fatally. */
  start(): Promise<void> {
    if (this.running) throw new Error("scheduler already running");
    this.running = true;
    const stopped = new Promise<void>((resolve, reject) => {
      this.settle = { resolve, reject };
    });
    this.armTimer();
    return stopped;
  }

  private halt(err?: unknown): void {
    this.running = false;
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    const settle = this.settle;
    this.settle = null;
    if (!settle) return;
    if (err === undefined) settle.resolve();
    else settle.reject(err);
  }

  stop(): void {
    this.halt();
  }

  status(): { running: boolean; tasks: number; nextWakeAtMs: number | null; lastCycle: CycleReport | null } {
    const tasks = this.deps.repository.fetchAll();
    return { running: this.running, tasks: tasks.length, nextWakeAtMs: earliestDue(tasks), lastCycle: this.lastReport };
  }
}
