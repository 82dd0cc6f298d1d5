import type { WakeupBackend } from "../config/schema.js";
import { earliestDue } from "../engine/driver.js";
import type { Task } from "../tasks/types.js";
import { formatWallClock, hostTimeZone } from "../utils/timezone.js";
import { CrontabWakeup } from "./crontab.js";
import { LaunchdWakeup } from "./launchd.js";
import type { WakeupOptions, WakeupScheduler } from "./types.js";

export { WakeupError, type WakeupScheduler, type WakeupOptions } from "./types.js";

/** Logs the wake time and leaves invoking `chronorun run` to the user or `chronorun daemon`. */
export class NoopWakeup implements WakeupScheduler {
  readonly backend = "none";
  armedAtMs: number | null = null;

  private readonly timeZone: string;

  constructor(private readonly options: Pick<WakeupOptions, "timeZone" | "logger">) {
    this.timeZone = options.timeZone ?? hostTimeZone();
  }

  async arm(atMs: number): Promise<void> {
    this.armedAtMs = atMs;
    (this.options.logger ?? console).log(`[scheduler] Next wake-up due ${formatWallClock(atMs, this.timeZone)} (no OS backend)`);
  }

  async clear(): Promise<void> {
    this.armedAtMs = null;
  }

  describe(): string {
    return "none";
  }
}

export function createWakeupScheduler(backend: WakeupBackend, options: WakeupOptions): WakeupScheduler {
  switch (backend) {
    case "launchd":
      return new LaunchdWakeup(options);
    case "crontab":
      return new CrontabWakeup(options);
    case "none":
      return new NoopWakeup(options);
  }
}

/** OS timers have minute resolution and cannot fire in the past; overdue work is picked up a minute from now. */
export const MIN_WAKE_LEAD_MS = 60_000;

export function nextWakeAt(tasks: readonly Task[], nowMs: number): number | null {
  const due = earliestDue(tasks);
  return due === null ? null : Math.max(due, nowMs + MIN_WAKE_LEAD_MS);
}
