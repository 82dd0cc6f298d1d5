import type { WakeupBackend } from "../config/schema.js";
import type { ProcessLauncher } from "../engine/process.js";
import type { Logger } from "../types.js";

export class WakeupError extends Error {
  override readonly name = "WakeupError";
}

/** Registers exactly one future OS wake-up, replacing whatever was armed before. */
export interface WakeupScheduler {
  readonly backend: WakeupBackend;
  arm(atMs: number): Promise<void>;
  clear(): Promise<void>;
  describe(): string;
}

export interface WakeupOptions {
  label: string;
  /** argv the OS runs on wake-up. */
  command: string[];
  /** Extra environment for the woken process. */
  environment?: Record<string, string>;
  /**
   * Zone the OS timer reads its calendar fields in. Defaults to the host's zone,
   * which is what cron and launchd use whatever zone tasks are scheduled in.
   */
  timeZone?: string;
  launcher?: ProcessLauncher;
  logger?: Logger;
}
