import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { spawnProcess, type ProcessLauncher } from "../engine/process.js";
import { formatWallClock, hostTimeZone, toWallClock } from "../utils/timezone.js";
import type { Logger } from "../types.js";
import { WakeupError, type WakeupOptions, type WakeupScheduler } from "./types.js";

export function shellQuote(arg: string): string {
  if (/^[\w@%+=:,./-]+$/.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/**
 * A tagged line in the user's crontab. The entry names a month, day, hour and
 * minute, and every cycle replaces it, so it fires once.
 */
export class CrontabWakeup implements WakeupScheduler {
  readonly backend = "crontab";
  private readonly launcher: ProcessLauncher;
  private readonly logger: Logger;
  private readonly timeZone: string;

  constructor(private readonly options: WakeupOptions) {
    this.launcher = options.launcher ?? spawnProcess;
    this.logger = options.logger ?? console;
    this.timeZone = options.timeZone ?? hostTimeZone();
  }

  get marker(): string {
    return `# chronorun:${this.options.label}`;
  }

  renderEntry(atMs: number): string {
    const w = toWallClock(atMs, this.timeZone);
    const env = Object.entries(this.options.environment ?? {}).map(([k, v]) => `${k}=${shellQuote(v)}`);
    // cron turns an unescaped % into a newline
    const command = [...env, ...this.options.command.map(shellQuote)].join(" ").replace(/%/g, "\\%");
    return `${w.minute} ${w.hour} ${w.day} ${w.month} * ${command} ${this.marker}`;
  }

  private async read(): Promise<string[]> {
    const result = await this.launcher("crontab", ["-l"], { cwd: os.tmpdir() });
    if (result.exitCode !== 0) {
      if (/no crontab/i.test(result.stderr)) return [];
      throw new WakeupError(`crontab -l failed (exit ${result.exitCode}): ${result.stderr.trim()}`);
    }
    return result.stdout.split("\n").filter((line) => line.length > 0);
  }

  private async write(lines: string[]): Promise<void> {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "chronorun-cron-"));
    const file = path.join(dir, "crontab");
    try {
      fs.writeFileSync(file, lines.length ? `${lines.join("\n")}\n` : "", "utf8");
      const result = await this.launcher("crontab", [file], { cwd: dir });
      if (result.exitCode !== 0) throw new WakeupError(`crontab install failed (exit ${result.exitCode}): ${result.stderr.trim()}`);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  }

  async arm(atMs: number): Promise<void> {
    const lines = (await this.read()).filter((line) => !line.endsWith(this.marker));
    lines.push(this.renderEntry(atMs));
    await this.write(lines);
    this.logger.log(`[scheduler] Wake-up armed via crontab for ${formatWallClock(atMs, this.timeZone)}`);
  }

  async clear(): Promise<void> {
    const lines = await this.read();
    const kept = lines.filter((line) => !line.endsWith(this.marker));
    if (kept.length !== lines.length) await this.write(kept);
  }

  describe(): string {
    return `crontab (${this.marker}, host time ${this.timeZone})`;
  }
}
