import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { spawnProcess, type ProcessLauncher } from "../engine/process.js";
import { ensureDir } from "../utils/helpers.js";
import { formatWallClock, hostTimeZone, toWallClock } from "../utils/timezone.js";
import type { Logger } from "../types.js";
import { WakeupError, type WakeupOptions, type WakeupScheduler } from "./types.js";

function escapeXml(value: string): string {
  return value.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;").replace(/"/g, "&quot;");
}

const str = (value: string) => `<string>${escapeXml(value)}</string>`;

/** macOS LaunchAgent with a single StartCalendarInterval, reloaded on every arm. */
export class LaunchdWakeup implements WakeupScheduler {
  readonly backend = "launchd";
  private readonly launcher: ProcessLauncher;
  private readonly logger: Logger;
  private readonly timeZone: string;

  constructor(
    private readonly options: WakeupOptions,
    private readonly agentsDir = path.join(os.homedir(), "Library", "LaunchAgents"),
  ) {
    this.launcher = options.launcher ?? spawnProcess;
    this.logger = options.logger ?? console;
    this.timeZone = options.timeZone ?? hostTimeZone();
  }

  get plistPath(): string {
    return path.join(this.agentsDir, `${this.options.label}.plist`);
  }

  renderPlist(atMs: number): string {
    const w = toWallClock(atMs, this.timeZone);
    const env = Object.entries(this.options.environment ?? {});
    const lines = [
      `<?xml version="1.0" encoding="UTF-8"?>`,
      `<!DOCTYPE plist PUBLIC "-//Apple//DTD PLIST 1.0//EN" "http://www.apple.com/DTDs/PropertyList-1.0.dtd">`,
      `<plist version="1.0">`,
      `<dict>`,
      `  <key>Label</key>`,
      `  ${str(this.options.label)}`,
      `  <key>ProgramArguments</key>`,
      `  <array>`,
      ...this.options.command.map((arg) => `    ${str(arg)}`),
      `  </array>`,
    ];
    if (env.length) {
      lines.push(`  <key>EnvironmentVariables</key>`, `  <dict>`);
      for (const [k, v] of env) lines.push(`    <key>${escapeXml(k)}</key>`, `    ${str(v)}`);
      lines.push(`  </dict>`);
    }
    lines.push(
      `  <key>StartCalendarInterval</key>`,
      `  <dict>`,
      `    <key>Month</key>`,
      `    <integer>${w.month}</integer>`,
      `    <key>Day</key>`,
      `    <integer>${w.day}</integer>`,
      `    <key>Hour</key>`,
      `    <integer>${w.hour}</integer>`,
      `    <key>Minute</key>`,
      `    <integer>${w.minute}</integer>`,
      `  </dict>`,
      `  <key>RunAtLoad</key>`,
      `  <false/>`,
      `  <key>KeepAlive</key>`,
      `  <false/>`,
      `</dict>`,
      `</plist>`,
      ``,
    );
    return lines.join("\n");
  }

  private async launchctl(args: string[]): Promise<void> {
    const result = await this.launcher("launchctl", args, { cwd: this.agentsDir });
    if (result.exitCode !== 0) {
      throw new WakeupError(`launchctl ${args[0]} failed (exit ${result.exitCode}): ${result.stderr.trim()}`);
    }
  }

  async arm(atMs: number): Promise<void> {
    ensureDir(this.agentsDir);
    if (fs.existsSync(this.plistPath)) await this.launchctl(["unload", this.plistPath]);
    fs.writeFileSync(this.plistPath, this.renderPlist(atMs), "utf8");
    await this.launchctl(["load", this.plistPath]);
    this.logger.log(`[scheduler] Wake-up armed via launchd for ${formatWallClock(atMs, this.timeZone)}`);
  }

  async clear(): Promise<void> {
    if (!fs.existsSync(this.plistPath)) return;
    await this.launchctl(["unload", this.plistPath]);
    fs.rmSync(this.plistPath, { force: true });
  }

  describe(): string {
    return `launchd (${this.plistPath}${fs.existsSync(this.plistPath) ? "" : ", not armed"}, host time ${this.timeZone})`;
  }
}
