import fs from "node:fs";
import path from "node:path";
import os from "node:os";

export function ensureDir(dir: string): string {
  fs.mkdirSync(dir, { recursive: true });
  return dir;
}

export function expandHome(p: string): string {
  return p.replace(/^~(?=$|[\\/])/, os.homedir());
}

export function getDataPath(): string {
  const override = process.env.CHRONORUN_HOME;
  return path.resolve(override ? expandHome(override) : path.join(os.homedir(), ".chronorun"));
}

export function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function writeJsonFile(file: string, data: unknown): void {
  ensureDir(path.dirname(file));
  const tmp = `${file}.tmp`;
  fs.writeFileSync(tmp, JSON.stringify(data, null, 2), "utf8");
  fs.renameSync(tmp, file);
}
