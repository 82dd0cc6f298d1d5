import fs from "node:fs";
import path from "node:path";
import { ensureDir } from "../utils/helpers.js";

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

function isAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    return isErrnoException(err) && err.code === "EPERM";
  }
}

/** A lock file is created empty and its PID written right after; an empty file this young is still being claimed. */
const EMPTY_LOCK_GRACE_MS = 10_000;

function parsePid(raw: string): number | null {
  const pid = Number.parseInt(raw.trim(), 10);
  return Number.isInteger(pid) && pid > 0 ? pid : null;
}

type LockState = "held" | "stale" | "gone";

/**
 * At most one chronorun cycle per lock file. The file holds the owner's PID; a file
 * left behind by a process that no longer exists is taken over.
 */
export class ProcessLock {
  private held = false;

  constructor(readonly lockPath: string, private readonly pid = process.pid) {}

  private readLock(): string | null {
    try {
      return fs.readFileSync(this.lockPath, "utf8");
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") return null;
      throw err;
    }
  }

  private inspect(): LockState {
    const raw = this.readLock();
    if (raw === null) return "gone";
    if (raw.trim() === "") {
      let ageMs: number;
      try {
        ageMs = Date.now() - fs.statSync(this.lockPath).mtimeMs;
      } catch (err) {
        if (isErrnoException(err) && err.code === "ENOENT") return "gone";
        throw err;
      }
      return ageMs > EMPTY_LOCK_GRACE_MS ? "stale" : "held";
    }
    const owner = parsePid(raw);
    return owner !== null && isAlive(owner) ? "held" : "stale";
  }

  holder(): number | null {
    const raw = this.readLock();
    return raw === null ? null : parsePid(raw);
  }

  tryAcquire(): boolean {
    if (this.held) return true;
    ensureDir(path.dirname(this.lockPath));
    for (let attempt = 0; attempt < 2; attempt++) {
      try {
        fs.writeFileSync(this.lockPath, String(this.pid), { encoding: "utf8", flag: "wx" });
        this.held = true;
        return true;
      } catch (err) {
        if (!isErrnoException(err) || err.code !== "EEXIST") throw err;
        const state = this.inspect();
        if (state === "held") return false;
        if (state === "stale") fs.rmSync(this.lockPath, { force: true });
      }
    }
    return false;
  }

  release(): void {
    if (!this.held) return;
    this.held = false;
    if (this.holder() === this.pid) fs.rmSync(this.lockPath, { force: true });
  }
}
