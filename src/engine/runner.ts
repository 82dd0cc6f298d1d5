import path from "node:path";
import type { Task } from "../tasks/types.js";
import { spawnProcess, type ProcessLauncher } from "./process.js";

/** One run plus at most one automatic retry. */
export const MAX_ATTEMPTS = 2;

export interface RunOutcome {
  stdout: string;
  stderr: string;
  exitCode: number;
  attempts: number;
}

export interface TaskRunnerOptions {
  /** Interpreter per entry-module extension (".py" -> "python3"). Unmapped scripts run directly. */
  interpreters?: Record<string, string>;
  launcher?: ProcessLauncher;
}

export class TaskRunner {
  private readonly interpreters: Record<string, string>;
  private readonly launcher: ProcessLauncher;

  constructor(options: TaskRunnerOptions = {}) {
    this.interpreters = options.interpreters ?? {};
    this.launcher = options.launcher ?? spawnProcess;
  }

  commandFor(task: Task): { command: string; args: string[]; cwd: string } {
    const cwd = path.resolve(task.projectPath);
    const script = path.resolve(cwd, task.entryModule);
    const interpreter = this.interpreters[path.extname(script).toLowerCase()];
    return interpreter ? { command: interpreter, args: [script], cwd } : { command: script, args: [], cwd };
  }

  async run(task: Task): Promise<RunOutcome> {
    const { command, args, cwd } = this.commandFor(task);
    let outcome: RunOutcome = { stdout: "", stderr: "", exitCode: 0, attempts: 0 };
    for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
      const result = await this.launcher(command, args, { cwd });
      if (result.exitCode === 0) return { stdout: result.stdout, stderr: "", exitCode: 0, attempts: attempt };
      outcome = {
        stdout: result.stdout,
        stderr: result.stderr || `Process exited with code ${result.exitCode}`,
        exitCode: result.exitCode,
        attempts: attempt,
      };
    }
    return outcome;
  }
}
