import { spawn } from "node:child_process";

export interface ProcessResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface LaunchOptions {
  cwd: string;
  env?: NodeJS.ProcessEnv;
}

export type ProcessLauncher = (command: string, args: string[], options: LaunchOptions) => Promise<ProcessResult>;

/** Exit code reported when the executable could not be started at all. */
export const SPAWN_FAILURE_EXIT_CODE = 127;

/**
 * Runs a command without a shell and waits for it to exit, collecting both
 * streams in full. Never rejects: a spawn failure becomes exit code 127 with the
 * error on stderr.
 */
export const spawnProcess: ProcessLauncher = (command, args, options) =>
  new Promise((resolve) => {
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let settled = false;
    const finish = (result: ProcessResult) => {
      if (settled) return;
      settled = true;
      resolve(result);
    };

    const child = spawn(command, args, { cwd: options.cwd, env: options.env ?? process.env, stdio: ["ignore", "pipe", "pipe"] });
    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));
    child.on("error", (err) => {
      finish({
        exitCode: SPAWN_FAILURE_EXIT_CODE,
        stdout: Buffer.concat(stdout).toString("utf8"),
        stderr: `${Buffer.concat(stderr).toString("utf8")}${err.message}`,
      });
    });
    child.on("close", (code, signal) => {
      const err = Buffer.concat(stderr).toString("utf8");
      finish({
        exitCode: code ?? 1,
        stdout: Buffer.concat(stdout).toString("utf8"),
        stderr: signal && !err ? `Process terminated by ${signal}` : err,
      });
    });
  });
