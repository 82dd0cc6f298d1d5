import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi, type MockInstance } from "vitest";
import { buildProgram, describeSchedule, formatHistory } from "../src/cli/commands.js";
import { TaskStore } from "../src/tasks/store.js";
import { hostTimeZone } from "../src/utils/timezone.js";
import { makeTask } from "./fixtures.js";

describe("chronorun cli", () => {
  let dir: string;
  let configPath: string;
  let storePath: string;
  let log: MockInstance<typeof console.log>;

  const cli = (...args: string[]) => buildProgram().parseAsync(["node", "chronorun", "--config", configPath, ...args]);
  const output = () => log.mock.calls.map((call) => call.map(String).join(" ")).join("\n");
  const addHello = () =>
    cli("task", "add", "--name", "hello", "--path", dir, "--module", "hello.js", "--date", "01/15/2099", "--time", "9:00", "--am-pm", "AM", "--interval", "Days");

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "chronorun-cli-"));
    configPath = path.join(dir, "config.json");
    storePath = path.join(dir, "tasks.json");
    vi.stubEnv("CHRONORUN_HOME", dir);
    fs.writeFileSync(path.join(dir, "hello.js"), `process.stdout.write("hello\\n");\n`);
    fs.writeFileSync(
      configPath,
      JSON.stringify({
        timeZone: "UTC",
        storePath,
        lockPath: path.join(dir, "run.lock"),
        runner: { interpreters: { ".js": process.execPath } },
        wakeup: { backend: "none" },
      }),
    );
    log = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    process.exitCode = undefined;
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test("task add stores a validated task", async () => {
    await addHello();
    const [task] = new TaskStore(storePath).fetchAll();
    expect(task).toMatchObject({
      name: "hello",
      projectPath: dir,
      entryModule: "hello.js",
      nextRunAtMs: Date.UTC(2099, 0, 15, 9, 0),
      scheduleInterval: "Days",
      skipIntervals: 0,
      status: "Active",
      notifyOnRun: true,
    });
    expect(output()).toContain(`Added task 'hello' (${task?.id}), first run 2099-01-15 09:00`);
    expect(process.exitCode).toBeUndefined();
  });

  test("invalid input is reported and nothing is stored", async () => {
    await cli("task", "add", "--name", "hello", "--path", dir, "--module", "hello.js", "--date", "13/45/2099");
    expect(output()).toContain("Wrong Date Format: Error in Start Date. Format should be MM/DD/YYYY.");
    expect(process.exitCode).toBe(1);
    expect(new TaskStore(storePath).fetchAll()).toEqual([]);
  });

  test("run executes due tasks and records the outcome", async () => {
    await addHello();
    const store = new TaskStore(storePath);
    const [added] = store.fetchAll();
    if (!added) throw new Error("task was not added");
    const dueAt = Date.now() - 60_000;
    store.update(added.id, { ...added, nextRunAtMs: dueAt });

    await cli("run");

    const ran = store.get(added.id);
    expect(ran?.state.runCount).toBe(1);
    expect(ran?.state.lastNote).toBe("hello\n");
    expect(ran?.state.prevFiveSuccess).toEqual(["success", "unset", "unset", "unset", "unset"]);
    expect(ran?.nextRunAtMs).toBe(dueAt + 24 * 60 * 60_000);
    expect(fs.existsSync(path.join(dir, "run.lock"))).toBe(false);
  });

  test("task run executes one task immediately", async () => {
    await addHello();
    const [added] = new TaskStore(storePath).fetchAll();
    if (!added) throw new Error("task was not added");

    await cli("task", "run", added.id);

    const ran = new TaskStore(storePath).get(added.id);
    expect(ran?.state.runCount).toBe(1);
    expect(ran?.nextRunAtMs).toBe(added.nextRunAtMs);
    expect(output()).toContain("Task executed");
  });

  test("pause, resume and list", async () => {
    await addHello();
    const [added] = new TaskStore(storePath).fetchAll();
    if (!added) throw new Error("task was not added");

    await cli("task", "pause", added.id);
    expect(new TaskStore(storePath).get(added.id)?.status).toBe("Paused");
    await cli("task", "resume", added.id);
    expect(new TaskStore(storePath).get(added.id)?.status).toBe("Active");

    log.mockClear();
    await cli("task", "list", "--json");
    const listed: unknown = JSON.parse(output());
    expect(listed).toEqual([new TaskStore(storePath).get(added.id)]);
  });

  test("the OS wake-up keeps host time when tasks use another zone", async () => {
    fs.writeFileSync(
      configPath,
      JSON.stringify({ timeZone: "America/New_York", storePath, lockPath: path.join(dir, "run.lock"), wakeup: { backend: "crontab" } }),
    );
    await cli("status");
    expect(output()).toContain("Time zone: America/New_York");
    expect(output()).toContain(`Wake-up: crontab (# chronorun:com.chronorun.execute, host time ${hostTimeZone()})`);
  });

  test("unknown task ids are reported", async () => {
    await cli("task", "show", "nope");
    expect(output()).toContain("Task nope not found");
    expect(process.exitCode).toBe(1);
  });

  test("task remove deletes the record", async () => {
    await addHello();
    const [added] = new TaskStore(storePath).fetchAll();
    if (!added) throw new Error("task was not added");
    await cli("task", "remove", added.id);
    expect(new TaskStore(storePath).fetchAll()).toEqual([]);
    expect(output()).toContain(`Removed task ${added.id}`);
  });
});

describe("task formatting", () => {
  test("describes the recurrence", () => {
    expect(describeSchedule({ scheduleInterval: "Weeks", skipIntervals: 0 })).toBe("every week");
    expect(describeSchedule({ scheduleInterval: "Days", skipIntervals: 2 })).toBe("every 3 days");
  });

  test("renders the last five outcomes, newest first", () => {
    const task = makeTask();
    const history = { ...task, state: { ...task.state, prevFiveSuccess: ["success", "failure", "unset", "unset", "unset"] as const } };
    expect(formatHistory(history)).toBe("✓✗---");
  });
});
