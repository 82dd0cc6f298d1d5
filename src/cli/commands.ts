import fs from "node:fs";
import path from "node:path";
import readline from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";
import { Command } from "commander";
import prompts, { type PromptObject } from "prompts";
import chalk from "chalk";
import { loadConfig, saveConfig, getConfigPath } from "../config/loader.js";
import { createDefaultConfig, defaultBackendFor, resolveSettings, type Config, type Settings } from "../config/schema.js";
import { earliestDue, executeTask, runCycle, type CycleDeps } from "../engine/driver.js";
import { ProcessLock } from "../engine/lock.js";
import { TaskRunner, type RunOutcome } from "../engine/runner.js";
import { SchedulerService } from "../scheduler/service.js";
import {
  applyEdit,
  defaultTaskInput,
  newTask,
  taskInputFrom,
  validateTaskInput,
  TaskInputError,
  type TaskInput,
} from "../tasks/form.js";
import { TaskStore } from "../tasks/store.js";
import { SCHEDULE_INTERVALS, type RunMark, type Task } from "../tasks/types.js";
import { ensureDir, errorMessage, getDataPath } from "../utils/helpers.js";
import { formatWallClock } from "../utils/timezone.js";
import { createWakeupScheduler, nextWakeAt, type WakeupScheduler } from "../wakeup/index.js";

interface Runtime {
  configPath: string;
  config: Config;
  settings: Settings;
  store: TaskStore;
  runner: TaskRunner;
  wakeup: WakeupScheduler;
}

interface TaskFlags {
  name?: string;
  path?: string;
  module?: string;
  date?: string;
  time?: string;
  amPm?: string;
  interval?: string;
  skip?: string;
  statusChange?: string;
  notify?: boolean;
  paused?: boolean;
  interactive?: boolean;
}

const MARKS: Record<RunMark, string> = { success: "✓", failure: "✗", unset: "-" };

function wakeCommand(configPath: string, explicitConfig: boolean, config: Config): string[] {
  if (config.wakeup.command.length) return config.wakeup.command;
  const entry = path.resolve(process.argv[1] ?? "chronorun");
  return [process.execPath, entry, ...(explicitConfig ? ["--config", configPath] : []), "run"];
}

function loadRuntime(configOpt: string | undefined): Runtime {
  const configPath = path.resolve(configOpt ?? getConfigPath());
  const config = loadConfig(configPath);
  const settings = resolveSettings(config);
  const environment: Record<string, string> = {};
  if (process.env.CHRONORUN_HOME) environment.CHRONORUN_HOME = getDataPath();
  return {
    configPath,
    config,
    settings,
    store: new TaskStore(settings.storePath),
    runner: new TaskRunner({ interpreters: settings.interpreters }),
    wakeup: createWakeupScheduler(settings.wakeup.backend, {
      label: settings.wakeup.label,
      command: wakeCommand(configPath, configOpt !== undefined, config),
      environment,
    }),
  };
}

function reportError(err: unknown): void {
  if (err instanceof TaskInputError) console.log(chalk.red(`${err.title}: ${err.message}`));
  else console.log(chalk.red(`Error: ${errorMessage(err)}`));
  process.exitCode = 1;
}

async function rearm(rt: Runtime): Promise<void> {
  const at = nextWakeAt(rt.store.fetchAll(), Date.now());
  try {
    if (at === null) {
      await rt.wakeup.clear();
      console.log(chalk.gray("No tasks scheduled; wake-up cleared."));
    } else {
      await rt.wakeup.arm(at);
    }
  } catch (err) {
    console.warn(chalk.yellow(`Warning: could not arm wake-up: ${errorMessage(err)}`));
  }
}

function notifyOnComplete(timeZone: string): (task: Task, outcome: RunOutcome) => void {
  return (task, outcome) => {
    if (!task.notifyOnRun) return;
    const next = formatWallClock(task.nextRunAtMs, timeZone);
    if (outcome.stderr) console.log(chalk.red(`✗ ${task.name} failed: ${outcome.stderr.trim().split("\n")[0] ?? ""} (next ${next})`));
    else console.log(chalk.green(`✓ ${task.name} finished (next ${next})`));
  };
}

function cycleDeps(rt: Runtime): CycleDeps {
  return {
    repository: rt.store,
    runner: rt.runner,
    timeZone: rt.settings.timeZone,
    horizonMs: rt.settings.horizonMs,
    onTaskComplete: notifyOnComplete(rt.settings.timeZone),
  };
}

export function describeSchedule(task: Pick<Task, "scheduleInterval" | "skipIntervals">): string {
  const step = task.skipIntervals + 1;
  const unit = task.scheduleInterval.toLowerCase();
  return step === 1 ? `every ${unit.slice(0, -1)}` : `every ${step} ${unit}`;
}

export function formatHistory(task: Task): string {
  return task.state.prevFiveSuccess.map((m) => MARKS[m]).join("");
}

function inputFromFlags(flags: TaskFlags): Partial<TaskInput> {
  const out: Partial<TaskInput> = {};
  if (flags.name !== undefined) out.name = flags.name;
  if (flags.path !== undefined) out.projectPath = flags.path;
  if (flags.module !== undefined) out.entryModule = flags.module;
  if (flags.date !== undefined) out.startDate = flags.date;
  if (flags.time !== undefined) out.startTime = flags.time;
  if (flags.amPm !== undefined) out.amPm = flags.amPm;
  if (flags.interval !== undefined) out.scheduleInterval = flags.interval;
  if (flags.skip !== undefined) out.skipIntervals = flags.skip;
  if (flags.statusChange !== undefined) out.statusChangeDate = flags.statusChange;
  if (flags.notify !== undefined) out.notifyOnRun = flags.notify;
  if (flags.paused !== undefined) out.status = flags.paused ? "Paused" : "Active";
  return out;
}

async function ask(question: PromptObject<"value">): Promise<unknown> {
  const res = await prompts(question);
  if (!("value" in res)) throw new TaskInputError("Cancelled", "Task form cancelled");
  return res.value;
}

async function promptTaskInput(initial: TaskInput): Promise<TaskInput> {
  const text = async (message: string, value: string) => String(await ask({ type: "text", name: "value", message, initial: value }));
  const name = await text("Name", initial.name);
  const projectPath = await text("Project path", initial.projectPath);
  const entryModule = await text("Entry module (relative to project path)", initial.entryModule);
  const startDate = await text("Start date (MM/DD/YYYY)", initial.startDate);
  const startTime = await text("Start time (h:mm)", initial.startTime);
  const amPm = String(await ask({
    type: "select",
    name: "value",
    message: "AM/PM",
    choices: [{ title: "AM", value: "AM" }, { title: "PM", value: "PM" }],
    initial: initial.amPm.toUpperCase() === "PM" ? 1 : 0,
  }));
  const scheduleInterval = String(await ask({
    type: "select",
    name: "value",
    message: "Repeat every",
    choices: SCHEDULE_INTERVALS.map((i) => ({ title: i, value: i })),
    initial: Math.max(0, SCHEDULE_INTERVALS.findIndex((i) => i === initial.scheduleInterval)),
  }));
  const skipIntervals = await text("Intervals to skip between runs", initial.skipIntervals);
  const statusChangeDate = await text("Status change date (MM/DD/YYYY, blank for none)", initial.statusChangeDate);
  const notifyOnRun = Boolean(await ask({ type: "confirm", name: "value", message: "Notify after each run?", initial: initial.notifyOnRun }));
  return { ...initial, name, projectPath, entryModule, startDate, startTime, amPm, scheduleInterval, skipIntervals, statusChangeDate, notifyOnRun };
}

function addTaskOptions(cmd: Command): Command {
  return cmd
    .option("-n, --name <name>", "Task name")
    .option("-p, --path <dir>", "Project directory (working directory of the run)")
    .option("-m, --module <file>", "Entry module, relative to the project directory")
    .option("--date <MM/DD/YYYY>", "Start date")
    .option("--time <h:mm>", "Start time")
    .option("--am-pm <AM|PM>", "Start time meridiem")
    .option("--interval <unit>", `Recurrence unit (${SCHEDULE_INTERVALS.join(", ")})`)
    .option("--skip <n>", "Intervals to skip between runs")
    .option("--status-change <MM/DD/YYYY>", "Date a status change is planned for")
    .option("--notify", "Notify after each run")
    .option("--no-notify", "Do not notify after each run")
    .option("--paused", "Create or set the task as paused")
    .option("-i, --interactive", "Fill the task form interactively");
}

function printTask(task: Task, timeZone: string): void {
  const fmt = (ms: number | null) => (ms === null ? "-" : formatWallClock(ms, timeZone));
  const rows: Array<[string, string]> = [
    ["ID", task.id],
    ["Name", task.name],
    ["Script", path.join(task.projectPath, task.entryModule)],
    ["Schedule", describeSchedule(task)],
    ["Status", task.status],
    ["Next run", fmt(task.nextRunAtMs)],
    ["Status change", fmt(task.statusChangeAtMs)],
    ["Notify", task.notifyOnRun ? "yes" : "no"],
    ["Created", fmt(task.createdAtMs)],
    ["Last run", fmt(task.state.lastRunAtMs)],
    ["Runs", String(task.state.runCount)],
    ["Last exec", task.state.lastExecTimeS === null ? "-" : `${task.state.lastExecTimeS}s`],
    ["Avg exec", task.state.avgExecTimeS === null ? "-" : `${task.state.avgExecTimeS}s`],
    ["Last five", formatHistory(task)],
  ];
  for (const [k, v] of rows) console.log(`${k.padEnd(14)} ${v}`);
  if (task.state.lastNote) console.log(`\nLast note:\n${task.state.lastNote.trimEnd()}`);
}

export function buildProgram(): Command {
  const program = new Command();
  program
    .name("chronorun")
    .description("chronorun - personal script scheduler")
    .version("0.1.0", "-v, --version", "show version")
    .option("-c, --config <path>", "Config file (default ~/.chronorun/config.json)");

  const configOpt = () => program.opts<{ config?: string }>().config;
  const withRuntime = (fn: (rt: Runtime) => Promise<void> | void) => async () => {
    try {
      await fn(loadRuntime(configOpt()));
    } catch (err) {
      reportError(err);
    }
  };

  program.command("onboard").description("Initialize chronorun configuration").action(async () => {
    const configPath = path.resolve(configOpt() ?? getConfigPath());
    let config = loadConfig(configPath);
    if (fs.existsSync(configPath)) {
      console.log(`Config already exists at ${configPath}`);
      const rl = readline.createInterface({ input, output });
      const ans = (await rl.question("Overwrite? [y/N] ")).trim().toLowerCase();
      rl.close();
      if (ans === "y") {
        config = createDefaultConfig();
        config.wakeup.backend = defaultBackendFor(process.platform);
        saveConfig(config, configPath);
        console.log(`Config reset to defaults at ${configPath}`);
      } else {
        saveConfig(config, configPath);
        console.log(`Config refreshed at ${configPath} (existing values preserved)`);
      }
    } else {
      config.wakeup.backend = defaultBackendFor(process.platform);
      saveConfig(config, configPath);
      console.log(`Created config at ${configPath}`);
    }
    ensureDir(getDataPath());
    console.log(chalk.green(`\nchronorun is ready (wake-up backend: ${config.wakeup.backend}).`));
    console.log(chalk.yellow("Add a task: chronorun task add -i"));
  });

  program
    .command("run")
    .description("Run every task due within the horizon, then arm the next wake-up")
    .action(withRuntime(async (rt) => {
      const lock = new ProcessLock(rt.settings.lockPath);
      if (!lock.tryAcquire()) {
        console.log(chalk.yellow(`Another chronorun cycle is running (pid ${lock.holder() ?? "unknown"}); nothing to do.`));
        return;
      }
      try {
        await runCycle(cycleDeps(rt));
      } finally {
        lock.release();
      }
      await rearm(rt);
    }));

  program
    .command("daemon")
    .description("Keep running and execute tasks as they fall due")
    .action(withRuntime(async (rt) => {
      const service = new SchedulerService(cycleDeps(rt), { lock: new ProcessLock(rt.settings.lockPath) });
      const stop = () => service.stop();
      process.once("SIGINT", stop);
      process.once("SIGTERM", stop);
      console.log(chalk.cyan(`chronorun daemon started (${rt.settings.timeZone}). Press Ctrl+C to stop.`));
      try {
        await service.start();
      } finally {
        process.off("SIGINT", stop);
        process.off("SIGTERM", stop);
      }
      console.log(chalk.gray("chronorun daemon stopped."));
    }));

  program
    .command("arm")
    .description("Arm the OS wake-up at the soonest due task")
    .action(withRuntime((rt) => rearm(rt)));

  program.command("status").description("Show chronorun status").action(withRuntime((rt) => {
    const tasks = rt.store.fetchAll();
    const next = earliestDue(tasks);
    const paused = tasks.filter((t) => t.status === "Paused").length;
    const holder = new ProcessLock(rt.settings.lockPath).holder();
    console.log("chronorun Status\n");
    console.log(`Config: ${rt.configPath} ${fs.existsSync(rt.configPath) ? "yes" : "no"}`);
    console.log(`Time zone: ${rt.settings.timeZone}`);
    console.log(`Store: ${rt.settings.storePath} ${fs.existsSync(rt.settings.storePath) ? "yes" : "no"}`);
    console.log(`Tasks: ${tasks.length} (${tasks.length - paused} active, ${paused} paused)`);
    console.log(`Next due: ${next === null ? "-" : formatWallClock(next, rt.settings.timeZone)}`);
    console.log(`Wake-up: ${rt.wakeup.describe()}`);
    console.log(`Cycle running: ${holder === null ? "no" : `yes (pid ${holder})`}`);
  }));

  const task = program.command("task").description("Manage tasks");

  task.command("list").option("--json", "Print raw task records", false).action((opts: { json: boolean }) => withRuntime((rt) => {
    const tasks = [...rt.store.fetchAll()].sort((a, b) => a.nextRunAtMs - b.nextRunAtMs);
    if (opts.json) return console.log(JSON.stringify(tasks, null, 2));
    if (!tasks.length) return console.log("No tasks.");
    for (const t of tasks) {
      const status = t.status === "Paused" ? chalk.yellow("paused") : "active";
      console.log(`${t.id} | ${t.name} | ${describeSchedule(t)} | ${status} | ${formatWallClock(t.nextRunAtMs, rt.settings.timeZone)} | ${formatHistory(t)} | ${t.state.runCount} runs`);
    }
  })());

  task.command("show").argument("<taskId>").action((taskId: string) => withRuntime((rt) => {
    const t = rt.store.get(taskId);
    if (!t) {
      console.log(`Task ${taskId} not found`);
      process.exitCode = 1;
      return;
    }
    printTask(t, rt.settings.timeZone);
  })());

  addTaskOptions(task.command("add").description("Register a script to run on a schedule")).action((flags: TaskFlags) => withRuntime(async (rt) => {
    const now = Date.now();
    let form: TaskInput = { ...defaultTaskInput(now, rt.settings.timeZone), ...inputFromFlags(flags) };
    if (flags.interactive) form = await promptTaskInput(form);
    const fields = validateTaskInput(form, { nowMs: Date.now(), timeZone: rt.settings.timeZone });
    const added = rt.store.add(newTask(fields, now));
    console.log(`Added task '${added.name}' (${added.id}), first run ${formatWallClock(added.nextRunAtMs, rt.settings.timeZone)}`);
    await rearm(rt);
  })());

  addTaskOptions(task.command("edit").description("Change a task").argument("<taskId>")).action((taskId: string, flags: TaskFlags) => withRuntime(async (rt) => {
    const existing = rt.store.get(taskId);
    if (!existing) {
      console.log(`Task ${taskId} not found`);
      process.exitCode = 1;
      return;
    }
    let form: TaskInput = { ...taskInputFrom(existing, rt.settings.timeZone), ...inputFromFlags(flags) };
    if (flags.interactive) form = await promptTaskInput(form);
    const fields = validateTaskInput(form, { nowMs: Date.now(), timeZone: rt.settings.timeZone });
    rt.store.update(taskId, applyEdit(existing, fields));
    console.log(`Updated task '${fields.name}' (${taskId})`);
    await rearm(rt);
  })());

  task.command("remove").argument("<taskId>").action((taskId: string) => withRuntime(async (rt) => {
    if (!rt.store.remove(taskId)) {
      console.log(`Task ${taskId} not found`);
      return;
    }
    console.log(`Removed task ${taskId}`);
    await rearm(rt);
  })());

  for (const [name, status] of [["pause", "Paused"], ["resume", "Active"]] as const) {
    task.command(name).argument("<taskId>").action((taskId: string) => withRuntime((rt) => {
      const t = rt.store.setStatus(taskId, status);
      if (!t) return console.log(`Task ${taskId} not found`);
      console.log(`Task '${t.name}' ${status === "Paused" ? "paused" : "resumed"}`);
    })());
  }

  task.command("notify").argument("<taskId>").option("--off", "Turn notifications off", false).action((taskId: string, opts: { off: boolean }) => withRuntime((rt) => {
    const t = rt.store.setNotify(taskId, !opts.off);
    if (!t) return console.log(`Task ${taskId} not found`);
    console.log(`Notifications for '${t.name}' ${opts.off ? "off" : "on"}`);
  })());

  task.command("run").argument("<taskId>").description("Run a task now and record the result").action((taskId: string) => withRuntime(async (rt) => {
    const t = rt.store.get(taskId);
    if (!t) {
      console.log(`Failed to run task ${taskId}: not found`);
      process.exitCode = 1;
      return;
    }
    const lock = new ProcessLock(rt.settings.lockPath);
    if (!lock.tryAcquire()) {
      console.log(chalk.yellow(`Another chronorun cycle is running (pid ${lock.holder() ?? "unknown"}); try again later.`));
      process.exitCode = 1;
      return;
    }
    try {
      const report = await executeTask(t, cycleDeps(rt));
      console.log(report.ok ? "Task executed" : chalk.red("Task failed"));
      const after = rt.store.get(taskId);
      if (after?.state.lastNote) console.log(after.state.lastNote.trimEnd());
    } finally {
      lock.release();
    }
    await rearm(rt);
  })());

  return program;
}
