import { describe, expect, test, vi } from "vitest";
import { earliestDue, executeTask, runCycle, selectDueTasks, type CycleDeps } from "../src/engine/driver.js";
import { ScheduleConfigError } from "../src/engine/errors.js";
import type { RunOutcome } from "../src/engine/runner.js";
import type { Task } from "../src/tasks/types.js";
import { silentLogger } from "../src/types.js";
import { MINUTE, MemoryRepository, T0, WEEK, makeTask } from "./fixtures.js";

function harness(tasks: Task[], outcomeFor: (task: Task) => Omit<RunOutcome, "attempts"> = (t) => ({ stdout: `ran ${t.id}`, stderr: "", exitCode: 0 })) {
  let now = T0;
  const repository = new MemoryRepository(tasks);
  const seenUpdates: string[][] = [];
  const run = vi.fn(async (task: Task): Promise<RunOutcome> => {
    seenUpdates.push([...repository.updates]);
    now += 1500;
    return { ...outcomeFor(task), attempts: 1 };
  });
  const sleep = vi.fn(async (ms: number) => {
    now += ms;
  });
  const deps: CycleDeps = {
    repository,
    runner: { run },
    timeZone: "UTC",
    clock: () => now,
    sleep,
    logger: silentLogger,
  };
  return { deps, repository, run, sleep, seenUpdates, now: () => now };
}

const soon = makeTask({ id: "soon", name: "soon", nextRunAtMs: T0 + MINUTE });
const later = makeTask({ id: "later", name: "later", nextRunAtMs: T0 + 10 * MINUTE });
const overdue = makeTask({ id: "overdue", name: "overdue", nextRunAtMs: T0 - MINUTE });

describe("selectDueTasks", () => {
  test("keeps tasks due before the horizon, earliest first", () => {
    const due = selectDueTasks([soon, later, overdue], T0 + 5 * MINUTE);
    expect(due.map((t) => t.id)).toEqual(["overdue", "soon"]);
  });

  test("a task due exactly at the horizon waits for the next cycle", () => {
    expect(selectDueTasks([makeTask({ nextRunAtMs: T0 + 5 * MINUTE })], T0 + 5 * MINUTE)).toEqual([]);
  });

  test("paused tasks are selected too", () => {
    const paused = makeTask({ status: "Paused", nextRunAtMs: T0 });
    expect(selectDueTasks([paused], T0 + 5 * MINUTE)).toEqual([paused]);
  });
});

describe("earliestDue", () => {
  test("returns the soonest due time or null", () => {
    expect(earliestDue([])).toBeNull();
    expect(earliestDue([soon, later, overdue])).toBe(T0 - MINUTE);
  });
});

describe("runCycle", () => {
  test("runs due tasks in order, waiting for the one not yet due", async () => {
    const h = harness([soon, later, overdue]);
    const report = await runCycle(h.deps);

    expect(h.run.mock.calls.map(([t]) => t.id)).toEqual(["overdue", "soon"]);
    expect(h.sleep).toHaveBeenCalledTimes(1);
    expect(h.sleep).toHaveBeenCalledWith(58_500);
    expect(h.repository.updates).toEqual(["overdue", "soon"]);
    expect(report.totalTasks).toBe(3);
    expect(report.results.map((r) => [r.id, r.ok])).toEqual([["overdue", true], ["soon", true]]);
    expect(h.repository.byId("later")).toEqual(later);
  });

  test("persists each task before the next one starts", async () => {
    const h = harness([soon, overdue]);
    await runCycle(h.deps);
    expect(h.seenUpdates).toEqual([[], ["overdue"]]);
  });

  test("a task due two minutes ago gets its next weekly slot and the run recorded", async () => {
    const task = makeTask({ id: "weekly", nextRunAtMs: T0 - 2 * MINUTE });
    const h = harness([task], () => ({ stdout: "report sent\n", stderr: "", exitCode: 0 }));
    await runCycle(h.deps);

    const updated = h.repository.byId("weekly");
    expect(updated?.nextRunAtMs).toBe(T0 - 2 * MINUTE + WEEK);
    expect(updated?.state.runCount).toBe(1);
    expect(updated?.state.lastNote).toBe("report sent\n");
    expect(updated?.state.lastRunAtMs).toBe(T0 + 1500);
    expect(updated?.state.lastExecTimeS).toBe(1.5);
  });

  test("a failing task does not stop the rest of the cycle", async () => {
    const h = harness([overdue, soon], (t) =>
      t.id === "overdue" ? { stdout: "", stderr: "Traceback", exitCode: 1 } : { stdout: "fine", stderr: "", exitCode: 0 },
    );
    const report = await runCycle(h.deps);
    expect(report.results.map((r) => r.ok)).toEqual([false, true]);
    expect(h.repository.byId("overdue")?.state.prevFiveSuccess[0]).toBe("failure");
    expect(h.repository.byId("overdue")?.state.lastNote).toBe("Traceback");
    expect(h.repository.byId("soon")?.state.prevFiveSuccess[0]).toBe("success");
  });

  test("nothing due means nothing runs", async () => {
    const h = harness([later]);
    const report = await runCycle(h.deps);
    expect(report.results).toEqual([]);
    expect(h.run).not.toHaveBeenCalled();
    expect(h.repository.updates).toEqual([]);
  });

  test("a corrupt schedule aborts the cycle without persisting it", async () => {
    const h = harness([makeTask({ id: "bad", nextRunAtMs: T0 - MINUTE, skipIntervals: -2 }), soon]);
    await expect(runCycle(h.deps)).rejects.toBeInstanceOf(ScheduleConfigError);
    expect(h.repository.updates).toEqual([]);
  });

  test("reports every finished task to the completion hook", async () => {
    const h = harness([overdue]);
    const onTaskComplete = vi.fn();
    await runCycle({ ...h.deps, onTaskComplete });
    expect(onTaskComplete).toHaveBeenCalledTimes(1);
    const [task, outcome] = onTaskComplete.mock.calls[0] ?? [];
    expect(task).toEqual(h.repository.byId("overdue"));
    expect(outcome).toEqual({ stdout: "ran overdue", stderr: "", exitCode: 0, attempts: 1 });
  });

  test("the horizon is configurable", async () => {
    const h = harness([soon, later]);
    await runCycle({ ...h.deps, horizonMs: 15 * MINUTE });
    expect(h.repository.updates).toEqual(["soon", "later"]);
  });
});

describe("executeTask", () => {
  test("edits made while the task waited or ran are kept", async () => {
    const h = harness([overdue]);
    const run = async (task: Task): Promise<RunOutcome> => {
      h.repository.tasks = h.repository.tasks.map((t) => (t.id === task.id ? { ...t, name: "renamed", notifyOnRun: true } : t));
      return { stdout: "ok", stderr: "", exitCode: 0, attempts: 1 };
    };
    await runCycle({ ...h.deps, runner: { run } });

    const saved = h.repository.byId("overdue");
    expect(saved?.name).toBe("renamed");
    expect(saved?.notifyOnRun).toBe(true);
    expect(saved?.state.runCount).toBe(1);
    expect(saved?.nextRunAtMs).toBe(T0 - MINUTE + WEEK);
  });

  test("a task removed during its run is not written back", async () => {
    const warn = vi.fn();
    const h = harness([overdue, soon]);
    const run = async (task: Task): Promise<RunOutcome> => {
      if (task.id === "overdue") h.repository.tasks = h.repository.tasks.filter((t) => t.id !== "overdue");
      return { stdout: "ok", stderr: "", exitCode: 0, attempts: 1 };
    };
    const report = await runCycle({ ...h.deps, runner: { run }, logger: { ...silentLogger, warn } });

    expect(h.repository.updates).toEqual(["soon"]);
    expect(h.repository.byId("overdue")).toBeUndefined();
    expect(report.results.map((r) => r.id)).toEqual(["overdue", "soon"]);
    expect(warn).toHaveBeenCalledWith("[scheduler] overdue (overdue) was removed during its run; result not saved");
  });


  test("running a task early keeps its due time", async () => {
    const h = harness([later]);
    const report = await executeTask(later, h.deps);
    expect(report.nextRunAtMs).toBe(T0 + 10 * MINUTE);
    expect(h.repository.byId("later")?.state.runCount).toBe(1);
  });
});
