import path from "node:path";
import { z } from "zod";
import { expandHome, getDataPath } from "../utils/helpers.js";
import { resolveTimeZone } from "../utils/timezone.js";

export const WAKEUP_BACKENDS = ["launchd", "crontab", "none"] as const;
export type WakeupBackend = (typeof WAKEUP_BACKENDS)[number];

export const configSchema = z.object({
  timeZone: z.string().min(1),
  storePath: z.string().min(1),
  lockPath: z.string().min(1),
  scheduler: z.object({
    horizonMinutes: z.number().positive(),
  }),
  runner: z.object({
    interpreters: z.record(z.string().regex(/^\.[^.]+$/, "keys must be file extensions such as .py"), z.string().min(1)),
  }),
  wakeup: z.object({
    backend: z.enum(WAKEUP_BACKENDS),
    label: z.string().regex(/^[\w.-]+$/, "label may only contain letters, digits, '.', '_' and '-'"),
    /** Command the OS runs on wake-up; empty means this chronorun install with "run". */
    command: z.array(z.string()),
  }),
});

export type Config = z.infer<typeof configSchema>;

export function defaultBackendFor(platform: NodeJS.Platform): WakeupBackend {
  if (platform === "darwin") return "launchd";
  if (platform === "linux") return "crontab";
  return "none";
}

export function createDefaultConfig(): Config {
  const home = getDataPath();
  return {
    timeZone: "auto",
    storePath: path.join(home, "tasks.json"),
    lockPath: path.join(home, "run.lock"),
    scheduler: { horizonMinutes: 5 },
    runner: {
      interpreters: { ".py": "python3", ".js": "node", ".mjs": "node", ".cjs": "node", ".sh": "sh" },
    },
    wakeup: { backend: "none", label: "com.chronorun.execute", command: [] },
  };
}

export interface Settings {
  timeZone: string;
  storePath: string;
  lockPath: string;
  horizonMs: number;
  interpreters: Record<string, string>;
  wakeup: Config["wakeup"];
}

/** Expands paths and resolves the time zone once, so nothing downstream reads ambient state. */
export function resolveSettings(config: Config): Settings {
  return {
    timeZone: resolveTimeZone(config.timeZone),
    storePath: path.resolve(expandHome(config.storePath)),
    lockPath: path.resolve(expandHome(config.lockPath)),
    horizonMs: config.scheduler.horizonMinutes * 60_000,
    interpreters: Object.fromEntries(Object.entries(config.runner.interpreters).map(([ext, cmd]) => [ext.toLowerCase(), cmd])),
    wakeup: config.wakeup,
  };
}
