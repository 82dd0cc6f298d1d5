import fs from "node:fs";
import path from "node:path";
import { configSchema, createDefaultConfig, type Config } from "./schema.js";
import { getDataPath, writeJsonFile } from "../utils/helpers.js";

export function getConfigPath(): string {
  return path.join(getDataPath(), "config.json");
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function deepMerge(base: Record<string, unknown>, patch: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = { ...base };
  for (const [k, v] of Object.entries(patch)) {
    const current = out[k];
    out[k] = isPlainObject(v) && isPlainObject(current) ? deepMerge(current, v) : v;
  }
  return out;
}

export function loadConfig(configPath?: string): Config {
  const p = configPath ?? getConfigPath();
  const defaults = createDefaultConfig();
  if (!fs.existsSync(p)) return defaults;

  try {
    const raw: unknown = JSON.parse(fs.readFileSync(p, "utf8"));
    if (!isPlainObject(raw)) throw new Error("config root must be an object");
    const parsed = configSchema.safeParse(deepMerge(defaults, raw));
    if (!parsed.success) {
      throw new Error(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "));
    }
    return parsed.data;
  } catch (err) {
    console.warn(`Warning: Failed to load config from ${p}: ${String(err)}`);
    return defaults;
  }
}

export function saveConfig(config: Config, configPath?: string): void {
  writeJsonFile(configPath ?? getConfigPath(), config);
}
