import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import { isRecord } from "../core/guards.js";
import type { ReleaseConfig } from "../types/config.js";

export const DEFAULT_CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../config");

export const ENV_PREFIX = "RELEASECTL_";

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, val] of Object.entries(override)) {
    if (isRecord(val)) {
      const current = result[key];
      result[key] = deepMerge(isRecord(current) ? current : {}, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): Record<string, unknown> {
  if (!fs.existsSync(filePath)) return {};
  const parsed: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new Error(`Config file must contain a mapping: ${filePath}`);
  }
  return parsed;
}

function coerce(value: string): unknown {
  if (value === "true") return true;
  if (value === "false") return false;
  if (/^-?\d+(\.\d+)?$/.test(value)) return Number(value);
  return value;
}

/**
 * Apply RELEASECTL_ prefixed environment variable overrides.
 * RELEASECTL_RUNS_DIR → runs_dir, RELEASECTL_HEALTH__MAX_ATTEMPTS → health.max_attempts
 */
export function applyEnvOverrides(
  config: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env
): Record<string, unknown> {
  let result = config;
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    const segments = key.slice(ENV_PREFIX.length).toLowerCase().split("__");
    const leaf = segments.pop();
    if (!leaf) continue;
    let patch: Record<string, unknown> = { [leaf]: coerce(value) };
    for (const segment of segments.reverse()) {
      patch = { [segment]: patch };
    }
    result = deepMerge(result, patch);
  }
  return result;
}

/**
 * Load layered config: base.yaml ← <env>.yaml ← environment variables.
 * The result is unchecked; loadConfig validates it before use.
 */
export function loadRawConfig(envName?: string, configDir?: string, env?: NodeJS.ProcessEnv): Record<string, unknown> {
  const dir = configDir ?? DEFAULT_CONFIG_DIR;

  const base = loadYaml(path.join(dir, "base.yaml"));

  let merged = base;
  if (envName) {
    merged = deepMerge(base, loadYaml(path.join(dir, `${envName}.yaml`)));
  }

  return applyEnvOverrides(merged, env);
}

