import fs from "node:fs";
import path from "node:path";
import { loadConfig } from "../config/validator.js";
import { errorMessage } from "../core/errors.js";
import { loadState, type RunState } from "../core/pipeline.js";
import { statePathForRun } from "../core/run-id.js";

export type StatusResult =
  | { ok: true; state: RunState }
  | { ok: false; error: string };

export type RunSummary = { id: string; status: string; updatedAt: string };

export type RunLocations = { runsDir: string; outDir: string };

export type RunLocationOptions = {
  configDir?: string;
  env?: string;
  /** Override config runs_dir. */
  runsDir?: string;
  /** Override config package.out_dir. */
  outDir?: string;
  cwd?: string;
  envVars?: NodeJS.ProcessEnv;
};

/**
 * Where runs and packaged output live: explicit flags first, otherwise the
 * layered config a run would have used.
 */
export async function resolveRunLocations(
  opts: RunLocationOptions = {}
): Promise<({ ok: true } & RunLocations) | { ok: false; error: string }> {
  const cwd = opts.cwd ?? process.cwd();
  const loaded = await loadConfig(opts.env, opts.configDir ? path.resolve(cwd, opts.configDir) : undefined, opts.envVars ?? process.env);
  if (!loaded.ok) return { ok: false, error: `Config invalid: ${loaded.errors}` };

  return {
    ok: true,
    runsDir: path.resolve(cwd, opts.runsDir ?? loaded.config.runs_dir),
    outDir: path.resolve(cwd, opts.outDir ?? loaded.config.package.out_dir)
  };
}

/**
 * Read run state for a given ID.
 */
export function status(opts: { runsDir: string; runId: string }): StatusResult {
  const statePath = statePathForRun(opts.runsDir, opts.runId);

  if (!fs.existsSync(statePath)) {
    return { ok: false, error: `No run found: ${opts.runId}` };
  }

  try {
    return { ok: true, state: loadState(statePath) };
  } catch (e) {
    return { ok: false, error: `Failed to read state: ${errorMessage(e)}` };
  }
}

/**
 * List all runs, most recently updated first.
 */
export function listRuns(runsDir: string): RunSummary[] {
  if (!fs.existsSync(runsDir)) return [];

  const results: RunSummary[] = [];
  for (const entry of fs.readdirSync(runsDir, { withFileTypes: true })) {
    if (!entry.isDirectory()) continue;
    const res = status({ runsDir, runId: entry.name });
    if (res.ok) {
      results.push({ id: entry.name, status: String(res.state.status), updatedAt: String(res.state.updatedAt ?? "") });
    } else if (fs.existsSync(statePathForRun(runsDir, entry.name))) {
      results.push({ id: entry.name, status: "corrupted", updatedAt: "" });
    }
  }

  return results.sort((a, b) => b.updatedAt.localeCompare(a.updatedAt));
}
