import crypto from "node:crypto";
import path from "node:path";

/** 2026-10-19T08-15-02-113Z-3fa9c1 */
export function makeRunId(now: Date = new Date()): string {
  const ts = now.toISOString().replace(/[:.]/g, "-");
  return `${ts}-${crypto.randomBytes(3).toString("hex")}`;
}

export function runDirFor(runsRoot: string, runId: string): string {
  return path.join(runsRoot, runId);
}

export function statePathForRun(runsRoot: string, runId: string): string {
  return path.join(runDirFor(runsRoot, runId), "state.json");
}
