/**
 * Pipeline stages in order. Each consumes the verified output of the one
 * before; the publish stage packages the set and then transfers it.
 */
export const STAGES = ["validate", "health", "render", "publish"] as const;

export type Stage = (typeof STAGES)[number];

export type PipelineStatus = Stage | "done" | `failed_${Stage}` | `timeout_${Stage}`;

export type TransitionEvent = "pass" | "fail" | "timeout";

/** Pure function: given current stage + event, return next state. */
export function nextState(current: Stage, event: TransitionEvent): PipelineStatus {
  if (event === "fail") return `failed_${current}`;
  if (event === "timeout") return `timeout_${current}`;

  const idx = STAGES.indexOf(current);
  if (idx >= STAGES.length - 1) return "done";
  return STAGES[idx + 1];
}

export function isTerminal(status: PipelineStatus): boolean {
  return status === "done" || status.startsWith("failed_") || status.startsWith("timeout_");
}
