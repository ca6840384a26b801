import type { Diagnostic } from "./diagnostics.js";
import type { HealthReport } from "../types/health.js";

export type PipelineErrorCode = "STRUCTURAL" | "HEALTH_TIMEOUT" | "RENDER" | "TRANSFER";

/**
 * Base for every failure a stage can report. None of them is retried inside
 * the pipeline; `retryable` only tells the caller whether re-triggering the
 * whole run can help.
 */
export class PipelineError extends Error {
  constructor(
    readonly code: PipelineErrorCode,
    message: string,
    readonly retryable: boolean
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed topology, template or manifest. Raised before any side effect. */
export class StructuralError extends PipelineError {
  constructor(
    message: string,
    readonly diagnostics: Diagnostic[] = []
  ) {
    super("STRUCTURAL", message, false);
  }
}

export class HealthTimeoutError extends PipelineError {
  constructor(readonly report: HealthReport) {
    const pending = Object.entries(report.services)
      .filter(([, v]) => v.status !== "healthy")
      .map(([name]) => name);
    super(
      "HEALTH_TIMEOUT",
      `Services not healthy after ${report.attempts} attempt(s): ${pending.join(", ") || "(none)"}`,
      true
    );
  }
}

/** Missing secret or unbound template placeholder. */
export class RenderError extends PipelineError {
  constructor(
    message: string,
    readonly missing: string[] = []
  ) {
    super("RENDER", message, false);
  }
}

/** Remote store unreachable or the upload was rejected. */
export class TransferError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("TRANSFER", message, true);
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
