import { sanitizeLogMessage, type Redactor } from "../secrets/redact.js";
import type { Diagnostic } from "./diagnostics.js";

export type OutputFormat = "human" | "jsonl";

export interface Reporter {
  emit(d: Diagnostic): void;
}

type Writable = { write(chunk: string): unknown };

/**
 * jsonl: one JSON object per diagnostic on stdout.
 * human: info on stdout, warnings and errors on stderr.
 */
export function createReporter(
  format: OutputFormat,
  streams: { out: Writable; err: Writable } = { out: process.stdout, err: process.stderr }
): Reporter {
  return {
    emit(d) {
      if (format === "jsonl") {
        streams.out.write(JSON.stringify(d) + "\n");
        return;
      }
      const line = d.level === "info" ? d.message : `${d.level}: ${d.message}`;
      (d.level === "info" ? streams.out : streams.err).write(sanitizeLogMessage(line) + "\n");
    },
  };
}

/** Pass every message (and string detail) through `redact` before it is written. */
export function redacting(reporter: Reporter, redact: Redactor): Reporter {
  return {
    emit(d) {
      const details = d.details
        ? Object.fromEntries(Object.entries(d.details).map(([k, v]) => [k, typeof v === "string" ? redact(v) : v]))
        : undefined;
      reporter.emit({ ...d, message: redact(d.message), ...(details ? { details } : {}) });
    },
  };
}

export const silentReporter: Reporter = { emit() {} };
