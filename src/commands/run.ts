import path from "node:path";
import { loadConfig } from "../config/validator.js";
import { diag } from "../core/diagnostics.js";
import { Pipeline, type PipelineDeps, type PipelineResult } from "../core/pipeline.js";
import { createReporter, type OutputFormat } from "../core/reporter.js";
import { ComposeRuntime } from "../health/compose-runtime.js";
import { FtpPublisher } from "../publish/publisher.js";
import { secretSourceFromConfig } from "../secrets/bundle.js";
import { EXIT, type ExitCode } from "./exit-codes.js";

export type RunCommandResult =
  | { ok: true; exitCode: ExitCode; result: Extract<PipelineResult, { ok: true }> }
  | { ok: false; exitCode: ExitCode; error: { code: string; message: string }; runId?: string; statePath?: string };

export type RunCommandOptions = {
  configDir?: string;
  env?: string;
  topologyPath?: string;
  dryRun?: boolean;
  format?: OutputFormat;
  cwd?: string;
  envVars?: NodeJS.ProcessEnv;
  /** Replaces the collaborators built from config (container runtime, FTP, secrets). */
  deps?: Partial<PipelineDeps>;
};

export function exitCodeFor(result: Extract<PipelineResult, { ok: false }>): ExitCode {
  if (result.stage === "validate") return EXIT.INVALID_INPUT;
  if (result.error.code === "HEALTH_TIMEOUT") return EXIT.HEALTH_TIMEOUT;
  if (result.error.code === "TRANSFER") return EXIT.TRANSFER_FAILED;
  return EXIT.PIPELINE_FAILED;
}

export async function run(opts: RunCommandOptions = {}): Promise<RunCommandResult> {
  const cwd = opts.cwd ?? process.cwd();
  const envVars = opts.envVars ?? process.env;
  const reporter = opts.deps?.reporter ?? createReporter(opts.format ?? "human");

  const loaded = await loadConfig(opts.env, opts.configDir ? path.resolve(cwd, opts.configDir) : undefined, envVars);
  if (!loaded.ok) {
    const message = `Config invalid: ${loaded.errors}`;
    reporter.emit(diag("error", "CONFIG_INVALID", message));
    return { ok: false, exitCode: EXIT.INVALID_INPUT, error: { code: "CONFIG_INVALID", message } };
  }
  const config = loaded.config;

  const pipeline = new Pipeline(config, {
    runtime: new ComposeRuntime({ projectPrefix: config.health.project_prefix }),
    publisher: new FtpPublisher(),
    secretSource: secretSourceFromConfig(config.secrets, cwd, envVars),
    env: envVars,
    ...opts.deps,
    reporter,
  });

  const result = await pipeline.run({ topologyPath: opts.topologyPath, dryRun: opts.dryRun, cwd });
  if (!result.ok) {
    return {
      ok: false,
      exitCode: exitCodeFor(result),
      error: result.error,
      runId: result.runId,
      statePath: result.statePath,
    };
  }
  return { ok: true, exitCode: EXIT.SUCCESS, result };
}
