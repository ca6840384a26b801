import fs from "node:fs";
import path from "node:path";
import { awaitHealthy } from "../health/gate.js";
import type { ServiceRuntime } from "../health/runtime.js";
import { packageManifests } from "../packager/packager.js";
import type { Publisher, PublishCredentials } from "../publish/publisher.js";
import { renderManifestSet } from "../render/renderer.js";
import { validateAll } from "../render/validate.js";
import { redactSensitiveInfo, type Redactor } from "../secrets/redact.js";
import { loadTopology, requiredSecrets, validateTopology } from "../topology/validator.js";
import { readRevision, type RevisionReader } from "../git/revision.js";
import type { ReleaseConfig } from "../types/config.js";
import type { HealthReport } from "../types/health.js";
import type { Artifact, PublishAck, ValidatedManifestSet } from "../types/manifest.js";
import type { SecretBundle, SecretSource } from "../types/secrets.js";
import type { ServiceTopology } from "../types/topology.js";
import { diag, type Diagnostic } from "./diagnostics.js";
import { HealthTimeoutError, PipelineError, StructuralError, errorMessage } from "./errors.js";
import { redacting, silentReporter, type Reporter } from "./reporter.js";
import { makeRunId, runDirFor, statePathForRun } from "./run-id.js";
import { STAGES, nextState, type PipelineStatus, type Stage } from "./state-machine.js";

export type StageStatus = "pending" | "running" | "passed" | "failed" | "timeout";

export type StageRecord = {
  id: Stage;
  status: StageStatus;
  startedAt?: string;
  finishedAt?: string;
  durationMs?: number;
  error?: { code: string; message: string; retryable: boolean };
  diagnostics?: Diagnostic[];
  outputs?: Record<string, unknown>;
};

/** Persistent run state stored in <runs_dir>/<runId>/state.json */
export type RunState = {
  version: 1;
  runId: string;
  createdAt: string;
  updatedAt: string;
  topologyPath: string;
  sourceRevision: string | null;
  dryRun: boolean;
  status: PipelineStatus;
  stages: StageRecord[];
};

export type PipelineResult =
  | { ok: true; runId: string; statePath: string; artifact: Artifact; ack: PublishAck | null }
  | { ok: false; runId: string; statePath: string; stage: Stage; error: { code: string; message: string } };

export type PipelineDeps = {
  runtime: ServiceRuntime;
  publisher: Publisher;
  secretSource: SecretSource;
  /** Defaults to reading the configured env vars. */
  credentials?: PublishCredentials;
  revision?: RevisionReader;
  reporter?: Reporter;
  sleep?: (ms: number) => Promise<void>;
  env?: NodeJS.ProcessEnv;
};

export type PipelineRunOptions = {
  /** Overrides config.topology. */
  topologyPath?: string;
  /** Package but do not transfer. */
  dryRun?: boolean;
  /** Base for relative paths in config; defaults to process.cwd(). */
  cwd?: string;
};

type StageOutcome = { outputs?: Record<string, unknown>; diagnostics?: Diagnostic[] };

export function saveState(statePath: string, state: RunState): void {
  fs.mkdirSync(path.dirname(statePath), { recursive: true });
  fs.writeFileSync(statePath, JSON.stringify(state, null, 2) + "\n", "utf8");
}

export function loadState(statePath: string): RunState {
  return JSON.parse(fs.readFileSync(statePath, "utf8")) as RunState;
}

/** Values handed from one stage to the next within a single run. */
type RunContext = {
  topology?: ServiceTopology;
  secrets?: SecretBundle;
  manifests?: ValidatedManifestSet;
  artifact?: Artifact;
  ack?: PublishAck;
};

/**
 * Sequential stage runner: validate, health, render, publish.
 * A stage runs only after its predecessor passed and the first failure ends
 * the run. Nothing is retried or resumed; every run gets a fresh state file.
 */
export class Pipeline {
  constructor(
    private readonly config: ReleaseConfig,
    private readonly deps: PipelineDeps
  ) {}

  async run(opts: PipelineRunOptions = {}): Promise<PipelineResult> {
    const cwd = opts.cwd ?? process.cwd();
    const resolve = (p: string) => path.resolve(cwd, p);
    const runsRoot = resolve(this.config.runs_dir);
    const runId = makeRunId();
    const statePath = statePathForRun(runsRoot, runId);
    const runDir = runDirFor(runsRoot, runId);
    const topologyPath = resolve(opts.topologyPath ?? this.config.topology);
    const dryRun = opts.dryRun ?? false;
    const env = this.deps.env ?? process.env;

    // Filled as secrets become known; everything reported or persisted passes through it.
    const masked: Record<string, string> = {};
    const redact: Redactor = (text) => redactSensitiveInfo(text, masked);
    const reporter = redacting(this.deps.reporter ?? silentReporter, redact);

    const sourceRevision = await (this.deps.revision ?? readRevision)(path.dirname(topologyPath)).catch((e: unknown) => {
      reporter.emit(diag("warn", "REVISION_UNAVAILABLE", `Source revision unavailable: ${errorMessage(e)}`));
      return null;
    });

    const now = new Date().toISOString();
    const state: RunState = {
      version: 1,
      runId,
      createdAt: now,
      updatedAt: now,
      topologyPath: path.relative(cwd, topologyPath),
      sourceRevision,
      dryRun,
      status: STAGES[0],
      stages: STAGES.map((id): StageRecord => ({ id, status: "pending" })),
    };
    saveState(statePath, state);

    const ctx: RunContext = {};

    const runStage = async (stage: Stage, fn: () => Promise<StageOutcome>): Promise<PipelineResult | null> => {
      const record = state.stages.find((s) => s.id === stage);
      if (!record) throw new Error(`Unknown stage: ${stage}`);

      const started = Date.now();
      record.status = "running";
      record.startedAt = new Date().toISOString();
      state.status = stage;
      state.updatedAt = record.startedAt;
      saveState(statePath, state);
      reporter.emit(diag("info", `${stage.toUpperCase()}_STARTED`, `${stage}: started`));

      try {
        const outcome = await fn();
        record.status = "passed";
        record.outputs = outcome.outputs;
        record.diagnostics = outcome.diagnostics ?? [];
        state.status = nextState(stage, "pass");
        reporter.emit(diag("info", `${stage.toUpperCase()}_OK`, `${stage}: passed`));
        return null;
      } catch (e) {
        const timedOut = e instanceof HealthTimeoutError;
        const code = e instanceof PipelineError ? e.code : "INTERNAL";
        const message = redact(errorMessage(e));
        record.status = timedOut ? "timeout" : "failed";
        record.error = { code, message, retryable: e instanceof PipelineError ? e.retryable : false };
        record.diagnostics = e instanceof StructuralError ? e.diagnostics : [];
        state.status = nextState(stage, timedOut ? "timeout" : "fail");
        for (const d of record.diagnostics) reporter.emit(d);
        reporter.emit(diag("error", `${stage.toUpperCase()}_FAILED`, `${stage}: ${message}`, { details: { code } }));
        return { ok: false, runId, statePath, stage, error: { code, message } };
      } finally {
        record.finishedAt = new Date().toISOString();
        record.durationMs = Date.now() - started;
        state.updatedAt = record.finishedAt;
        saveState(statePath, state);
      }
    };

    const validateFail = await runStage("validate", async () => {
      const loaded = loadTopology(topologyPath);
      if (!loaded.ok) throw new StructuralError("Topology could not be read", loaded.errors);

      const shape = await validateTopology(loaded.doc);
      if (!shape.ok) throw new StructuralError("Topology is structurally invalid", shape.errors);

      const bundle = await this.deps.secretSource.load(requiredSecrets(shape.topology));
      Object.assign(masked, bundle);

      const full = await validateTopology(loaded.doc, { secretNames: Object.keys(bundle) });
      if (!full.ok) throw new StructuralError("Topology references unresolved secrets", full.errors);

      ctx.topology = full.topology;
      ctx.secrets = bundle;
      return {
        outputs: { services: full.topology.services.map((s) => s.name), secrets: Object.keys(bundle).length },
      };
    });
    if (validateFail) return validateFail;

    const healthFail = await runStage("health", async () => {
      const { topology, secrets } = ctx;
      if (!topology || !secrets) throw new Error("health stage reached without a validated topology");
      const report: HealthReport = await awaitHealthy(
        this.deps.runtime,
        topology,
        secrets,
        {
          pollIntervalMs: this.config.health.poll_interval_ms,
          maxAttempts: this.config.health.max_attempts,
          logTailLines: this.config.health.log_tail_lines,
        },
        {
          sleep: this.deps.sleep,
          onPoll: (poll) =>
            reporter.emit(diag("info", "HEALTH_POLL", `health: attempt ${poll.attempt}/${this.config.health.max_attempts} ${poll.phase}`)),
        }
      );
      fs.writeFileSync(path.join(runDir, "health-report.json"), JSON.stringify(report, null, 2) + "\n", "utf8");
      if (report.status !== "healthy") {
        for (const d of report.diagnostics) {
          reporter.emit(
            diag("warn", "HEALTH_DIAGNOSTICS", `${d.service}: ${d.verdict.status}`, { details: { logTail: d.logTail } })
          );
        }
        throw new HealthTimeoutError(report);
      }
      return { outputs: { attempts: report.attempts, report: "health-report.json" } };
    });
    if (healthFail) return healthFail;

    const renderFail = await runStage("render", async () => {
      const { topology, secrets } = ctx;
      if (!topology || !secrets) throw new Error("render stage reached without a healthy topology");
      const set = renderManifestSet(topology, secrets, {
        templatesDir: resolve(this.config.render.templates_dir),
        namespace: this.config.render.namespace,
        app: this.config.render.app,
        secretName: this.config.render.secret_name,
      });
      const checked = await validateAll(set);
      if (!checked.ok) throw new StructuralError("Rendered manifests are not well-formed", checked.errors);
      ctx.manifests = checked.set;
      return { outputs: { manifests: checked.set.manifests.map((m) => m.fileName) } };
    });
    if (renderFail) return renderFail;

    const publishFail = await runStage("publish", async () => {
      if (!ctx.manifests) throw new Error("publish stage reached without validated manifests");
      const artifact = await packageManifests(ctx.manifests, {
        outDir: path.join(resolve(this.config.package.out_dir), runId),
        rootDirName: this.config.package.root_dir,
        archiveName: this.config.package.archive_name,
      });
      ctx.artifact = artifact;
      const outputs: Record<string, unknown> = {
        archive: path.relative(cwd, artifact.path),
        sha256: artifact.sha256,
        bytes: artifact.bytes,
      };
      if (dryRun) {
        return { outputs: { ...outputs, published: false, reason: "dry_run" } };
      }

      const publish = this.config.publish;
      const credentials = this.deps.credentials ?? {
        user: env[publish.user_env] ?? "",
        password: env[publish.password_env] ?? "",
      };
      if (credentials.password) masked["publish.password"] = credentials.password;
      const ack = await this.deps.publisher.publish(
        artifact,
        {
          host: publish.host,
          port: publish.port,
          remoteDir: publish.remote_dir,
          secure: publish.secure,
          verifyCertificate: publish.verify_certificate,
        },
        credentials
      );
      ctx.ack = ack;
      return { outputs: { ...outputs, published: true, remotePath: ack.remotePath } };
    });
    if (publishFail) return publishFail;

    if (!ctx.artifact) throw new Error("pipeline finished without an artifact");
    return { ok: true, runId, statePath, artifact: ctx.artifact, ack: ctx.ack ?? null };
  }
}
