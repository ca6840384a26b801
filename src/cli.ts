#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import { validateProject } from "./commands/validate.js";
import { run } from "./commands/run.js";
import { status, listRuns, resolveRunLocations, type RunLocations } from "./commands/status.js";
import { listArtifacts } from "./commands/artifacts.js";
import { EXIT } from "./commands/exit-codes.js";
import { createReporter, type OutputFormat } from "./core/reporter.js";
import { isTerminal } from "./core/state-machine.js";

function parseFormat(value: string): OutputFormat {
  if (value !== "human" && value !== "jsonl") {
    throw new InvalidArgumentError("expected human or jsonl");
  }
  return value;
}

const program = new Command();

program
  .name("releasectl")
  .description("Health-gated Kubernetes manifest release pipeline")
  .version("0.1.0")
  .exitOverride((err) => {
    process.exit(err.exitCode === 0 ? EXIT.SUCCESS : EXIT.INVALID_ARGS);
  });

program
  .command("validate")
  .description("Validate config, topology and templates without starting anything")
  .option("--config-dir <path>", "Path to config directory")
  .option("--env <name>", "Config environment overlay (config/<name>.yaml)")
  .option("--topology <path>", "Topology file (default: from config)")
  .option("--check-secrets", "Also load secrets and check every reference resolves")
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .action(
    async (opts: { configDir?: string; env?: string; topology?: string; checkSecrets?: boolean; format: OutputFormat }) => {
      const reporter = createReporter(opts.format);
      const res = await validateProject({
        configDir: opts.configDir,
        env: opts.env,
        topologyPath: opts.topology,
        checkSecrets: opts.checkSecrets,
      });

      if (!res.ok) {
        for (const err of res.errors) reporter.emit(err);
        process.exit(EXIT.INVALID_INPUT);
      }

      const names = res.topology.services.map((s) => s.name).join(", ");
      reporter.emit({ level: "info", code: "OK", message: `OK: ${res.topology.name} (${names})` });
    }
  );

program
  .command("run")
  .description("Validate, health-gate, render and publish a release")
  .option("--config-dir <path>", "Path to config directory")
  .option("--env <name>", "Config environment overlay (config/<name>.yaml)")
  .option("--topology <path>", "Topology file (default: from config)")
  .option("--dry-run", "Package the manifests but skip the upload")
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .action(
    async (opts: { configDir?: string; env?: string; topology?: string; dryRun?: boolean; format: OutputFormat }) => {
      const res = await run({
        configDir: opts.configDir,
        env: opts.env,
        topologyPath: opts.topology,
        dryRun: opts.dryRun,
        format: opts.format,
      });

      if (!res.ok) {
        if (opts.format === "jsonl") {
          process.stdout.write(
            JSON.stringify({ level: "error", code: res.error.code, message: res.error.message, runId: res.runId, statePath: res.statePath }) +
              "\n"
          );
        } else {
          console.error(res.runId ? `Run ${res.runId} failed: ${res.error.message}` : res.error.message);
        }
        process.exit(res.exitCode);
      }

      const { runId, statePath, artifact, ack } = res.result;
      if (opts.format === "jsonl") {
        process.stdout.write(
          JSON.stringify({ level: "info", code: "OK", runId, statePath, sha256: artifact.sha256, remotePath: ack?.remotePath ?? null }) + "\n"
        );
      } else {
        console.log(`Run ${runId}: ${ack ? `published ${ack.remotePath}` : `packaged ${artifact.path}`} (sha256 ${artifact.sha256})`);
      }
    }
  );

type LocationFlags = { configDir?: string; env?: string; runsDir?: string; outDir?: string; format: OutputFormat };

function reportError(format: OutputFormat, error: string): void {
  if (format === "jsonl") {
    process.stdout.write(JSON.stringify({ level: "error", error }) + "\n");
  } else {
    console.error(error);
  }
}

async function locate(opts: LocationFlags): Promise<RunLocations> {
  const res = await resolveRunLocations(opts);
  if (!res.ok) {
    reportError(opts.format, res.error);
    process.exit(EXIT.INVALID_INPUT);
  }
  return res;
}

program
  .command("status")
  .description("Show the state of a run")
  .argument("<id>", "Run ID")
  .option("--config-dir <path>", "Path to config directory")
  .option("--env <name>", "Config environment overlay (config/<name>.yaml)")
  .option("--runs-dir <path>", "Runs directory (default: runs_dir from config)")
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .action(async (id: string, opts: LocationFlags) => {
    const { runsDir } = await locate(opts);
    const res = status({ runsDir, runId: id });
    if (!res.ok) {
      reportError(opts.format, res.error);
      process.exit(EXIT.PIPELINE_FAILED);
    }
    if (opts.format === "jsonl") {
      process.stdout.write(JSON.stringify(res.state) + "\n");
    } else {
      const open = isTerminal(res.state.status) ? "" : "  (not finished)";
      console.log(`${res.state.runId}  ${res.state.status}${open}`);
      for (const stage of res.state.stages) {
        const took = stage.durationMs === undefined ? "" : `  ${stage.durationMs}ms`;
        const why = stage.error ? `  ${stage.error.code}: ${stage.error.message}` : "";
        console.log(`  ${stage.id.padEnd(8)} ${stage.status}${took}${why}`);
      }
    }
  });

program
  .command("runs")
  .description("List runs, most recent first")
  .option("--config-dir <path>", "Path to config directory")
  .option("--env <name>", "Config environment overlay (config/<name>.yaml)")
  .option("--runs-dir <path>", "Runs directory (default: runs_dir from config)")
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .action(async (opts: LocationFlags) => {
    const { runsDir } = await locate(opts);
    const list = listRuns(runsDir);
    if (opts.format === "jsonl") {
      for (const item of list) process.stdout.write(JSON.stringify(item) + "\n");
    } else {
      if (list.length === 0) { console.log("No runs found."); return; }
      for (const item of list) console.log(`${item.id}  ${item.status}  ${item.updatedAt}`);
    }
  });

program
  .command("artifacts")
  .description("List files produced by a run")
  .argument("<id>", "Run ID")
  .option("--config-dir <path>", "Path to config directory")
  .option("--env <name>", "Config environment overlay (config/<name>.yaml)")
  .option("--runs-dir <path>", "Runs directory (default: runs_dir from config)")
  .option("--out-dir <path>", "Package output directory (default: package.out_dir from config)")
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .action(async (id: string, opts: LocationFlags) => {
    const { runsDir, outDir } = await locate(opts);
    const res = listArtifacts({ runsDir, outDir, runId: id });
    if (!res.ok) {
      reportError(opts.format, res.error);
      process.exit(EXIT.PIPELINE_FAILED);
    }
    if (opts.format === "jsonl") {
      for (const f of res.files) process.stdout.write(JSON.stringify(f) + "\n");
    } else {
      for (const f of res.files) console.log(`${f.path}  ${f.size} bytes`);
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(EXIT.PIPELINE_FAILED);
});
