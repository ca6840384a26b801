import crypto from "node:crypto";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import YAML from "yaml";
import { isRecord } from "../core/guards.js";
import type { SecretBundle } from "../types/secrets.js";
import type { ServiceTopology } from "../types/topology.js";
import { runCommand, type CommandRunner } from "./exec.js";
import { StartError, type ServiceRuntime, type ServiceState, type TopologyHandle } from "./runtime.js";

export type ComposeRuntimeOptions = {
  projectPrefix?: string;
  run?: CommandRunner;
  /** Parent directory for the per-run working directory. */
  tmpRoot?: string;
};

/** Compose document for the local smoke test. Secrets are referenced by file, never inlined. */
export function buildComposeFile(topology: ServiceTopology, projectName: string): Record<string, unknown> {
  const services: Record<string, unknown> = {};
  const secrets: Record<string, { file: string }> = {};
  const volumes: Record<string, Record<string, never>> = {};

  for (const svc of topology.services) {
    const entry: Record<string, unknown> = { image: svc.image };
    if (svc.environment && Object.keys(svc.environment).length > 0) entry.environment = { ...svc.environment };
    if (svc.secrets.length > 0) entry.secrets = [...svc.secrets];
    if (svc.dependsOn && svc.dependsOn.length > 0) entry.depends_on = [...svc.dependsOn];
    if (svc.storage?.mountPath) {
      const volume = `${svc.name}-data`;
      volumes[volume] = {};
      entry.volumes = [`${volume}:${svc.storage.mountPath}`];
    }
    services[svc.name] = entry;
    for (const name of svc.secrets) secrets[name] = { file: `./secrets/${name}` };
  }

  const doc: Record<string, unknown> = { name: projectName, services };
  if (Object.keys(secrets).length > 0) doc.secrets = secrets;
  if (Object.keys(volumes).length > 0) doc.volumes = volumes;
  return doc;
}

function parseContainers(output: string): Record<string, unknown>[] {
  const text = output.trim();
  if (text === "") return [];
  // Older compose releases print one JSON array; newer ones print one object per line.
  const values: unknown[] = text.startsWith("[")
    ? [JSON.parse(text)].flat()
    : text.split("\n").filter((l) => l.trim() !== "").map((l): unknown => JSON.parse(l));
  return values.filter(isRecord);
}

const STATE_RANK: Record<string, number> = { running: 0, created: 1, restarting: 2, paused: 3, exited: 4, dead: 5 };

function rank(s: ServiceState): number {
  return s.health === "unhealthy" ? 6 : (STATE_RANK[s.state] ?? 7);
}

/** Fold every container of a service into one state; the worst container wins. */
export function parseServiceState(service: string, psOutput: string): ServiceState {
  const containers = parseContainers(psOutput).filter((c) => c.Service === undefined || c.Service === service);
  if (containers.length === 0) return { service, state: "missing" };

  let worst: ServiceState | null = null;
  for (const c of containers) {
    const state = typeof c.State === "string" ? c.State.toLowerCase() : "unknown";
    const rawHealth = typeof c.Health === "string" ? c.Health.toLowerCase() : "";
    const health = rawHealth === "healthy" || rawHealth === "unhealthy" || rawHealth === "starting" ? rawHealth : undefined;
    const exitCode = typeof c.ExitCode === "number" ? c.ExitCode : undefined;
    const current: ServiceState = { service, state, health, exitCode };
    if (!worst || rank(current) > rank(worst)) worst = current;
  }
  return worst ?? { service, state: "missing" };
}

class ComposeHandle implements TopologyHandle {
  constructor(
    readonly id: string,
    private readonly workDir: string,
    private readonly composePath: string,
    private readonly run: CommandRunner
  ) {}

  private args(...rest: string[]): string[] {
    return ["compose", "-p", this.id, "-f", this.composePath, ...rest];
  }

  async up(): Promise<void> {
    await this.run("docker", this.args("up", "-d"), { cwd: this.workDir, timeoutMs: 600_000 });
  }

  async status(service: string): Promise<ServiceState> {
    const out = await this.run("docker", this.args("ps", "--all", "--format", "json", service), { cwd: this.workDir });
    return parseServiceState(service, out);
  }

  async logs(service: string, tail: number): Promise<string> {
    return this.run("docker", this.args("logs", "--no-color", "--tail", String(tail), service), { cwd: this.workDir });
  }

  private pending: Promise<void> | null = null;

  teardown(): Promise<void> {
    this.pending ??= this.down();
    return this.pending;
  }

  private async down(): Promise<void> {
    try {
      // Nothing was handed to compose if start failed before the file existed.
      if (fs.existsSync(this.composePath)) {
        await this.run("docker", this.args("down", "-v", "--remove-orphans", "--timeout", "10"), { cwd: this.workDir });
      }
    } finally {
      // Secret files go with the working directory.
      fs.rmSync(this.workDir, { recursive: true, force: true });
    }
  }
}

/**
 * Runs the topology as a Docker Compose project. Each start gets its own
 * project name and a private working directory holding the compose file and
 * one file per secret.
 */
export class ComposeRuntime implements ServiceRuntime {
  private readonly projectPrefix: string;
  private readonly run: CommandRunner;
  private readonly tmpRoot: string;

  constructor(opts: ComposeRuntimeOptions = {}) {
    this.projectPrefix = opts.projectPrefix ?? "releasectl";
    this.run = opts.run ?? runCommand;
    this.tmpRoot = opts.tmpRoot ?? os.tmpdir();
  }

  async start(topology: ServiceTopology, secrets: SecretBundle): Promise<TopologyHandle> {
    const projectName = `${this.projectPrefix}-${topology.name}-${crypto.randomBytes(3).toString("hex")}`;
    const workDir = fs.mkdtempSync(path.join(this.tmpRoot, `${projectName}-`));
    const composePath = path.join(workDir, "compose.yaml");
    const handle = new ComposeHandle(projectName, workDir, composePath, this.run);

    try {
      const secretsDir = path.join(workDir, "secrets");
      fs.mkdirSync(secretsDir, { mode: 0o700 });
      for (const svc of topology.services) {
        for (const name of svc.secrets) {
          const value = secrets[name];
          if (value === undefined) throw new Error(`Secret not in bundle: ${name}`);
          fs.writeFileSync(path.join(secretsDir, name), value, { mode: 0o600 });
        }
      }
      fs.writeFileSync(composePath, YAML.stringify(buildComposeFile(topology, projectName)), "utf8");
      await handle.up();
    } catch (e) {
      throw new StartError(`Failed to start ${projectName}: ${e instanceof Error ? e.message : String(e)}`, handle, { cause: e });
    }

    return handle;
  }
}
