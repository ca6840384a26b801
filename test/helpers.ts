import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import YAML from "yaml";
import { StartError, type ServiceRuntime, type ServiceState, type TopologyHandle } from "../src/health/runtime.js";
import { createSecretBundle } from "../src/secrets/bundle.js";
import type { SecretBundle } from "../src/types/secrets.js";
import type { ServiceTopology } from "../src/types/topology.js";

export const TEMPLATES_DIR = path.resolve(import.meta.dirname, "../templates");
export const CONFIG_DIR = path.resolve(import.meta.dirname, "../config");

export function tmpDir(prefix = "releasectl-test-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/** A database and a CMS front end that depends on it. */
export function cmsTopology(): ServiceTopology {
  return {
    name: "cms",
    services: [
      {
        name: "db",
        tier: "database",
        image: "mysql:8.0",
        replicas: 1,
        port: 3306,
        resources: { requests: { cpu: "250m", memory: "512Mi" }, limits: { cpu: "1", memory: "1Gi" } },
        storage: { size: "5Gi", accessMode: "exclusive-writer", mountPath: "/var/lib/mysql" },
        secrets: ["db-root-password", "db-password", "db-user", "db-name"],
      },
      {
        name: "app",
        tier: "application",
        image: "wordpress:6",
        replicas: 4,
        port: 80,
        resources: { requests: { cpu: "100m", memory: "256Mi" }, limits: { cpu: "500m", memory: "512Mi" } },
        storage: { size: "5Gi", accessMode: "shared-writer", mountPath: "/var/www/html" },
        secrets: ["db-password", "db-user", "db-name"],
        dependsOn: ["db"],
        environment: { WORDPRESS_DB_HOST: "db:3306" },
      },
    ],
  };
}

export const CMS_SECRETS: Record<string, string> = {
  "db-root-password": "test-root-secret",
  "db-password": "test-secret",
  "db-user": "cms-user",
  "db-name": "cms-db",
};

export function cmsSecrets(overrides: Record<string, string> = {}): SecretBundle {
  return createSecretBundle({ ...CMS_SECRETS, ...overrides });
}

export function writeTopology(dir: string, topology: ServiceTopology, file = "topology.yaml"): string {
  const p = path.join(dir, file);
  fs.writeFileSync(p, YAML.stringify(topology), "utf8");
  return p;
}

/**
 * In-process ServiceRuntime. `script` returns what each service reports on the
 * given (1-based) poll attempt.
 */
export class FakeRuntime implements ServiceRuntime {
  starts = 0;
  teardowns = 0;
  polls = 0;
  logRequests: Array<{ service: string; tail: number }> = [];
  startedWith: SecretBundle | null = null;

  constructor(
    private readonly script: (service: string, attempt: number) => Omit<ServiceState, "service"> = () => ({ state: "running" }),
    private readonly opts: { failStart?: boolean; failStatus?: boolean; failTeardown?: boolean; logs?: (service: string) => string } = {}
  ) {}

  async start(topology: ServiceTopology, secrets: SecretBundle): Promise<TopologyHandle> {
    this.starts++;
    this.startedWith = secrets;
    const attempts = new Map<string, number>();
    const handle: TopologyHandle = {
      id: `fake-${topology.name}`,
      status: async (service) => {
        if (this.opts.failStatus) throw new Error("runtime went away");
        this.polls++;
        const attempt = (attempts.get(service) ?? 0) + 1;
        attempts.set(service, attempt);
        return { service, ...this.script(service, attempt) };
      },
      logs: async (service, tail) => {
        this.logRequests.push({ service, tail });
        return this.opts.logs ? this.opts.logs(service) : `${service} log line`;
      },
      teardown: async () => {
        this.teardowns++;
        if (this.opts.failTeardown) throw new Error("compose down failed");
      },
    };
    if (this.opts.failStart) throw new StartError("compose up failed", handle);
    return handle;
  }
}

export const noSleep = async (): Promise<void> => {};
