import fs from "node:fs";
import YAML from "yaml";
import { diag, type Diagnostic } from "../core/diagnostics.js";
import { createRegistry, type SchemaRegistry } from "../schema/registry.js";
import type { ServiceSpec, ServiceTopology } from "../types/topology.js";
import { parseBytes, parseCpu } from "./quantity.js";

export type TopologyValidation = { ok: true; topology: ServiceTopology } | { ok: false; errors: Diagnostic[] };

export type TopologyLoad = { ok: true; doc: unknown } | { ok: false; errors: Diagnostic[] };

/** Read and parse a topology description. Never throws. */
export function loadTopology(filePath: string): TopologyLoad {
  if (!fs.existsSync(filePath)) {
    return { ok: false, errors: [diag("error", "TOPOLOGY_MISSING", `Topology file not found: ${filePath}`, { path: filePath })] };
  }
  const parsed = YAML.parseDocument(fs.readFileSync(filePath, "utf8"));
  if (parsed.errors.length > 0) {
    return {
      ok: false,
      errors: parsed.errors.map((e) =>
        diag("error", "TOPOLOGY_YAML_INVALID", `Topology is not valid YAML (${filePath}): ${e.message}`, { path: filePath })
      ),
    };
  }
  return { ok: true, doc: parsed.toJS() };
}

/** Every secret name the topology references, in first-use order. */
export function requiredSecrets(topology: ServiceTopology): string[] {
  const seen = new Set<string>();
  for (const svc of topology.services) {
    for (const name of svc.secrets) seen.add(name);
  }
  return [...seen];
}

/**
 * Services ordered so that each comes after everything it depends on.
 * Returns null when dependsOn forms a cycle.
 */
export function dependencyOrder(services: ServiceSpec[]): ServiceSpec[] | null {
  const byName = new Map(services.map((s) => [s.name, s]));
  const state = new Map<string, "visiting" | "done">();
  const out: ServiceSpec[] = [];

  const visit = (svc: ServiceSpec): boolean => {
    const mark = state.get(svc.name);
    if (mark === "done") return true;
    if (mark === "visiting") return false;
    state.set(svc.name, "visiting");
    for (const dep of svc.dependsOn ?? []) {
      const target = byName.get(dep);
      if (target && !visit(target)) return false;
    }
    state.set(svc.name, "done");
    out.push(svc);
    return true;
  };

  for (const svc of services) {
    if (!visit(svc)) return null;
  }
  return out;
}

function semanticErrors(topology: ServiceTopology, secretNames?: ReadonlySet<string>): Diagnostic[] {
  const errors: Diagnostic[] = [];
  const names = new Set<string>();

  for (const svc of topology.services) {
    if (names.has(svc.name)) {
      errors.push(diag("error", "SERVICE_DUPLICATE", `Duplicate service name: ${svc.name}`, { path: `services.${svc.name}` }));
    }
    names.add(svc.name);
  }

  for (const svc of topology.services) {
    const at = `services.${svc.name}`;

    for (const dep of svc.dependsOn ?? []) {
      if (dep === svc.name) {
        errors.push(diag("error", "DEPENDENCY_SELF", `Service ${svc.name} depends on itself`, { path: `${at}.dependsOn` }));
      } else if (!names.has(dep)) {
        errors.push(
          diag("error", "DEPENDENCY_UNKNOWN", `Service ${svc.name} depends on unknown service: ${dep}`, {
            path: `${at}.dependsOn`,
          })
        );
      }
    }

    const { requests, limits } = svc.resources;
    if (parseCpu(requests.cpu) > parseCpu(limits.cpu)) {
      errors.push(
        diag("error", "RESOURCE_REQUEST_EXCEEDS_LIMIT", `Service ${svc.name}: cpu request ${requests.cpu} exceeds limit ${limits.cpu}`, {
          path: `${at}.resources`,
        })
      );
    }
    if (parseBytes(requests.memory) > parseBytes(limits.memory)) {
      errors.push(
        diag(
          "error",
          "RESOURCE_REQUEST_EXCEEDS_LIMIT",
          `Service ${svc.name}: memory request ${requests.memory} exceeds limit ${limits.memory}`,
          { path: `${at}.resources` }
        )
      );
    }

    if (svc.storage && parseBytes(svc.storage.size) <= 0) {
      errors.push(diag("error", "STORAGE_EMPTY", `Service ${svc.name}: storage size must be positive`, { path: `${at}.storage` }));
    }

    if (secretNames) {
      for (const secret of svc.secrets) {
        if (!secretNames.has(secret)) {
          errors.push(
            diag("error", "SECRET_UNRESOLVED", `Service ${svc.name} references unresolved secret: ${secret}`, {
              path: `${at}.secrets`,
              details: { secret },
            })
          );
        }
      }
    }
  }

  if (errors.length === 0 && dependencyOrder(topology.services) === null) {
    errors.push(diag("error", "DEPENDENCY_CYCLE", "Service dependencies form a cycle", { path: "services" }));
  }

  return errors;
}

/**
 * Structural check of a parsed topology. Schema first, then cross-field rules;
 * when `secretNames` is given every secret reference must be in it.
 */
export async function validateTopology(
  doc: unknown,
  opts: { secretNames?: Iterable<string>; registry?: SchemaRegistry } = {}
): Promise<TopologyValidation> {
  const registry = opts.registry ?? (await createRegistry());
  const checked = await registry.check<ServiceTopology>("topology", doc, "topology");
  if (!checked.ok) {
    return {
      ok: false,
      errors: checked.errors.split("; ").map((message) => diag("error", "TOPOLOGY_INVALID", `Topology invalid: ${message}`)),
    };
  }

  const secretNames = opts.secretNames ? new Set(opts.secretNames) : undefined;
  const errors = semanticErrors(checked.value, secretNames);
  if (errors.length > 0) return { ok: false, errors };
  return { ok: true, topology: checked.value };
}
