import type { AccessMode, ServiceTopology } from "../types/topology.js";
import { resolveProbes } from "./probes.js";

export type BindingValue = string | number | boolean;
export type Bindings = Readonly<Record<string, BindingValue>>;

export type BindingOptions = {
  namespace: string;
  app: string;
  secretName: string;
};

const ACCESS_MODES: Record<AccessMode, string> = {
  "exclusive-writer": "ReadWriteOnce",
  "shared-writer": "ReadWriteMany",
};

export function claimName(service: string): string {
  return `${service}-data`;
}

/**
 * Flat placeholder bindings for the template store: globals plus one
 * `<service>.<field>` group per service. Probe timing is always bound, from
 * tier defaults unless the service overrides it.
 */
export function buildBindings(topology: ServiceTopology, opts: BindingOptions): Bindings {
  const b: Record<string, BindingValue> = {
    namespace: opts.namespace,
    release: opts.app,
    "secret.name": opts.secretName,
    "topology.name": topology.name,
  };

  for (const svc of topology.services) {
    const p = svc.name;
    b[`${p}.name`] = svc.name;
    b[`${p}.image`] = svc.image;
    b[`${p}.replicas`] = svc.replicas;
    b[`${p}.tier`] = svc.tier;
    b[`${p}.cpu.request`] = svc.resources.requests.cpu;
    b[`${p}.cpu.limit`] = svc.resources.limits.cpu;
    b[`${p}.memory.request`] = svc.resources.requests.memory;
    b[`${p}.memory.limit`] = svc.resources.limits.memory;
    if (svc.port !== undefined) b[`${p}.port`] = svc.port;

    if (svc.storage) {
      b[`${p}.storage.size`] = svc.storage.size;
      b[`${p}.storage.accessMode`] = ACCESS_MODES[svc.storage.accessMode];
      b[`${p}.storage.claim`] = claimName(svc.name);
      if (svc.storage.mountPath) b[`${p}.storage.mountPath`] = svc.storage.mountPath;
    }

    const probes = resolveProbes(svc.tier, svc.probes);
    for (const kind of ["liveness", "readiness"] as const) {
      const t = probes[kind];
      b[`${p}.${kind}.initialDelaySeconds`] = t.initialDelaySeconds;
      b[`${p}.${kind}.periodSeconds`] = t.periodSeconds;
      b[`${p}.${kind}.timeoutSeconds`] = t.timeoutSeconds;
      b[`${p}.${kind}.failureThreshold`] = t.failureThreshold;
    }

    if (svc.backup) b[`${p}.backup.schedule`] = svc.backup.schedule;
  }

  return Object.freeze(b);
}
