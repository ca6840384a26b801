import type { ProbeOverrides, ProbeSettings, ServiceTier } from "../types/topology.js";

/** Cluster probe timing per tier, in seconds. Independent of the local health gate. */
export const DEFAULT_PROBES: Record<ServiceTier, ProbeSettings> = {
  database: {
    liveness: { initialDelaySeconds: 30, periodSeconds: 10, timeoutSeconds: 5, failureThreshold: 3 },
    readiness: { initialDelaySeconds: 20, periodSeconds: 5, timeoutSeconds: 3, failureThreshold: 2 },
  },
  application: {
    liveness: { initialDelaySeconds: 40, periodSeconds: 15, timeoutSeconds: 5, failureThreshold: 3 },
    readiness: { initialDelaySeconds: 20, periodSeconds: 5, timeoutSeconds: 3, failureThreshold: 2 },
  },
};

export function resolveProbes(tier: ServiceTier, overrides?: ProbeOverrides): ProbeSettings {
  const base = DEFAULT_PROBES[tier];
  return {
    liveness: { ...base.liveness, ...overrides?.liveness },
    readiness: { ...base.readiness, ...overrides?.readiness },
  };
}
