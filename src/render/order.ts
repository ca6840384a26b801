import { StructuralError } from "../core/errors.js";
import { isRecord } from "../core/guards.js";
import type { Manifest } from "../types/manifest.js";
import type { ServiceTopology } from "../types/topology.js";

export type References = {
  claims: Set<string>;
  configMaps: Set<string>;
  secrets: Set<string>;
};

/** Names of claims, config maps and secrets a document points at, wherever they appear. */
export function collectReferences(value: unknown, refs: References = emptyRefs()): References {
  if (Array.isArray(value)) {
    for (const item of value) collectReferences(item, refs);
    return refs;
  }
  if (!isRecord(value)) return refs;

  for (const [key, child] of Object.entries(value)) {
    if (key === "claimName" && typeof child === "string") refs.claims.add(child);
    if ((key === "configMap" || key === "configMapRef" || key === "configMapKeyRef") && isRecord(child) && typeof child.name === "string") {
      refs.configMaps.add(child.name);
    }
    if ((key === "secretRef" || key === "secretKeyRef") && isRecord(child) && typeof child.name === "string") {
      refs.secrets.add(child.name);
    }
    if (key === "secret" && isRecord(child) && typeof child.secretName === "string") {
      refs.secrets.add(child.secretName);
    }
    collectReferences(child, refs);
  }
  return refs;
}

function emptyRefs(): References {
  return { claims: new Set(), configMaps: new Set(), secrets: new Set() };
}

export function manifestFileName(index: number, m: Pick<Manifest, "kind" | "name">): string {
  return `${String(index).padStart(2, "0")}-${m.kind.toLowerCase()}-${m.name}.yaml`;
}

/**
 * Emission order for a rendered set. Secrets first; after that a stable
 * topological order in which every referenced claim, config map or secret
 * precedes the documents that reference it, and a service's Deployment
 * follows the Deployments of the services it depends on. Ties keep input
 * order. File names are assigned from the final position.
 */
export function orderManifests(manifests: Manifest[], topology?: ServiceTopology): Manifest[] {
  const n = manifests.length;
  const preds: Set<number>[] = manifests.map(() => new Set<number>());
  const indexOf = (kind: string, name: string) => manifests.findIndex((m) => m.kind === kind && m.name === name);

  manifests.forEach((m, i) => {
    if (m.kind === "Secret") return;
    const refs = collectReferences(m.document);
    for (const claim of refs.claims) {
      const j = indexOf("PersistentVolumeClaim", claim);
      if (j !== -1 && j !== i) preds[i].add(j);
    }
    for (const cm of refs.configMaps) {
      const j = indexOf("ConfigMap", cm);
      if (j !== -1 && j !== i) preds[i].add(j);
    }
    // Every Secret goes before every non-Secret.
    manifests.forEach((other, j) => {
      if (other.kind === "Secret") preds[i].add(j);
    });
  });

  if (topology) {
    const deps = new Map(topology.services.map((s) => [s.name, s.dependsOn ?? []]));
    manifests.forEach((m, i) => {
      if (m.kind !== "Deployment" || !m.service) return;
      for (const dep of deps.get(m.service) ?? []) {
        manifests.forEach((other, j) => {
          if (other.kind === "Deployment" && other.service === dep) preds[i].add(j);
        });
      }
    });
  }

  const placed = new Set<number>();
  const order: number[] = [];
  while (order.length < n) {
    let next = -1;
    for (let i = 0; i < n; i++) {
      if (placed.has(i)) continue;
      if ([...preds[i]].every((p) => placed.has(p))) {
        next = i;
        break;
      }
    }
    if (next === -1) {
      const stuck = manifests.filter((_, i) => !placed.has(i)).map((m) => `${m.kind}/${m.name}`);
      throw new StructuralError(`Manifest references form a cycle: ${stuck.join(", ")}`);
    }
    placed.add(next);
    order.push(next);
  }

  return order.map((i, position) => ({ ...manifests[i], fileName: manifestFileName(position, manifests[i]) }));
}

/**
 * Ordering violations in an already ordered set: the Secret must come first
 * and every referenced claim, config map or secret must precede its users.
 * Deployment dependency order needs the topology's `dependsOn` and is not
 * checked here.
 */
export function orderingErrors(manifests: Manifest[]): string[] {
  const errors: string[] = [];
  if (manifests.length > 0 && manifests[0].kind !== "Secret") {
    errors.push(`Secret manifest must be first (found ${manifests[0].kind}/${manifests[0].name})`);
  }

  const position = new Map(manifests.map((m, i) => [`${m.kind}/${m.name}`, i]));
  manifests.forEach((m, i) => {
    const refs = collectReferences(m.document);
    for (const claim of refs.claims) {
      const at = position.get(`PersistentVolumeClaim/${claim}`);
      if (at !== undefined && at > i) {
        errors.push(`${m.kind}/${m.name} references claim ${claim} before it is declared`);
      }
    }
    for (const cm of refs.configMaps) {
      const at = position.get(`ConfigMap/${cm}`);
      if (at !== undefined && at > i) {
        errors.push(`${m.kind}/${m.name} references configmap ${cm} before it is declared`);
      }
    }
    for (const secret of refs.secrets) {
      const at = position.get(`Secret/${secret}`);
      if (at !== undefined && at > i) {
        errors.push(`${m.kind}/${m.name} references secret ${secret} before it is declared`);
      }
    }
  });
  return errors;
}
