import YAML from "yaml";
import { diag, type Diagnostic } from "../core/diagnostics.js";
import { createRegistry, type SchemaRegistry } from "../schema/registry.js";
import type { Manifest, ManifestDocument, ManifestSet, ValidatedManifestSet } from "../types/manifest.js";
import { orderingErrors } from "./order.js";

export type ManifestValidation = { ok: true; set: ValidatedManifestSet } | { ok: false; errors: Diagnostic[] };

/**
 * Syntactic check of a rendered set: each content parses as exactly one YAML
 * document that conforms to the manifest schema and matches its recorded
 * kind/name, names are unique per kind, and the set keeps its emission order.
 * Nothing is checked against a live cluster.
 */
export async function validateAll(set: ManifestSet, registry?: SchemaRegistry): Promise<ManifestValidation> {
  const reg = registry ?? (await createRegistry());
  const errors: Diagnostic[] = [];

  if (set.manifests.length === 0) {
    return { ok: false, errors: [diag("error", "MANIFEST_SET_EMPTY", "Manifest set is empty")] };
  }

  const reparsed: Manifest[] = [];
  const seen = new Set<string>();

  for (const m of set.manifests) {
    const at = m.fileName || `${m.kind}/${m.name}`;
    const docs = YAML.parseAllDocuments(m.content);
    if (docs.length !== 1) {
      errors.push(diag("error", "MANIFEST_DOCUMENT_COUNT", `${at}: expected one document, found ${docs.length}`, { path: at }));
      continue;
    }
    const [doc] = docs;
    if (doc.errors.length > 0) {
      for (const e of doc.errors) {
        errors.push(diag("error", "MANIFEST_YAML_INVALID", `${at}: ${e.message}`, { path: at }));
      }
      continue;
    }

    const checked = await reg.check<ManifestDocument>("manifest", doc.toJS(), "manifest");
    if (!checked.ok) {
      errors.push(diag("error", "MANIFEST_INVALID", `${at}: ${checked.errors}`, { path: at }));
      continue;
    }
    const value = checked.value;

    if (value.kind !== m.kind || value.metadata.name !== m.name) {
      errors.push(
        diag("error", "MANIFEST_IDENTITY_MISMATCH", `${at}: content is ${value.kind}/${value.metadata.name}`, {
          path: at,
          details: { expected: `${m.kind}/${m.name}` },
        })
      );
    }

    const key = `${value.kind}/${value.metadata.name}`;
    if (seen.has(key)) {
      errors.push(diag("error", "MANIFEST_DUPLICATE", `${at}: duplicate ${key}`, { path: at }));
    }
    seen.add(key);
    reparsed.push({ ...m, document: value });
  }

  if (errors.length === 0) {
    for (const message of orderingErrors(reparsed)) {
      errors.push(diag("error", "MANIFEST_ORDER_INVALID", message));
    }
  }

  if (errors.length > 0) return { ok: false, errors };
  return { ok: true, set: { manifests: reparsed, validated: true } };
}
