import YAML from "yaml";
import { RenderError } from "../core/errors.js";
import { missingSecrets } from "../secrets/bundle.js";
import type { Manifest, ManifestDocument } from "../types/manifest.js";
import type { SecretBundle } from "../types/secrets.js";

export type SecretManifestOptions = {
  name: string;
  namespace: string;
  app?: string;
  /** Names that must be present in the bundle. */
  required?: string[];
};

/**
 * One Secret document, one base64 field per bundle entry, keys sorted.
 *
 * base64 is transport encoding only: anyone who can read the manifest or the
 * archive can read the values. Confidentiality at rest is the cluster's job.
 */
export function renderSecretManifest(secrets: SecretBundle, opts: SecretManifestOptions): Manifest {
  const missing = missingSecrets(secrets, opts.required ?? []);
  if (missing.length > 0) {
    throw new RenderError(`Missing secret(s): ${missing.join(", ")}`, missing);
  }

  const names = Object.keys(secrets).sort();
  if (names.length === 0) {
    throw new RenderError("Secret bundle is empty");
  }

  const data: Record<string, string> = {};
  for (const name of names) {
    data[name] = Buffer.from(secrets[name], "utf8").toString("base64");
  }

  const document: ManifestDocument = {
    apiVersion: "v1",
    kind: "Secret",
    metadata: {
      name: opts.name,
      namespace: opts.namespace,
      ...(opts.app ? { labels: { "app.kubernetes.io/part-of": opts.app } } : {}),
    },
    type: "Opaque",
    data,
  };

  return {
    kind: "Secret",
    name: opts.name,
    fileName: "",
    content: YAML.stringify(document),
    document,
  };
}
