import path from "node:path";
import { StructuralError } from "../core/errors.js";
import { diag } from "../core/diagnostics.js";
import { requiredSecrets } from "../topology/validator.js";
import type { Manifest, ManifestSet } from "../types/manifest.js";
import type { SecretBundle } from "../types/secrets.js";
import type { ServiceTopology } from "../types/topology.js";
import { buildBindings, type BindingOptions } from "./bindings.js";
import { loadCatalog } from "./catalog.js";
import { orderManifests } from "./order.js";
import { renderSecretManifest } from "./secret.js";
import { renderFromTemplate } from "./template.js";

export type RenderOptions = BindingOptions & {
  templatesDir: string;
};

/**
 * Render the Secret plus every applicable template of the store and put them
 * in emission order. Callers must not reorder the result.
 */
export function renderManifestSet(topology: ServiceTopology, secrets: SecretBundle, opts: RenderOptions): ManifestSet {
  const secret = renderSecretManifest(secrets, {
    name: opts.secretName,
    namespace: opts.namespace,
    app: opts.app,
    required: requiredSecrets(topology),
  });

  const bindings = buildBindings(topology, opts);
  const services = new Set(topology.services.map((s) => s.name));
  const rendered: Manifest[] = [secret];

  for (const entry of loadCatalog(opts.templatesDir)) {
    if (entry.service !== undefined && !services.has(entry.service)) {
      throw new StructuralError(`Template ${entry.file} is bound to unknown service: ${entry.service}`, [
        diag("error", "TEMPLATE_SERVICE_UNKNOWN", `Template ${entry.file} is bound to unknown service: ${entry.service}`, {
          path: entry.file,
        }),
      ]);
    }
    if (entry.when !== undefined && !Object.prototype.hasOwnProperty.call(bindings, entry.when)) continue;
    rendered.push(renderFromTemplate(path.join(opts.templatesDir, entry.file), bindings, entry.service));
  }

  return { manifests: orderManifests(rendered, topology) };
}
