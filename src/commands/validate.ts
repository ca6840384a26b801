import path from "node:path";
import { loadConfig } from "../config/validator.js";
import { diag, type Diagnostic } from "../core/diagnostics.js";
import { StructuralError, errorMessage } from "../core/errors.js";
import { loadCatalog } from "../render/catalog.js";
import { secretSourceFromConfig } from "../secrets/bundle.js";
import { loadTopology, requiredSecrets, validateTopology } from "../topology/validator.js";
import type { ServiceTopology } from "../types/topology.js";

export type ValidateResult = { ok: true; topology: ServiceTopology } | { ok: false; errors: Diagnostic[] };

export type ValidateOptions = {
  configDir?: string;
  env?: string;
  /** Overrides the configured topology path. */
  topologyPath?: string;
  /** Also load the secret bundle and check every reference resolves. */
  checkSecrets?: boolean;
  cwd?: string;
  envVars?: NodeJS.ProcessEnv;
};

/**
 * Offline checks of everything a run would read before its first side
 * effect: config, topology, template catalog and optionally secrets.
 */
export async function validateProject(opts: ValidateOptions = {}): Promise<ValidateResult> {
  const cwd = opts.cwd ?? process.cwd();
  const envVars = opts.envVars ?? process.env;

  const loaded = await loadConfig(opts.env, opts.configDir ? path.resolve(cwd, opts.configDir) : undefined, envVars);
  if (!loaded.ok) {
    return { ok: false, errors: [diag("error", "CONFIG_INVALID", `Config invalid: ${loaded.errors}`)] };
  }
  const config = loaded.config;

  const topologyPath = path.resolve(cwd, opts.topologyPath ?? config.topology);
  const doc = loadTopology(topologyPath);
  if (!doc.ok) return { ok: false, errors: doc.errors };

  const shape = await validateTopology(doc.doc);
  if (!shape.ok) return { ok: false, errors: shape.errors.map((e) => ({ ...e, path: topologyPath })) };

  const errors: Diagnostic[] = [];
  try {
    loadCatalog(path.resolve(cwd, config.render.templates_dir));
  } catch (e) {
    if (!(e instanceof StructuralError)) throw e;
    errors.push(...e.diagnostics);
  }

  if (opts.checkSecrets) {
    try {
      const bundle = await secretSourceFromConfig(config.secrets, cwd, envVars).load(requiredSecrets(shape.topology));
      const full = await validateTopology(doc.doc, { secretNames: Object.keys(bundle) });
      if (!full.ok) errors.push(...full.errors);
    } catch (e) {
      errors.push(diag("error", "SECRETS_UNAVAILABLE", `Secrets could not be loaded: ${errorMessage(e)}`));
    }
  }

  if (errors.length > 0) return { ok: false, errors };
  return { ok: true, topology: shape.topology };
}
