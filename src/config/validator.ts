import { loadAjv, formatErrors, asGuard } from "../schema/ajv.js";
import type { ReleaseConfig } from "../types/config.js";
import { loadRawConfig } from "./loader.js";

/** Required config fields and their types. */
const CONFIG_SCHEMA = {
  type: "object",
  required: ["schema_version", "runs_dir", "topology", "health", "render", "package", "publish", "secrets"],
  properties: {
    schema_version: { type: "string", minLength: 1 },
    runs_dir: { type: "string", minLength: 1 },
    topology: { type: "string", minLength: 1 },
    health: {
      type: "object",
      required: ["poll_interval_ms", "max_attempts", "log_tail_lines", "project_prefix"],
      properties: {
        poll_interval_ms: { type: "integer", minimum: 0 },
        max_attempts: { type: "integer", minimum: 0 },
        log_tail_lines: { type: "integer", minimum: 1 },
        project_prefix: { type: "string", pattern: "^[a-z0-9][a-z0-9_-]*$" },
      },
    },
    render: {
      type: "object",
      required: ["templates_dir", "namespace", "app", "secret_name"],
      properties: {
        templates_dir: { type: "string", minLength: 1 },
        namespace: { type: "string", pattern: "^[a-z0-9]([-a-z0-9]*[a-z0-9])?$" },
        app: { type: "string", minLength: 1 },
        secret_name: { type: "string", pattern: "^[a-z0-9]([-a-z0-9]*[a-z0-9])?$" },
      },
    },
    package: {
      type: "object",
      required: ["out_dir", "root_dir", "archive_name"],
      properties: {
        out_dir: { type: "string", minLength: 1 },
        root_dir: { type: "string", pattern: "^[A-Za-z0-9._-]+$" },
        archive_name: { type: "string", pattern: "^[A-Za-z0-9._-]+\\.(tar\\.gz|tgz)$" },
      },
    },
    publish: {
      type: "object",
      required: ["host", "port", "remote_dir", "secure", "verify_certificate", "user_env", "password_env"],
      properties: {
        host: { type: "string" },
        port: { type: "integer", minimum: 1, maximum: 65535 },
        remote_dir: { type: "string", minLength: 1 },
        secure: { type: "boolean" },
        verify_certificate: { type: "boolean" },
        user_env: { type: "string", minLength: 1 },
        password_env: { type: "string", minLength: 1 },
      },
    },
    secrets: {
      type: "object",
      required: ["source"],
      properties: {
        source: { type: "string", enum: ["env", "file"] },
        env_prefix: { type: "string" },
        file: { type: "string", minLength: 1 },
      },
      if: { type: "object", properties: { source: { const: "file" } }, required: ["source"] },
      then: { type: "object", required: ["file"], properties: { file: { type: "string" } } },
    },
  },
};

/** Load the layered config and check it; the only way to obtain a ReleaseConfig. */
export async function loadConfig(
  envName?: string,
  configDir?: string,
  env?: NodeJS.ProcessEnv
): Promise<{ ok: true; config: ReleaseConfig } | { ok: false; errors: string }> {
  const raw = loadRawConfig(envName, configDir, env);
  const ajv = await loadAjv();
  const validate = ajv.compile(CONFIG_SCHEMA);
  const isReleaseConfig = asGuard<ReleaseConfig>(validate);
  if (!isReleaseConfig(raw)) {
    return { ok: false, errors: formatErrors(ajv, validate.errors, "config") };
  }
  return { ok: true, config: raw };
}
