import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { isRecord } from "../core/guards.js";
import type { SecretsConfig } from "../types/config.js";
import type { SecretBundle, SecretSource } from "../types/secrets.js";

/** Freeze a name → value map into a SecretBundle. */
export function createSecretBundle(entries: Record<string, string>): SecretBundle {
  return Object.freeze({ ...entries });
}

export function missingSecrets(bundle: SecretBundle, required: string[]): string[] {
  return required.filter((name) => !Object.prototype.hasOwnProperty.call(bundle, name));
}

/** db-root-password → DB_ROOT_PASSWORD */
export function secretEnvName(name: string, prefix = ""): string {
  return prefix + name.replace(/[^a-zA-Z0-9]/g, "_").toUpperCase();
}

/** Reads secrets from environment variables, e.g. CI-injected repository secrets. */
export class EnvSecretSource implements SecretSource {
  constructor(
    private readonly prefix = "",
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {}

  async load(names: string[]): Promise<SecretBundle> {
    const entries: Record<string, string> = {};
    for (const name of names) {
      const value = this.env[secretEnvName(name, this.prefix)];
      if (value !== undefined && value !== "") entries[name] = value;
    }
    return createSecretBundle(entries);
  }
}

/** Reads secrets from a YAML map file kept outside the repository. */
export class FileSecretSource implements SecretSource {
  constructor(private readonly filePath: string) {}

  async load(names: string[]): Promise<SecretBundle> {
    if (!fs.existsSync(this.filePath)) {
      throw new Error(`Secrets file not found: ${this.filePath}`);
    }
    const parsed: unknown = YAML.parse(fs.readFileSync(this.filePath, "utf8"));
    if (!isRecord(parsed)) {
      throw new Error(`Secrets file must contain a mapping: ${this.filePath}`);
    }
    const entries: Record<string, string> = {};
    for (const name of names) {
      const value = parsed[name];
      if (typeof value === "string" && value !== "") entries[name] = value;
      else if (typeof value === "number") entries[name] = String(value);
    }
    return createSecretBundle(entries);
  }
}

/** The SecretSource a config selects; relative file paths resolve against `cwd`. */
export function secretSourceFromConfig(
  config: SecretsConfig,
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env
): SecretSource {
  if (config.source === "file") return new FileSecretSource(path.resolve(cwd, config.file));
  return new EnvSecretSource(config.env_prefix ?? "", env);
}
