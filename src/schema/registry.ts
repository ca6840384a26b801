import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { asGuard, loadAjv, type AjvValidateFn, type AjvInstance } from "./ajv.js";

export type SchemaEntry = {
  name: string;
  filePath: string;
  schema: unknown;
};

export type SchemaCheck<T> = { ok: true; value: T } | { ok: false; errors: string };

export const DEFAULT_SCHEMA_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../schemas");

/**
 * Schema registry: discovers every *.schema.json in a directory and compiles
 * validators on demand.
 */
export class SchemaRegistry {
  private entries = new Map<string, SchemaEntry>();
  private validators = new Map<string, AjvValidateFn>();
  private ajv: AjvInstance | null = null;

  constructor(private readonly schemaDir: string) {}

  /** Discover all *.schema.json files in the schema directory. */
  async load(): Promise<void> {
    if (!fs.existsSync(this.schemaDir)) {
      throw new Error(`Schema directory not found: ${this.schemaDir}`);
    }

    const files = fs.readdirSync(this.schemaDir).filter((f) => f.endsWith(".schema.json"));

    for (const file of files) {
      const filePath = path.join(this.schemaDir, file);
      const schema: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));

      // "topology.schema.json" → "topology"
      const name = file.replace(/\.schema\.json$/, "");
      this.entries.set(name, { name, filePath, schema });
    }

    this.ajv = await loadAjv();
  }

  async getValidator(name: string): Promise<AjvValidateFn> {
    const cached = this.validators.get(name);
    if (cached) return cached;

    const entry = this.entries.get(name);
    if (!entry) {
      throw new Error(`Schema not found: ${name}`);
    }

    const validate = (await this.instance()).compile(entry.schema);
    this.validators.set(name, validate);
    return validate;
  }

  /**
   * Narrow `data` to T with the named schema. The caller vouches that the
   * schema describes T; the registry only knows the schema is well-formed.
   */
  async check<T>(name: string, data: unknown, dataVar = name): Promise<SchemaCheck<T>> {
    const validate = await this.getValidator(name);
    const isT = asGuard<T>(validate);
    if (isT(data)) return { ok: true, value: data };
    const ajv = await this.instance();
    return { ok: false, errors: ajv.errorsText(validate.errors, { dataVar, separator: "; " }) };
  }

  private async instance(): Promise<AjvInstance> {
    if (!this.ajv) {
      this.ajv = await loadAjv();
    }
    return this.ajv;
  }
}

/** Create and load a registry from the default schemas directory. */
export async function createRegistry(schemaDir?: string): Promise<SchemaRegistry> {
  const registry = new SchemaRegistry(schemaDir ?? DEFAULT_SCHEMA_DIR);
  await registry.load();
  return registry;
}
