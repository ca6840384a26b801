import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { StructuralError } from "../core/errors.js";
import { diag } from "../core/diagnostics.js";
import { isRecord } from "../core/guards.js";

export type CatalogEntry = {
  file: string;
  /** Service whose dependencies order this document. */
  service?: string;
  /** Binding that must exist for the entry to render. */
  when?: string;
};

export const CATALOG_FILE = "catalog.yaml";

function toEntry(raw: unknown, index: number, catalogPath: string): CatalogEntry {
  const fail = (message: string) =>
    new StructuralError(`Template catalog entry ${index}: ${message}`, [
      diag("error", "CATALOG_INVALID", `Template catalog entry ${index}: ${message}`, { path: catalogPath }),
    ]);

  if (!isRecord(raw)) throw fail("must be a mapping");
  const { file, service, when } = raw;
  if (typeof file !== "string" || file === "" || file.includes("/") || file.includes("..")) {
    throw fail("file must be a plain file name");
  }
  if (service !== undefined && typeof service !== "string") throw fail("service must be a string");
  if (when !== undefined && typeof when !== "string") throw fail("when must be a string");
  return { file, service, when };
}

/**
 * Entries of the template store in preference order. A store without a
 * catalog renders every *.yaml/*.yml file, by name.
 */
export function loadCatalog(templatesDir: string): CatalogEntry[] {
  if (!fs.existsSync(templatesDir) || !fs.statSync(templatesDir).isDirectory()) {
    throw new StructuralError(`Templates directory not found: ${templatesDir}`, [
      diag("error", "TEMPLATES_DIR_MISSING", `Templates directory not found: ${templatesDir}`, { path: templatesDir }),
    ]);
  }

  const catalogPath = path.join(templatesDir, CATALOG_FILE);
  if (!fs.existsSync(catalogPath)) {
    return fs
      .readdirSync(templatesDir)
      .filter((f) => f !== CATALOG_FILE && (f.endsWith(".yaml") || f.endsWith(".yml")))
      .sort()
      .map((file) => ({ file }));
  }

  const parsed: unknown = YAML.parse(fs.readFileSync(catalogPath, "utf8"));
  const list = isRecord(parsed) ? parsed.templates : undefined;
  if (!Array.isArray(list)) {
    throw new StructuralError(`Template catalog must have a templates list: ${catalogPath}`, [
      diag("error", "CATALOG_INVALID", `Template catalog must have a templates list`, { path: catalogPath }),
    ]);
  }

  const entries = list.map((raw: unknown, i) => toEntry(raw, i, catalogPath));
  for (const entry of entries) {
    if (!fs.existsSync(path.join(templatesDir, entry.file))) {
      throw new StructuralError(`Template listed in catalog not found: ${entry.file}`, [
        diag("error", "TEMPLATE_MISSING", `Template listed in catalog not found: ${entry.file}`, { path: templatesDir }),
      ]);
    }
  }
  return entries;
}
