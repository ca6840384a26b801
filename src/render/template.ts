import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { RenderError, StructuralError } from "../core/errors.js";
import { diag } from "../core/diagnostics.js";
import { isRecord } from "../core/guards.js";
import type { Manifest, ManifestDocument } from "../types/manifest.js";
import type { Bindings } from "./bindings.js";

const PLACEHOLDER = /\{\{\s*([A-Za-z0-9_.-]+)\s*\}\}/g;

/** Placeholder names in first-use order. */
export function findPlaceholders(template: string): string[] {
  const names = new Set<string>();
  for (const m of template.matchAll(PLACEHOLDER)) names.add(m[1]);
  return [...names];
}

/**
 * Substitute `{{ name }}` placeholders. Pure; text outside placeholders is
 * returned untouched. Throws RenderError listing every unbound placeholder,
 * and for any `{{` left that is not a well-formed placeholder.
 */
export function renderTemplate(template: string, bindings: Bindings): string {
  const missing = findPlaceholders(template).filter((name) => !Object.prototype.hasOwnProperty.call(bindings, name));
  if (missing.length > 0) {
    throw new RenderError(`Unbound placeholder(s): ${missing.join(", ")}`, missing);
  }

  const rendered = template.replace(PLACEHOLDER, (_match, name: string) => String(bindings[name]));

  const leftover = template.replace(PLACEHOLDER, "").indexOf("{{");
  if (leftover !== -1) {
    const line = template.replace(PLACEHOLDER, "").slice(0, leftover).split("\n").length;
    throw new RenderError(`Malformed placeholder at line ${line}`);
  }

  return rendered;
}

export function isManifestDocument(value: unknown): value is ManifestDocument {
  return (
    isRecord(value) &&
    typeof value.apiVersion === "string" &&
    typeof value.kind === "string" &&
    isRecord(value.metadata) &&
    typeof value.metadata.name === "string"
  );
}

/** Parse rendered text into a single manifest document or fail structurally. */
export function parseManifest(content: string, source: string): ManifestDocument {
  const docs = YAML.parseAllDocuments(content);
  if (docs.length !== 1) {
    throw new StructuralError(`Template ${source} must render exactly one document (got ${docs.length})`);
  }
  const [doc] = docs;
  if (doc.errors.length > 0) {
    throw new StructuralError(
      `Template ${source} does not render valid YAML`,
      doc.errors.map((e) => diag("error", "TEMPLATE_YAML_INVALID", `${source}: ${e.message}`, { path: source }))
    );
  }
  const value: unknown = doc.toJS();
  if (!isManifestDocument(value)) {
    throw new StructuralError(`Template ${source} lacks apiVersion, kind or metadata.name`, [
      diag("error", "TEMPLATE_SHAPE_INVALID", `${source}: not a manifest document`, { path: source }),
    ]);
  }
  return value;
}

/** Render one skeleton file into a Manifest (file name assigned later, when the set is ordered). */
export function renderFromTemplate(templatePath: string, bindings: Bindings, service?: string): Manifest {
  const source = path.basename(templatePath);
  const content = renderTemplate(fs.readFileSync(templatePath, "utf8"), bindings);
  const document = parseManifest(content, source);
  return {
    kind: document.kind,
    name: document.metadata.name,
    fileName: "",
    service,
    source,
    content,
    document,
  };
}
