import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { describe, expect, it } from "vitest";
import { RenderError, StructuralError } from "../src/core/errors.js";
import { buildBindings } from "../src/render/bindings.js";
import { DEFAULT_PROBES, resolveProbes } from "../src/render/probes.js";
import { renderSecretManifest } from "../src/render/secret.js";
import { findPlaceholders, parseManifest, renderFromTemplate, renderTemplate } from "../src/render/template.js";
import { requiredSecrets } from "../src/topology/validator.js";
import { cmsSecrets, cmsTopology, tmpDir } from "./helpers.js";

const bindingOpts = { namespace: "cms", app: "cms", secretName: "cms-secrets" };

describe("renderTemplate", () => {
  it("substitutes every placeholder, with or without inner spaces", () => {
    const out = renderTemplate("a: {{ x }}\nb: {{y}} and {{ x }}\n", { x: 1, y: "two" });
    expect(out).toBe("a: 1\nb: two and 1\n");
  });

  it("leaves text without placeholders untouched", () => {
    const text = "command: echo ${HOME} { not: a placeholder }\n";
    expect(renderTemplate(text, {})).toBe(text);
  });

  it("names every unbound placeholder once", () => {
    let caught: unknown;
    try {
      renderTemplate("{{ a }} {{ b }} {{ a }} {{ c }}", { b: 1 });
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(RenderError);
    if (caught instanceof RenderError) {
      expect(caught.message).toBe("Unbound placeholder(s): a, c");
      expect(caught.missing).toEqual(["a", "c"]);
      expect(caught.code).toBe("RENDER");
    }
  });

  it("rejects a malformed placeholder", () => {
    expect(() => renderTemplate("a: 1\nb: {{ bad key }}\n", {})).toThrow("Malformed placeholder at line 2");
  });

  it("lists placeholders in first-use order", () => {
    expect(findPlaceholders("{{ b }} {{a}} {{ b }}")).toEqual(["b", "a"]);
  });
});

describe("parseManifest", () => {
  it("rejects multi-document output", () => {
    expect(() => parseManifest("kind: A\n---\nkind: B\n", "x.yaml")).toThrow("Template x.yaml must render exactly one document (got 2)");
  });

  it("rejects documents without identity", () => {
    const err = (() => {
      try {
        return parseManifest("apiVersion: v1\nkind: Service\n", "svc.yaml");
      } catch (e) {
        return e;
      }
    })();
    expect(err).toBeInstanceOf(StructuralError);
    if (err instanceof StructuralError) expect(err.diagnostics[0].code).toBe("TEMPLATE_SHAPE_INVALID");
  });
});

describe("bindings", () => {
  it("binds globals and per-service values", () => {
    const b = buildBindings(cmsTopology(), bindingOpts);
    expect(b.namespace).toBe("cms");
    expect(b.release).toBe("cms");
    expect(b["secret.name"]).toBe("cms-secrets");
    expect(b["app.replicas"]).toBe(4);
    expect(b["db.replicas"]).toBe(1);
    expect(b["db.cpu.request"]).toBe("250m");
    expect(b["app.memory.limit"]).toBe("512Mi");
    expect(b["db.storage.size"]).toBe("5Gi");
    expect(b["db.storage.claim"]).toBe("db-data");
    expect(Object.isFrozen(b)).toBe(true);
  });

  it("maps access modes to cluster terms", () => {
    const b = buildBindings(cmsTopology(), bindingOpts);
    expect(b["db.storage.accessMode"]).toBe("ReadWriteOnce");
    expect(b["app.storage.accessMode"]).toBe("ReadWriteMany");
  });

  it("binds tier liveness and readiness defaults", () => {
    const b = buildBindings(cmsTopology(), bindingOpts);
    expect([
      b["db.liveness.initialDelaySeconds"],
      b["db.liveness.periodSeconds"],
      b["db.liveness.timeoutSeconds"],
      b["db.liveness.failureThreshold"],
    ]).toEqual([30, 10, 5, 3]);
    expect([
      b["app.liveness.initialDelaySeconds"],
      b["app.liveness.periodSeconds"],
      b["app.liveness.timeoutSeconds"],
      b["app.liveness.failureThreshold"],
    ]).toEqual([40, 15, 5, 3]);
    expect(b["app.readiness.periodSeconds"]).toBe(5);
  });

  it("applies per-service liveness and readiness overrides field by field", () => {
    const topo = cmsTopology();
    topo.services[0].probes = { liveness: { periodSeconds: 20 } };
    const b = buildBindings(topo, bindingOpts);
    expect(b["db.liveness.periodSeconds"]).toBe(20);
    expect(b["db.liveness.initialDelaySeconds"]).toBe(30);
    expect(resolveProbes("database").readiness).toEqual(DEFAULT_PROBES.database.readiness);
  });

  it("binds a backup schedule only when declared", () => {
    expect(buildBindings(cmsTopology(), bindingOpts)).not.toHaveProperty(["db.backup.schedule"]);
    const topo = cmsTopology();
    topo.services[0].backup = { schedule: "0 3 * * *" };
    expect(buildBindings(topo, bindingOpts)["db.backup.schedule"]).toBe("0 3 * * *");
  });
});

describe("renderFromTemplate", () => {
  it("renders a skeleton file into a manifest", () => {
    const dir = tmpDir();
    const file = path.join(dir, "svc.yaml");
    fs.writeFileSync(file, "apiVersion: v1\nkind: Service\nmetadata:\n  name: {{ app.name }}\nspec:\n  ports:\n    - port: {{ app.port }}\n");
    const m = renderFromTemplate(file, buildBindings(cmsTopology(), bindingOpts), "app");

    expect(m).toMatchObject({ kind: "Service", name: "app", fileName: "", service: "app", source: "svc.yaml" });
    expect(m.document.spec).toEqual({ ports: [{ port: 80 }] });
  });
});

describe("renderSecretManifest", () => {
  it("encodes every secret into one Secret with sorted keys", () => {
    const m = renderSecretManifest(cmsSecrets(), {
      name: "cms-secrets",
      namespace: "cms",
      app: "cms",
      required: requiredSecrets(cmsTopology()),
    });

    expect(m.kind).toBe("Secret");
    expect(m.name).toBe("cms-secrets");
    expect(m.document).toEqual({
      apiVersion: "v1",
      kind: "Secret",
      metadata: { name: "cms-secrets", namespace: "cms", labels: { "app.kubernetes.io/part-of": "cms" } },
      type: "Opaque",
      data: {
        "db-name": "Y21zLWRi",
        "db-password": "dGVzdC1zZWNyZXQ=",
        "db-root-password": "dGVzdC1yb290LXNlY3JldA==",
        "db-user": "Y21zLXVzZXI=",
      },
    });
    expect(Object.keys(YAML.parse(m.content).data)).toEqual(["db-name", "db-password", "db-root-password", "db-user"]);
    expect(m.content).not.toContain("test-secret");
  });

  it("names every required secret missing from the bundle", () => {
    const { "db-root-password": _root, "db-user": _user, ...rest } = cmsSecrets();
    let caught: unknown;
    try {
      renderSecretManifest(rest, { name: "cms-secrets", namespace: "cms", required: requiredSecrets(cmsTopology()) });
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(RenderError);
    if (caught instanceof RenderError) {
      expect(caught.message).toBe("Missing secret(s): db-root-password, db-user");
      expect(caught.missing).toEqual(["db-root-password", "db-user"]);
    }
  });

  it("refuses an empty bundle", () => {
    expect(() => renderSecretManifest({}, { name: "s", namespace: "cms" })).toThrow("Secret bundle is empty");
  });
});
