import { describe, expect, it } from "vitest";
import path from "node:path";
import { validateProject } from "../src/commands/validate.js";
import { CONFIG_DIR, TEMPLATES_DIR, cmsTopology, tmpDir, writeTopology } from "./helpers.js";

const SECRETS = {
  DB_ROOT_PASSWORD: "test-root-secret",
  DB_PASSWORD: "test-secret",
  DB_USER: "cms-user",
  DB_NAME: "cms-db",
};

function project(envVars: Record<string, string> = {}) {
  const cwd = tmpDir("releasectl-validate-");
  writeTopology(cwd, cmsTopology());
  return { cwd, envVars: { RELEASECTL_RENDER__TEMPLATES_DIR: TEMPLATES_DIR, ...SECRETS, ...envVars } };
}

describe("releasectl validate", () => {
  it("accepts the CMS project", async () => {
    const { cwd, envVars } = project();
    const res = await validateProject({ configDir: CONFIG_DIR, cwd, envVars });
    expect(res.ok).toBe(true);
    if (res.ok) expect(res.topology.services.map((s) => s.name)).toEqual(["db", "app"]);
  });

  it("accepts the ci overlay", async () => {
    const { cwd, envVars } = project();
    const res = await validateProject({ configDir: CONFIG_DIR, env: "ci", cwd, envVars });
    expect(res.ok).toBe(true);
  });

  it("checks secrets only when asked", async () => {
    const { cwd, envVars } = project({ DB_PASSWORD: "" });
    expect((await validateProject({ configDir: CONFIG_DIR, cwd, envVars })).ok).toBe(true);

    const res = await validateProject({ configDir: CONFIG_DIR, cwd, envVars, checkSecrets: true });
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.errors.map((e) => [e.code, e.message])).toEqual([
        ["SECRET_UNRESOLVED", "Service db references unresolved secret: db-password"],
        ["SECRET_UNRESOLVED", "Service app references unresolved secret: db-password"],
      ]);
    }
  });

  it("reports an invalid config", async () => {
    const { cwd, envVars } = project({ RELEASECTL_HEALTH__MAX_ATTEMPTS: "-1" });
    const res = await validateProject({ configDir: CONFIG_DIR, cwd, envVars });
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.errors.map((e) => e.code)).toEqual(["CONFIG_INVALID"]);
  });

  it("reports a missing topology", async () => {
    const { cwd, envVars } = project();
    const res = await validateProject({ configDir: CONFIG_DIR, cwd, envVars, topologyPath: "other.yaml" });
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.errors[0].code).toBe("TOPOLOGY_MISSING");
      expect(res.errors[0].path).toBe(path.join(cwd, "other.yaml"));
    }
  });

  it("attaches the topology path to structural errors", async () => {
    const { cwd, envVars } = project();
    const topo = cmsTopology();
    topo.services[0].replicas = 0;
    const file = writeTopology(cwd, topo, "broken.yaml");

    const res = await validateProject({ configDir: CONFIG_DIR, cwd, envVars, topologyPath: "broken.yaml" });
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.errors.every((e) => e.code === "TOPOLOGY_INVALID" && e.path === file)).toBe(true);
    }
  });

  it("reports a missing templates directory", async () => {
    const { cwd, envVars } = project({ RELEASECTL_RENDER__TEMPLATES_DIR: "no-templates" });
    const res = await validateProject({ configDir: CONFIG_DIR, cwd, envVars });
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.errors.map((e) => e.code)).toEqual(["TEMPLATES_DIR_MISSING"]);
      expect(res.errors[0].path).toBe(path.join(cwd, "no-templates"));
    }
  });
});
