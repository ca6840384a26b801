import fs from "node:fs";
import path from "node:path";
import { list } from "tar";
import { beforeAll, describe, expect, it } from "vitest";
import { StructuralError } from "../src/core/errors.js";
import { computeSha256 } from "../src/packager/checksum.js";
import { ARCHIVE_MTIME, packageManifests } from "../src/packager/packager.js";
import { renderManifestSet } from "../src/render/renderer.js";
import { validateAll } from "../src/render/validate.js";
import type { ValidatedManifestSet } from "../src/types/manifest.js";
import { TEMPLATES_DIR, cmsSecrets, cmsTopology, tmpDir } from "./helpers.js";

const packOpts = { rootDirName: "k8s-manifests", archiveName: "k8s-manifests.tar.gz" };

async function readEntries(file: string): Promise<Array<{ path: string; mtime?: string }>> {
  const entries: Array<{ path: string; mtime?: string }> = [];
  await list({
    file,
    onReadEntry: (entry) => {
      entries.push({ path: entry.path, mtime: entry.mtime?.toISOString() });
    },
  });
  return entries;
}

describe("packageManifests", () => {
  let set: ValidatedManifestSet;

  beforeAll(async () => {
    const res = await validateAll(
      renderManifestSet(cmsTopology(), cmsSecrets(), {
        templatesDir: TEMPLATES_DIR,
        namespace: "cms",
        app: "cms",
        secretName: "cms-secrets",
      })
    );
    if (!res.ok) throw new Error(`fixture set invalid: ${JSON.stringify(res.errors)}`);
    set = res.set;
  });

  it("writes every manifest under the root directory and archives them in set order", async () => {
    const outDir = tmpDir();
    const artifact = await packageManifests(set, { outDir, ...packOpts });

    const expected = set.manifests.map((m) => `k8s-manifests/${m.fileName}`);
    expect(artifact.path).toBe(path.join(outDir, "k8s-manifests.tar.gz"));
    expect(artifact.rootDir).toBe("k8s-manifests");
    expect(artifact.members).toEqual(expected);
    expect(artifact.sha256).toBe(computeSha256(artifact.path));
    expect(artifact.bytes).toBe(fs.statSync(artifact.path).size);

    for (const m of set.manifests) {
      expect(fs.readFileSync(path.join(outDir, "k8s-manifests", m.fileName), "utf8")).toBe(m.content);
    }

    const entries = await readEntries(artifact.path);
    expect(entries.map((e) => e.path)).toEqual(["k8s-manifests/", ...expected]);
    expect(new Set(entries.map((e) => e.mtime))).toEqual(new Set([ARCHIVE_MTIME.toISOString()]));
  });

  it("keeps the written manifests and the archive owner-only", async () => {
    const outDir = tmpDir();
    const artifact = await packageManifests(set, { outDir, ...packOpts });
    const mode = (p: string) => fs.statSync(p).mode & 0o777;

    expect(mode(path.join(outDir, "k8s-manifests"))).toBe(0o700);
    expect(mode(path.join(outDir, "k8s-manifests", "00-secret-cms-secrets.yaml"))).toBe(0o600);
    expect(mode(artifact.path)).toBe(0o600);
  });

  it("produces byte-identical archives for the same set", async () => {
    const first = await packageManifests(set, { outDir: tmpDir(), ...packOpts });
    const second = await packageManifests(set, { outDir: tmpDir(), ...packOpts });
    expect(second.sha256).toBe(first.sha256);
    expect(second.bytes).toBe(first.bytes);
  });

  it("clears files left in the root directory by an earlier packaging", async () => {
    const outDir = tmpDir();
    const first = await packageManifests(set, { outDir, ...packOpts });
    fs.writeFileSync(path.join(outDir, "k8s-manifests", "99-stale.yaml"), "kind: Stale\n");

    const second = await packageManifests(set, { outDir, ...packOpts });
    expect(fs.existsSync(path.join(outDir, "k8s-manifests", "99-stale.yaml"))).toBe(false);
    expect(second.sha256).toBe(first.sha256);
  });

  it("refuses an empty set", async () => {
    const empty: ValidatedManifestSet = { manifests: [], validated: true };
    await expect(packageManifests(empty, { outDir: tmpDir(), ...packOpts })).rejects.toThrow(StructuralError);
  });
});
