import fs from "node:fs";
import path from "node:path";
import { create } from "tar";
import { StructuralError } from "../core/errors.js";
import { diag } from "../core/diagnostics.js";
import type { Artifact, ValidatedManifestSet } from "../types/manifest.js";
import { computeSha256 } from "./checksum.js";

export type PackageOptions = {
  outDir: string;
  rootDirName: string;
  archiveName: string;
};

/** Every member gets this mtime so identical sets give identical archives. */
export const ARCHIVE_MTIME = new Date("2000-01-01T00:00:00Z");

/**
 * Write the set under `<outDir>/<rootDirName>/` and compress that directory
 * into `<outDir>/<archiveName>`. Members follow set order.
 */
export async function packageManifests(set: ValidatedManifestSet, opts: PackageOptions): Promise<Artifact> {
  if (set.manifests.length === 0) {
    throw new StructuralError("Cannot package an empty manifest set", [
      diag("error", "MANIFEST_SET_EMPTY", "Cannot package an empty manifest set"),
    ]);
  }
  if (set.validated !== true) {
    throw new StructuralError("Manifest set has not passed validation", [
      diag("error", "MANIFEST_SET_UNVALIDATED", "Manifest set has not passed validation"),
    ]);
  }

  const outDir = path.resolve(opts.outDir);
  const rootDir = path.join(outDir, opts.rootDirName);
  const archivePath = path.join(outDir, opts.archiveName);

  // A leftover root from an earlier run must not leak extra files in.
  fs.rmSync(rootDir, { recursive: true, force: true });
  fs.rmSync(archivePath, { force: true });
  fs.mkdirSync(rootDir, { recursive: true, mode: 0o700 });

  const members: string[] = [];
  for (const m of set.manifests) {
    fs.writeFileSync(path.join(rootDir, m.fileName), m.content, { encoding: "utf8", mode: 0o600 });
    fs.chmodSync(path.join(rootDir, m.fileName), 0o600);
    members.push(`${opts.rootDirName}/${m.fileName}`);
  }
  fs.chmodSync(rootDir, 0o700);

  await create(
    {
      file: archivePath,
      cwd: outDir,
      gzip: true,
      portable: true,
      noDirRecurse: true,
      mtime: ARCHIVE_MTIME,
    },
    [`${opts.rootDirName}/`, ...members]
  );
  // The Secret manifest carries base64 values; the archive and its root stay owner-only.
  fs.chmodSync(archivePath, 0o600);

  return {
    path: archivePath,
    rootDir: opts.rootDirName,
    archiveName: opts.archiveName,
    members,
    sha256: computeSha256(archivePath),
    bytes: fs.statSync(archivePath).size,
  };
}
