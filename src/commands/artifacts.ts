import fs from "node:fs";
import path from "node:path";

export type ArtifactFile = { path: string; size: number };

export type ArtifactsResult =
  | { ok: true; files: ArtifactFile[] }
  | { ok: false; error: string };

/**
 * List what a run left behind: its state and health report under the runs
 * directory, and the packaged manifests and archive under the output directory.
 */
export function listArtifacts(opts: { runsDir: string; outDir: string; runId: string }): ArtifactsResult {
  const roots = [
    { label: "run", dir: path.join(opts.runsDir, opts.runId) },
    { label: "out", dir: path.join(opts.outDir, opts.runId) },
  ].filter((r) => fs.existsSync(r.dir));

  if (roots.length === 0) {
    return { ok: false, error: `No artifacts found for: ${opts.runId}` };
  }

  const files: ArtifactFile[] = [];
  for (const root of roots) collectFiles(root.label, root.dir, root.dir, files);

  return { ok: true, files };
}

function collectFiles(label: string, baseDir: string, currentDir: string, out: ArtifactFile[]): void {
  const entries = fs.readdirSync(currentDir, { withFileTypes: true }).sort((a, b) => a.name.localeCompare(b.name));
  for (const entry of entries) {
    const fullPath = path.join(currentDir, entry.name);
    if (entry.isDirectory()) {
      collectFiles(label, baseDir, fullPath, out);
    } else if (entry.isFile()) {
      const stat = fs.statSync(fullPath);
      out.push({ path: path.posix.join(label, path.relative(baseDir, fullPath).split(path.sep).join("/")), size: stat.size });
    }
  }
}
