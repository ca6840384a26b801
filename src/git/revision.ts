import fs from "node:fs";
import { simpleGit, type SimpleGit } from "simple-git";

export type RevisionReader = (dir: string) => Promise<string | null>;

/**
 * HEAD of the repository holding the topology, recorded with each run so an
 * artifact can be traced to the description it came from. Null outside a
 * repository or before the first commit.
 */
export async function readRevision(dir: string, git?: SimpleGit): Promise<string | null> {
  if (!git && !fs.existsSync(dir)) return null;
  git ??= simpleGit(dir);
  if (!(await git.checkIsRepo())) return null;
  try {
    return (await git.revparse(["HEAD"])).trim();
  } catch {
    // Repository without commits: HEAD does not resolve yet.
    return null;
  }
}
