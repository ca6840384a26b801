import { createHash } from "node:crypto";
import fs from "node:fs";

/** SHA256 hex digest of a file. */
export function computeSha256(filePath: string): string {
  return createHash("sha256").update(fs.readFileSync(filePath)).digest("hex");
}
