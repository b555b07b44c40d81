import { createHash } from "crypto";
import { basename } from "path";

export function hashForAudit(s: string) {
  return createHash("sha256").update(s).digest("hex").slice(0, 16);
}

/** `<file name>_<8 hex of sha256(path)>`: stable per program path. */
export function projectKey(programPath: string) {
  const hash = createHash("sha256").update(programPath).digest("hex").slice(0, 8);
  return `${basename(programPath)}_${hash}`;
}
