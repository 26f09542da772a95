// ─── Content Addressing ─────────────────────────────────────────────────────
//
// Entries are stored under the MD5 of their logical path. The path is
// normalized first: forward slashes, lower case, no leading slash.
// ─────────────────────────────────────────────────────────────────────────────

import { createHash } from "node:crypto";

export function normalizePath(path: string): string {
  return path.trim().replace(/\\/g, "/").replace(/^\/+/, "").toLowerCase();
}

/** Lower-case hex MD5 of the normalized path. */
export function hashPath(path: string): string {
  return createHash("md5").update(normalizePath(path), "utf8").digest("hex");
}

/** True for a 32-character hex digest. */
export function isNameHash(value: string): boolean {
  return /^[0-9a-f]{32}$/i.test(value);
}
