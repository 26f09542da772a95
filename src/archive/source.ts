// ─── Byte Sources ───────────────────────────────────────────────────────────
//
// Two ways to feed the decoder: bytes already in memory, or a file read at
// offset through a descriptor so a large archive is never loaded whole.
// ─────────────────────────────────────────────────────────────────────────────

import { openSync, readSync, fstatSync, closeSync } from "node:fs";
import { ArchiveError } from "../errors.js";
import type { ByteSource } from "./types.js";

function checkRange(size: number, offset: number, length: number): void {
  if (offset < 0 || length < 0 || offset + length > size) {
    throw new ArchiveError(
      "TruncatedArchive",
      `read of ${length} bytes at ${offset} exceeds source size ${size}`,
      { offset }
    );
  }
}

/** Wrap an in-memory buffer. Reads return views, not copies. */
export function bufferSource(bytes: Uint8Array): ByteSource {
  return {
    size: bytes.byteLength,
    read(offset, length) {
      checkRange(bytes.byteLength, offset, length);
      return bytes.subarray(offset, offset + length);
    },
  };
}

/** A file-backed source. Call `close()` when done. */
export interface FileByteSource extends ByteSource {
  readonly path: string;
  close(): void;
}

/**
 * Open a file for positional reads.
 */
export function fileSource(path: string): FileByteSource {
  const fd = openSync(path, "r");
  const size = fstatSync(fd).size;
  let closed = false;

  return {
    path,
    size,
    read(offset, length) {
      if (closed) throw new Error(`Byte source already closed: ${path}`);
      checkRange(size, offset, length);
      const out = new Uint8Array(length);
      let done = 0;
      while (done < length) {
        const n = readSync(fd, out, done, length - done, offset + done);
        if (n === 0) {
          throw new ArchiveError("TruncatedArchive", `unexpected end of ${path}`, { offset: offset + done });
        }
        done += n;
      }
      return out;
    },
    close() {
      if (closed) return;
      closed = true;
      closeSync(fd);
    },
  };
}
