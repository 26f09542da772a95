// ─── Archive Index Reader ───────────────────────────────────────────────────
//
// Parses the fixed header, the table of contents and the trailing block
// length table. Nothing is decompressed here.
//
// Layout (big-endian):
//   0  "PSAR"           magic
//   4  u16 major        must be 1
//   6  u16 minor        must be >= 4
//   8  char[4]          compression method ("zlib")
//   12 u32              TOC length, from start of file
//   16 u32              TOC record size (30)
//   20 u32              entry count
//   24 u32              block size
//   28 u32              flags (1 ignore case, 2 absolute paths, 4 encrypted TOC)
//
// TOC record: md5[16], u32 first block, u40 uncompressed size, u40 offset.
// Then one u32 per block up to the TOC length.
// ─────────────────────────────────────────────────────────────────────────────

import { ArchiveError } from "../errors.js";
import type { ArchiveEntry, ArchiveFlags, ArchiveIndex, ByteSource } from "./types.js";

export const ARCHIVE_MAGIC = 0x50534152;
export const HEADER_SIZE = 32;
export const TOC_RECORD_SIZE = 30;
export const SUPPORTED_COMPRESSION = ["zlib"] as const;

const FLAG_IGNORE_CASE = 1;
const FLAG_ABSOLUTE = 2;
const FLAG_ENCRYPTED = 4;

function ascii(bytes: Uint8Array, start: number, length: number): string {
  let s = "";
  for (let i = start; i < start + length; i++) s += String.fromCharCode(bytes[i]);
  return s;
}

/** Read a 5-byte big-endian integer. */
function readUint40(view: DataView, offset: number): number {
  return view.getUint8(offset) * 0x1_0000_0000 + view.getUint32(offset + 1, false);
}

function hex(bytes: Uint8Array): string {
  let s = "";
  for (const b of bytes) s += b.toString(16).padStart(2, "0");
  return s;
}

function isPowerOfTwo(n: number): boolean {
  return n > 0 && (n & (n - 1)) === 0;
}

function parseFlags(raw: number): ArchiveFlags {
  return {
    ignoreCase: (raw & FLAG_IGNORE_CASE) !== 0,
    absolutePaths: (raw & FLAG_ABSOLUTE) !== 0,
    encryptedToc: (raw & FLAG_ENCRYPTED) !== 0,
  };
}

/**
 * Parse the header and table of contents of an archive.
 *
 * Throws `MalformedHeader` for anything this reader does not understand and
 * `TruncatedArchive` when a declared length points past the end of the source.
 */
export function openArchive(source: ByteSource): ArchiveIndex {
  if (source.size < HEADER_SIZE) {
    throw new ArchiveError("TruncatedArchive", `archive is ${source.size} bytes, header needs ${HEADER_SIZE}`, { offset: 0 });
  }

  const header = source.read(0, HEADER_SIZE);
  const view = new DataView(header.buffer, header.byteOffset, header.byteLength);

  if (view.getUint32(0, false) !== ARCHIVE_MAGIC) {
    throw new ArchiveError("MalformedHeader", `bad magic "${ascii(header, 0, 4)}"`, { offset: 0 });
  }

  const major = view.getUint16(4, false);
  const minor = view.getUint16(6, false);
  if (major !== 1 || minor < 4) {
    throw new ArchiveError("MalformedHeader", `unsupported version ${major}.${minor}`, { offset: 4 });
  }

  const compression = ascii(header, 8, 4);
  if (!(SUPPORTED_COMPRESSION as readonly string[]).includes(compression)) {
    throw new ArchiveError("MalformedHeader", `unknown compression method "${compression}"`, { offset: 8 });
  }

  const tocLength = view.getUint32(12, false);
  const recordSize = view.getUint32(16, false);
  const entryCount = view.getUint32(20, false);
  const blockSize = view.getUint32(24, false);
  const flags = parseFlags(view.getUint32(28, false));

  if (recordSize !== TOC_RECORD_SIZE) {
    throw new ArchiveError("MalformedHeader", `TOC record size ${recordSize}, expected ${TOC_RECORD_SIZE}`, { offset: 16 });
  }
  if (!isPowerOfTwo(blockSize)) {
    throw new ArchiveError("MalformedHeader", `block size ${blockSize} is not a power of two`, { offset: 24 });
  }
  if (flags.encryptedToc) {
    throw new ArchiveError("MalformedHeader", "encrypted table of contents is not supported", { offset: 28 });
  }
  if (tocLength > source.size) {
    throw new ArchiveError("TruncatedArchive", `TOC length ${tocLength} exceeds archive size ${source.size}`, { offset: 12 });
  }

  const recordsEnd = HEADER_SIZE + entryCount * TOC_RECORD_SIZE;
  if (recordsEnd > tocLength) {
    throw new ArchiveError("MalformedHeader", `${entryCount} TOC records do not fit in TOC length ${tocLength}`, { offset: 20 });
  }
  if ((tocLength - recordsEnd) % 4 !== 0) {
    throw new ArchiveError("MalformedHeader", "block length table is not a whole number of u32 values", { offset: recordsEnd });
  }

  const toc = source.read(0, tocLength);
  const tocView = new DataView(toc.buffer, toc.byteOffset, toc.byteLength);

  const blockLengths: number[] = [];
  for (let off = recordsEnd; off < tocLength; off += 4) {
    blockLengths.push(tocView.getUint32(off, false));
  }

  const entries: ArchiveEntry[] = [];
  for (let i = 0; i < entryCount; i++) {
    const off = HEADER_SIZE + i * TOC_RECORD_SIZE;
    const nameHash = hex(toc.subarray(off, off + 16));
    const firstBlockIndex = tocView.getUint32(off + 16, false);
    const uncompressedSize = readUint40(tocView, off + 20);
    const offset = readUint40(tocView, off + 25);
    const blockCount = Math.ceil(uncompressedSize / blockSize);

    if (firstBlockIndex + blockCount > blockLengths.length) {
      throw new ArchiveError(
        "TruncatedArchive",
        `entry ${i} needs blocks ${firstBlockIndex}..${firstBlockIndex + blockCount - 1}, table has ${blockLengths.length}`,
        { entryHash: nameHash, offset: off }
      );
    }

    let span = 0;
    for (let b = 0; b < blockCount; b++) {
      const recorded = blockLengths[firstBlockIndex + b];
      span += recorded === 0 ? blockSize : recorded;
    }
    if (offset + span > source.size) {
      throw new ArchiveError(
        "TruncatedArchive",
        `entry ${i} data ends at ${offset + span}, archive is ${source.size} bytes`,
        { entryHash: nameHash, offset }
      );
    }

    entries.push(Object.freeze({ index: i, nameHash, uncompressedSize, firstBlockIndex, blockCount, offset }));
  }

  return Object.freeze({
    version: Object.freeze({ major, minor }),
    compression,
    blockSize,
    flags: Object.freeze(flags),
    entries: Object.freeze(entries),
    blockLengths: Object.freeze(blockLengths),
  });
}
