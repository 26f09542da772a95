// ─── Archive Types ──────────────────────────────────────────────────────────
//
// Parsed container structures. Everything here is frozen after parsing and
// shared read-only; entries reference the block table by index range.
// ─────────────────────────────────────────────────────────────────────────────

import type { SongManifest } from "../songs/types.js";

/** Read-at-offset access to the raw archive bytes. */
export interface ByteSource {
  /** Total size in bytes. */
  readonly size: number;
  /** Read exactly `length` bytes starting at `offset`. */
  read(offset: number, length: number): Uint8Array;
}

/** Archive-wide flags from the header. */
export interface ArchiveFlags {
  ignoreCase: boolean;
  absolutePaths: boolean;
  encryptedToc: boolean;
}

/** One table-of-contents record. */
export interface ArchiveEntry {
  /** Position in the table of contents (0 = manifest). */
  index: number;
  /** MD5 of the normalized logical path, lower-case hex. */
  nameHash: string;
  /** Size after decompression. */
  uncompressedSize: number;
  /** Index of the entry's first block in the shared block table. */
  firstBlockIndex: number;
  /** ceil(uncompressedSize / blockSize). */
  blockCount: number;
  /** Byte offset of the first block in the archive. */
  offset: number;
}

export interface ArchiveVersion {
  major: number;
  minor: number;
}

export interface ArchiveIndex {
  version: ArchiveVersion;
  /** Declared compression method, e.g. "zlib". */
  compression: string;
  blockSize: number;
  flags: ArchiveFlags;
  entries: readonly ArchiveEntry[];
  /**
   * Recorded length of every block in the archive. 0 stands for a full stored
   * block of `blockSize` bytes.
   */
  blockLengths: readonly number[];
}

/** Logical paths matched to entries through the manifest. */
export interface PathIndex {
  index: ArchiveIndex;
  /** Manifest lines in file order, as written. */
  paths: readonly string[];
  /** Normalized path → entry. */
  pathToEntry: ReadonlyMap<string, ArchiveEntry>;
  /** Name hash → path as written in the manifest. */
  hashToPath: ReadonlyMap<string, string>;
  /** Entries (other than the manifest) that no manifest path hashes to. */
  orphans: readonly ArchiveEntry[];
}

/** A fully resolved archive: paths plus decoded song metadata. */
export interface ResolvedArchive extends PathIndex {
  songs: readonly SongManifest[];
}
