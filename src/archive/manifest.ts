// ─── Manifest Resolver ──────────────────────────────────────────────────────
//
// Entry 0 is the archive's own file list. Hashing each line recovers which
// entry it names; the result is two maps built once (path → entry and
// hash → path) plus the entries nobody claims.
// ─────────────────────────────────────────────────────────────────────────────

import { ArchiveError } from "../errors.js";
import { readSongManifests, type LogFn } from "../songs/metadata.js";
import { extract, extractText } from "./blocks.js";
import { hashPath, isNameHash, normalizePath } from "./hash.js";
import type { ArchiveEntry, ArchiveIndex, ByteSource, PathIndex, ResolvedArchive } from "./types.js";

export interface ResolveOptions {
  /** Where orphan and skipped-song reports go. Default: console.error. */
  log?: LogFn;
}

/** Split manifest text into paths, dropping blank lines and CR. */
export function parseManifestLines(text: string): string[] {
  return text
    .split("\n")
    .map((line) => line.replace(/\r$/, "").trim())
    .filter((line) => line.length > 0);
}

/**
 * Match every manifest path to the entry stored under its hash.
 *
 * A path matching no entry, or two paths landing on the same entry, is a
 * `CorruptEntry`. Entries no path matches are returned as orphans.
 */
export function resolvePaths(index: ArchiveIndex, source: ByteSource, log: LogFn = console.error): PathIndex {
  const manifest = index.entries[0];
  if (!manifest) {
    throw new ArchiveError("CorruptEntry", "archive has no manifest entry");
  }

  const paths = parseManifestLines(extractText(index, manifest, source));

  const byHash = new Map<string, ArchiveEntry>();
  for (const entry of index.entries) {
    if (entry.index === 0) continue;
    byHash.set(entry.nameHash, entry);
  }

  const pathToEntry = new Map<string, ArchiveEntry>();
  const hashToPath = new Map<string, string>();

  for (const path of paths) {
    const hash = hashPath(path);
    const entry = byHash.get(hash);
    if (!entry) {
      throw new ArchiveError("CorruptEntry", `manifest path "${path}" matches no entry`, {
        entryHash: manifest.nameHash,
      });
    }
    const claimed = hashToPath.get(hash);
    if (claimed !== undefined) {
      throw new ArchiveError("CorruptEntry", `manifest paths "${claimed}" and "${path}" name the same entry`, {
        entryHash: hash,
      });
    }
    hashToPath.set(hash, path);
    pathToEntry.set(normalizePath(path), entry);
  }

  const orphans = index.entries.filter((e) => e.index !== 0 && !hashToPath.has(e.nameHash));
  for (const orphan of orphans) {
    log(`  ORPHAN entry ${orphan.index} (${orphan.nameHash}, ${orphan.uncompressedSize} bytes)`);
  }

  return {
    index,
    paths: Object.freeze(paths),
    pathToEntry,
    hashToPath,
    orphans: Object.freeze(orphans),
  };
}

/**
 * Resolve paths and decode the song metadata they point to.
 */
export function resolveManifest(
  index: ArchiveIndex,
  source: ByteSource,
  options: ResolveOptions = {}
): ResolvedArchive {
  const log = options.log ?? console.error;
  const paths = resolvePaths(index, source, log);
  const songs = readSongManifests(paths, source, log);
  return { ...paths, songs: Object.freeze(songs) };
}

/**
 * Look up an entry by logical path or by 32-digit hex hash.
 * Hash lookups also find orphans.
 */
export function findEntry(paths: PathIndex, pathOrHash: string): ArchiveEntry | undefined {
  const byPath = paths.pathToEntry.get(normalizePath(pathOrHash));
  if (byPath) return byPath;
  if (!isNameHash(pathOrHash)) return undefined;
  const hash = pathOrHash.toLowerCase();
  return paths.index.entries.find((e) => e.nameHash === hash);
}

/** Extract the entry a manifest path names; `EntryNotFound` otherwise. */
export function extractByPath(paths: PathIndex, path: string, source: ByteSource): Uint8Array {
  const entry = paths.pathToEntry.get(normalizePath(path));
  if (!entry) {
    throw new ArchiveError("EntryNotFound", `no entry for path "${path}"`);
  }
  return extract(paths.index, entry, source);
}

/** Extract by 32-digit hex name hash, orphans included; `EntryNotFound` otherwise. */
export function extractByHash(paths: PathIndex, hashHex: string, source: ByteSource): Uint8Array {
  const hash = hashHex.toLowerCase();
  const entry = isNameHash(hash) ? paths.index.entries.find((e) => e.nameHash === hash) : undefined;
  if (!entry) {
    throw new ArchiveError("EntryNotFound", `no entry with hash "${hashHex}"`);
  }
  return extract(paths.index, entry, source);
}

/**
 * Extract by logical path or hash, for user input that may be either.
 * A manifest path wins over reading the text as a hash.
 */
export function extractEntry(paths: PathIndex, pathOrHash: string, source: ByteSource): Uint8Array {
  const entry = findEntry(paths, pathOrHash);
  if (!entry) {
    throw new ArchiveError("EntryNotFound", `no entry for "${pathOrHash}"`);
  }
  return extract(paths.index, entry, source);
}

/** Display name of an entry: its manifest path, or its hash for orphans. */
export function entryName(paths: PathIndex, entry: ArchiveEntry): string {
  if (entry.index === 0) return "(manifest)";
  return paths.hashToPath.get(entry.nameHash) ?? entry.nameHash;
}

/** Manifest paths ending in the given extension (case-insensitive). */
export function pathsWithExtension(paths: PathIndex, ext: string): string[] {
  const suffix = ext.toLowerCase();
  return paths.paths.filter((p) => p.toLowerCase().endsWith(suffix));
}
