// ─── Song Loader ────────────────────────────────────────────────────────────
//
// Opens an archive file end to end (index, manifest, song metadata) and
// loads the pieces playback needs: a decoded arrangement and its audio.
// ─────────────────────────────────────────────────────────────────────────────

import { basename } from "node:path";
import { openArchive } from "../archive/index-reader.js";
import { extractByPath, resolveManifest, type ResolveOptions } from "../archive/manifest.js";
import { fileSource, type FileByteSource } from "../archive/source.js";
import type { ByteSource, ResolvedArchive } from "../archive/types.js";
import { decodeArrangement } from "../arrangement/decoder.js";
import type { Arrangement } from "../arrangement/types.js";
import type { ArrangementRef, SongManifest } from "./types.js";

export interface SongArchive {
  /** File name, for display. */
  name: string;
  source: ByteSource;
  resolved: ResolvedArchive;
  close(): void;
}

/**
 * Open an archive file and resolve everything in it. The file stays open
 * until `close()`; on failure it is closed before the error propagates.
 */
export function openSongArchive(path: string, options: ResolveOptions = {}): SongArchive {
  const source: FileByteSource = fileSource(path);
  try {
    const resolved = resolveManifest(openArchive(source), source, options);
    return { name: basename(path), source, resolved, close: () => source.close() };
  } catch (err) {
    source.close();
    throw err;
  }
}

/** Extract and decode the arrangement file a ref points to. */
export function loadArrangement(archive: Pick<SongArchive, "source" | "resolved">, ref: ArrangementRef): Arrangement {
  return decodeArrangement(extractByPath(archive.resolved, ref.arrangementEntryPath, archive.source));
}

/** Encoded audio stream for a ref, or null when the archive has none for it. */
export function loadAudio(archive: Pick<SongArchive, "source" | "resolved">, ref: ArrangementRef): Uint8Array | null {
  if (ref.audioEntryPath === null) return null;
  return extractByPath(archive.resolved, ref.audioEntryPath, archive.source);
}

/**
 * Find a song by 1-based number, by key, or by case-insensitive substring of
 * "artist - title". Default: the first.
 */
export function findSong(resolved: ResolvedArchive, query = ""): SongManifest | undefined {
  const q = query.trim().toLowerCase();
  if (q === "") return resolved.songs[0];
  if (/^\d+$/.test(q)) return resolved.songs[Number(q) - 1];
  return (
    resolved.songs.find((s) => s.key.toLowerCase() === q) ??
    resolved.songs.find((s) => `${s.artist} - ${s.title}`.toLowerCase().includes(q))
  );
}

/**
 * Pick an arrangement by 1-based number, id, or instrument name
 * (case-insensitive). Default: the first.
 */
export function findArrangement(song: SongManifest, query = ""): ArrangementRef | undefined {
  const q = query.trim().toLowerCase();
  if (q === "") return song.arrangements[0];
  if (/^\d+$/.test(q)) return song.arrangements[Number(q) - 1];
  return song.arrangements.find((a) => a.id.toLowerCase() === q || a.instrument.toLowerCase() === q);
}
