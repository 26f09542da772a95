// ─── Song Metadata Reader ───────────────────────────────────────────────────
//
// Finds the metadata files among the resolved paths, validates them, and
// groups their arrangement entries into songs. Asset references are urns or
// bank file names; both are turned into logical paths here.
// ─────────────────────────────────────────────────────────────────────────────

import { extract, extractText } from "../archive/blocks.js";
import { normalizePath } from "../archive/hash.js";
import type { ByteSource, PathIndex } from "../archive/types.js";
import { describeError } from "../errors.js";
import { bankAudioIds } from "./bank.js";
import { parseSongMetadata, type Attributes } from "./schema.js";
import { tuningName } from "./tuning.js";
import { INSTRUMENTS, type ArrangementRef, type Instrument, type SongManifest } from "./types.js";

const METADATA_DIR = "manifests/";
const METADATA_EXT = ".json";
const SONG_URN_PREFIX = "urn:application:musicgamesong:";
const AUDIO_DIRS = ["audio/windows/", "audio/mac/"];

export type LogFn = (message: string) => void;

/** Metadata files are JSON files anywhere under manifests/. */
export function isSongMetadataPath(path: string): boolean {
  const p = normalizePath(path);
  return p.startsWith(METADATA_DIR) && p.endsWith(METADATA_EXT);
}

/** `urn:application:musicgamesong:foo_lead` → `songs/bin/generic/foo_lead.sng`. */
export function songAssetPath(urn: string): string {
  if (!urn.startsWith(SONG_URN_PREFIX) || urn.length === SONG_URN_PREFIX.length) {
    throw new Error(`unsupported song asset urn "${urn}"`);
  }
  return `songs/bin/generic/${urn.slice(SONG_URN_PREFIX.length)}.sng`;
}

function isInstrument(name: string): name is Instrument {
  return INSTRUMENTS.some((i) => i === name);
}

/**
 * Follow a bank name to the first audio stream it lists.
 * Returns null when the bank or its audio is not in the archive.
 */
export function resolveAudioPath(paths: PathIndex, source: ByteSource, bankName: string): string | null {
  for (const dir of AUDIO_DIRS) {
    const bank = paths.pathToEntry.get(normalizePath(dir + bankName));
    if (!bank) continue;
    const ids = bankAudioIds(extract(paths.index, bank, source));
    for (const id of ids) {
      const audioPath = `${dir}${id}.wem`;
      if (paths.pathToEntry.has(normalizePath(audioPath))) return audioPath;
    }
  }
  return null;
}

function songTitle(a: Attributes): string {
  return a.SongName || a.SongNameSort;
}

function songArtist(a: Attributes): string {
  return a.ArtistName || a.ArtistNameSort;
}

function tuningOffsets(a: Attributes): number[] {
  const t = a.Tuning;
  return [t.string0, t.string1, t.string2, t.string3, t.string4, t.string5];
}

/**
 * Decode every metadata file into songs.
 *
 * A file that fails to decode is logged and skipped; an arrangement whose
 * data path cannot be resolved is dropped from its song. A bank that cannot
 * be read is logged and leaves the arrangement without audio.
 */
export function readSongManifests(paths: PathIndex, source: ByteSource, log: LogFn = console.error): SongManifest[] {
  const songs = new Map<string, SongManifest>();

  for (const path of paths.paths) {
    if (!isSongMetadataPath(path)) continue;
    const entry = paths.pathToEntry.get(normalizePath(path));
    if (!entry) continue;

    let entries: Array<[string, Attributes]>;
    try {
      const file = parseSongMetadata(extractText(paths.index, entry, source));
      entries = Object.entries(file.Entries).map(([id, e]): [string, Attributes] => [id, e.Attributes]);
    } catch (err) {
      log(`  SKIP ${path}: ${describeError(err)}`);
      continue;
    }

    for (const [id, attrs] of entries) {
      const instrument = attrs.ArrangementName;
      if (!isInstrument(instrument)) {
        log(`  SKIP ${path}#${id}: "${instrument}" is not an instrument arrangement`);
        continue;
      }
      if (!attrs.SongAsset) {
        log(`  SKIP ${path}#${id}: no SongAsset`);
        continue;
      }

      let arrangementEntryPath: string;
      let audioEntryPath: string | null = null;
      try {
        arrangementEntryPath = songAssetPath(attrs.SongAsset);
        if (!paths.pathToEntry.has(normalizePath(arrangementEntryPath))) {
          throw new Error(`arrangement ${arrangementEntryPath} is not in the archive`);
        }
      } catch (err) {
        log(`  SKIP ${path}#${id}: ${describeError(err)}`);
        continue;
      }
      if (attrs.SongBank) {
        try {
          audioEntryPath = resolveAudioPath(paths, source, attrs.SongBank);
        } catch (err) {
          log(`  NO AUDIO ${path}#${id}: ${describeError(err)}`);
        }
      }

      const title = songTitle(attrs);
      const artist = songArtist(attrs);
      const key = `${artist} - ${title}`.toLowerCase();
      let song = songs.get(key);
      if (!song) {
        const tuning = tuningOffsets(attrs);
        song = {
          key,
          title,
          artist,
          album: attrs.AlbumName,
          year: attrs.SongYear ?? null,
          lengthSeconds: attrs.SongLength,
          averageTempo: attrs.SongAverageTempo,
          tuning,
          tuningName: tuningName(tuning),
          capoFret: attrs.CapoFret,
          sourcePath: path,
          arrangements: [],
        };
        songs.set(key, song);
      }

      const ref: ArrangementRef = {
        id: attrs.PersistentID ?? id,
        instrument,
        difficultyTierCount: attrs.MaxPhraseDifficulty + 1,
        audioEntryPath,
        arrangementEntryPath,
        tuning: tuningOffsets(attrs),
      };
      song.arrangements.push(ref);
    }
  }

  return [...songs.values()];
}
