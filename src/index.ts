// ─── psarc-player ───────────────────────────────────────────────────────────
//
// Song archive reader and arrangement playback engine.
//
// Usage:
//   import { openSongArchive, loadArrangement, PlaybackController,
//            createClockAudioBackend } from "psarc-player";
// ─────────────────────────────────────────────────────────────────────────────

// Errors
export { ArchiveError, ArrangementError, PlaybackError, describeError } from "./errors.js";
export type { ArchiveErrorKind, ArrangementErrorKind, PlaybackErrorKind } from "./errors.js";

// Archive container
export { bufferSource, fileSource, type FileByteSource } from "./archive/source.js";
export { normalizePath, hashPath, isNameHash } from "./archive/hash.js";
export { openArchive, ARCHIVE_MAGIC, HEADER_SIZE, TOC_RECORD_SIZE } from "./archive/index-reader.js";
export { extract, extractText, compressEntry, type CompressedEntry } from "./archive/blocks.js";
export {
  resolveManifest,
  resolvePaths,
  parseManifestLines,
  findEntry,
  extractEntry,
  extractByPath,
  extractByHash,
  entryName,
  pathsWithExtension,
  type ResolveOptions,
} from "./archive/manifest.js";
export type {
  ByteSource,
  ArchiveFlags,
  ArchiveEntry,
  ArchiveVersion,
  ArchiveIndex,
  PathIndex,
  ResolvedArchive,
} from "./archive/types.js";

// Song metadata
export { INSTRUMENTS, type Instrument, type ArrangementRef, type SongManifest } from "./songs/types.js";
export { readSongManifests, resolveAudioPath, songAssetPath, type LogFn } from "./songs/metadata.js";
export { bankAudioIds, bankChunks } from "./songs/bank.js";
export { tuningName, midiToNoteName, openStringNotes, GUITAR_STANDARD, BASS_STANDARD } from "./songs/tuning.js";
export {
  openSongArchive,
  loadArrangement,
  loadAudio,
  findSong,
  findArrangement,
  type SongArchive,
} from "./songs/loader.js";

// Arrangements
export { decodeArrangement } from "./arrangement/decoder.js";
export { TECHNIQUES, hasTechnique, techniqueNames, techniqueMask, type Technique } from "./arrangement/techniques.js";
export {
  notesBetween,
  regionAt,
  linkedNote,
  highestDifficulty,
  durationOf,
  summarizeLevel,
  type LevelSummary,
} from "./arrangement/query.js";
export type {
  Arrangement,
  Beat,
  Phrase,
  Section,
  ChordTemplate,
  NoteEvent,
  DifficultyLevel,
} from "./arrangement/types.js";

// Playback
export { Synchronizer, type SyncState, type AdvanceResult, type SyncSnapshot } from "./playback/synchronizer.js";
export {
  PlaybackController,
  createPlaybackController,
  type AnyPlaybackEvent,
  type PlaybackEventType,
  type PlaybackListener,
  type PlaybackControllerOptions,
  type RunOptions,
} from "./playback/controls.js";
export {
  createClockAudioBackend,
  createMockAudioBackend,
  type AudioBackend,
  type MockAudioBackend,
  type ClockBackendOptions,
} from "./audio/backends.js";
export { renderTab, renderTabAt, type TabViewOptions } from "./render/tab-view.js";

// Configuration
export { PlayerConfigSchema, validateConfig, resolveDifficulty, type PlayerConfig } from "./config/schema.js";
export { loadPlayerConfig, savePlayerConfig, parsePlayerConfig, configPath } from "./config/loader.js";
