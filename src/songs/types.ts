// ─── Song Types ─────────────────────────────────────────────────────────────
//
// Per-song metadata recovered from an archive. One archive can carry several
// songs; each song lists its arrangements (one per instrument part) with the
// logical paths of the arrangement data and the paired audio.
// ─────────────────────────────────────────────────────────────────────────────

/** Instrument parts the metadata distinguishes. */
export const INSTRUMENTS = ["Lead", "Rhythm", "Combo", "Bass"] as const;
export type Instrument = (typeof INSTRUMENTS)[number];

/** One playable instrument part of a song. */
export interface ArrangementRef {
  /** Entry key in the metadata file (usually a persistent id). */
  id: string;
  instrument: Instrument;
  /** Number of pre-authored difficulty levels (max phrase difficulty + 1). */
  difficultyTierCount: number;
  /** Logical path of the audio stream, or null when no bank resolves to one. */
  audioEntryPath: string | null;
  /** Logical path of the binary arrangement file. */
  arrangementEntryPath: string;
  /** This part's own tuning offsets; a bass part differs from the guitar parts. */
  tuning: number[];
}

export interface SongManifest {
  /** Stable grouping key: lower-cased "artist - title". */
  key: string;
  title: string;
  artist: string;
  album: string;
  year: number | null;
  lengthSeconds: number;
  averageTempo: number;
  /** Semitone offset per string from standard tuning, low string first (first arrangement's). */
  tuning: number[];
  /** e.g. "E Standard", "Drop D", or "Custom". */
  tuningName: string;
  capoFret: number;
  /** Logical path of the metadata file this song was read from. */
  sourcePath: string;
  arrangements: ArrangementRef[];
}
