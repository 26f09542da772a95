// ─── Arrangement Types ──────────────────────────────────────────────────────
//
// The decoded event model for one instrument part. All times are seconds
// from song start, on the same clock as the audio stream. Everything is
// frozen once decoded; the synchronizer only reads it.
// ─────────────────────────────────────────────────────────────────────────────

/** A metronome tick. Times are strictly increasing. */
export interface Beat {
  time: number;
  /** Measure number as authored (1-based; 0 or negative before the first bar). */
  measure: number;
  /** Beat within the measure (0-based). */
  beat: number;
  /** First beat of a measure. */
  isDownbeat: boolean;
}

/** A named practice region ("riff", "chorus 2"). */
export interface Phrase {
  startTime: number;
  endTime: number;
  name: string;
  /** Highest difficulty level that adds notes inside this phrase. */
  maxDifficulty: number;
}

/** A structural region ("verse", "solo"). */
export interface Section {
  startTime: number;
  endTime: number;
  name: string;
  /** Occurrence number of this section name (1 = first verse). */
  number: number;
}

export interface ChordTemplate {
  name: string;
  /** Fret per string, low string first; -1 = not played. */
  frets: readonly number[];
  /** Finger per string; -1 = none. */
  fingers: readonly number[];
}

/** One struck note. Chords are several notes sharing a start time and chord id. */
export interface NoteEvent {
  /** Position in its level's note list. */
  index: number;
  startTime: number;
  /** Seconds held; 0 for a plain pick. */
  sustain: number;
  /** 0 = lowest string. */
  string: number;
  /** 0 = open string. */
  fret: number;
  /** Technique bitset, see techniques.ts. */
  techniques: number;
  /** Largest bend in semitone steps, 0 if none. */
  maxBend: number;
  /** Target fret of a slide, or null. */
  slideTo: number | null;
  /** Index into the chord templates, or null for a single note. */
  chordId: number | null;
  /** Index of the next note in a legato chain (same level, same string, later), or null. */
  linkedNext: number | null;
}

/** A complete, independently authored note list for one skill level. */
export interface DifficultyLevel {
  /** 0 = easiest. Equals this level's position in `Arrangement.levels`. */
  levelIndex: number;
  /** Non-decreasing in start time. */
  notes: readonly NoteEvent[];
}

export interface Arrangement {
  version: number;
  stringCount: number;
  beats: readonly Beat[];
  phrases: readonly Phrase[];
  sections: readonly Section[];
  chordTemplates: readonly ChordTemplate[];
  /** Indexed by difficulty. */
  levels: readonly DifficultyLevel[];
}
