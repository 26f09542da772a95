// ─── Playback Synchronizer ──────────────────────────────────────────────────
//
// Keeps a cursor into one arrangement in step with the audio clock. The
// caller reads the audio position and hands it to advance(); the result says
// which notes started or stopped sounding, which beats went by, and where in
// the song structure playback now is.
//
// Forward advances walk cursors past the events crossed since the last call.
// Anything else (seek, a clock that jumped back, a difficulty change)
// rebuilds the cursors by binary search.
// ─────────────────────────────────────────────────────────────────────────────

import { PlaybackError } from "../errors.js";
import { firstIndexAfter, firstIndexAtOrAfter, regionAt } from "../arrangement/query.js";
import type { Arrangement, Beat, DifficultyLevel, NoteEvent, Phrase, Section } from "../arrangement/types.js";

export type SyncState = "stopped" | "playing" | "paused" | "seeking";

export interface AdvanceResult {
  /** Audio time this result describes. */
  time: number;
  previousTime: number;
  /** Notes struck since the previous advance. */
  newlyActive: NoteEvent[];
  /** Notes whose sustain ran out (start + sustain ≤ time). */
  expired: NoteEvent[];
  beatsCrossed: Beat[];
  phrasesEntered: Phrase[];
  sectionsEntered: Section[];
  currentPhrase: Phrase | null;
  currentSection: Section | null;
  /** Everything sounding at `time`, by note index. */
  activeNotes: NoteEvent[];
  /** The clock went backwards without a seek. */
  regressed: boolean;
}

/** Read-only view published after every state change. */
export interface SyncSnapshot {
  state: SyncState;
  time: number;
  difficulty: number | null;
  activeNotes: readonly NoteEvent[];
  currentPhrase: Phrase | null;
  currentSection: Section | null;
  nextBeatIndex: number;
}

/** Per-level lookup tables, built once per level on first use. */
interface LevelIndex {
  level: DifficultyLevel;
  /** Note indices on each string, in time order. */
  byString: number[][];
  /** Next note index on the same string, or -1. */
  nextOnString: Int32Array;
  /** Longest sustain; bounds how far back a rebuild has to look. */
  maxSustain: number;
}

function indexLevel(level: DifficultyLevel, stringCount: number): LevelIndex {
  const byString: number[][] = Array.from({ length: stringCount }, () => []);
  const nextOnString = new Int32Array(level.notes.length).fill(-1);
  const lastOnString = new Array<number>(stringCount).fill(-1);
  let maxSustain = 0;
  for (const note of level.notes) {
    byString[note.string].push(note.index);
    const prev = lastOnString[note.string];
    if (prev >= 0) nextOnString[prev] = note.index;
    lastOnString[note.string] = note.index;
    maxSustain = Math.max(maxSustain, note.sustain);
  }
  return { level, byString, nextOnString, maxSustain };
}

const endOf = (note: NoteEvent): number => note.startTime + note.sustain;
const byIndex = (a: NoteEvent, b: NoteEvent): number => a.index - b.index;

interface Cursor {
  arrangement: Arrangement;
  levels: Map<number, LevelIndex>;
  difficulty: number;
  time: number;
  nextNoteIndex: number;
  /** notes.length when the string has nothing left. */
  nextNoteIndexPerString: number[];
  nextBeatIndex: number;
  nextPhraseIndex: number;
  nextSectionIndex: number;
  active: Map<number, NoteEvent>;
  /** Sounding at a seek or difficulty-change target; reported on the next advance. */
  pending: NoteEvent[];
}

function emptyResult(time: number): AdvanceResult {
  return {
    time,
    previousTime: time,
    newlyActive: [],
    expired: [],
    beatsCrossed: [],
    phrasesEntered: [],
    sectionsEntered: [],
    currentPhrase: null,
    currentSection: null,
    activeNotes: [],
    regressed: false,
  };
}

export class Synchronizer {
  private _state: SyncState = "stopped";
  private cursor: Cursor | null = null;
  private published: SyncSnapshot = Object.freeze({
    state: "stopped",
    time: 0,
    difficulty: null,
    activeNotes: Object.freeze([]),
    currentPhrase: null,
    currentSection: null,
    nextBeatIndex: 0,
  });

  get state(): SyncState {
    return this._state;
  }

  get time(): number {
    return this.cursor?.time ?? 0;
  }

  get difficulty(): number | null {
    return this.cursor?.difficulty ?? null;
  }

  get arrangement(): Arrangement | null {
    return this.cursor?.arrangement ?? null;
  }

  /** Begin playback of `arrangement` at time 0. */
  start(arrangement: Arrangement, difficulty: number): void {
    checkDifficulty(arrangement, difficulty);
    this.cursor = {
      arrangement,
      levels: new Map(),
      difficulty,
      time: 0,
      nextNoteIndex: 0,
      nextNoteIndexPerString: [],
      nextBeatIndex: 0,
      nextPhraseIndex: 0,
      nextSectionIndex: 0,
      active: new Map(),
      pending: [],
    };
    this.positionNotes(this.cursor, 0);
    this._state = "playing";
    this.publish();
  }

  /**
   * Move the cursor to `audioTime`.
   *
   * Returns an empty result while stopped. A time earlier than the current
   * one is treated as a clock regression.
   */
  advance(audioTime: number): AdvanceResult {
    const c = this.cursor;
    if (!c || this._state === "stopped") return emptyResult(audioTime);
    if (!Number.isFinite(audioTime)) {
      throw new PlaybackError("InvalidState", `audio time must be finite, got ${audioTime}`);
    }

    const result = audioTime < c.time ? this.regress(c, audioTime) : this.walk(c, audioTime);
    this.publish();
    return result;
  }

  /**
   * Jump to `time` (clamped at 0). The next advance reports the notes
   * sounding at the target as newly active, and nothing from before it.
   *
   * Returns the notes that were active before the jump.
   */
  seek(time: number): NoteEvent[] {
    const c = this.requireCursor("seek");
    if (!Number.isFinite(time)) {
      throw new PlaybackError("InvalidState", `seek target must be finite, got ${time}`);
    }
    const target = Math.max(0, time);
    const resumeState = this._state;
    this._state = "seeking";

    const dropped = [...c.active.values()].sort(byIndex);
    c.time = target;
    const { beats, phrases, sections } = c.arrangement;
    c.nextBeatIndex = firstIndexAtOrAfter(beats, target, (b) => b.time);
    c.nextPhraseIndex = firstIndexAtOrAfter(phrases, target, (p) => p.startTime);
    c.nextSectionIndex = firstIndexAtOrAfter(sections, target, (s) => s.startTime);
    this.positionNotes(c, target);

    this._state = resumeState;
    this.publish();
    return dropped;
  }

  /**
   * Switch to another difficulty level at the current time. Levels are
   * separate note lists, so the active set starts over: the new level's
   * sounding notes arrive on the next advance.
   *
   * Returns the notes that were active on the old level.
   */
  setDifficulty(level: number): NoteEvent[] {
    const c = this.requireCursor("setDifficulty");
    checkDifficulty(c.arrangement, level);
    const dropped = [...c.active.values()].sort(byIndex);
    c.difficulty = level;
    this.positionNotes(c, c.time);
    this.publish();
    return dropped;
  }

  /** playing → paused. Returns false (and does nothing) from any other state. */
  pause(): boolean {
    if (this._state !== "playing") return false;
    this._state = "paused";
    this.publish();
    return true;
  }

  /** paused → playing. Returns false (and does nothing) from any other state. */
  resume(): boolean {
    if (this._state !== "paused") return false;
    this._state = "playing";
    this.publish();
    return true;
  }

  stop(): void {
    this.cursor = null;
    this._state = "stopped";
    this.publish();
  }

  snapshot(): SyncSnapshot {
    return this.published;
  }

  /** Notes of the active level starting in (time, time + windowSeconds]. */
  upcoming(windowSeconds: number): NoteEvent[] {
    const c = this.cursor;
    if (!c) return [];
    const notes = this.levelIndex(c).level.notes;
    const from = firstIndexAfter(notes, c.time, (n) => n.startTime);
    const to = firstIndexAfter(notes, c.time + Math.max(0, windowSeconds), (n) => n.startTime);
    return notes.slice(from, to);
  }

  /** Next unplayed note on `string`, or null. */
  nextNoteOnString(string: number): NoteEvent | null {
    const c = this.cursor;
    if (!c) return null;
    const i = c.nextNoteIndexPerString[string];
    return i === undefined ? null : (this.levelIndex(c).level.notes[i] ?? null);
  }

  // ─── Internal ─────────────────────────────────────────────────────────

  private requireCursor(operation: string): Cursor {
    if (!this.cursor) {
      throw new PlaybackError("InvalidState", `${operation} needs an arrangement; call start() first`);
    }
    return this.cursor;
  }

  private levelIndex(c: Cursor): LevelIndex {
    let index = c.levels.get(c.difficulty);
    if (!index) {
      index = indexLevel(c.arrangement.levels[c.difficulty], c.arrangement.stringCount);
      c.levels.set(c.difficulty, index);
    }
    return index;
  }

  /**
   * Place note cursors at `time` with nothing at or after it reported yet.
   * Notes started earlier and still sounding become pending.
   */
  private positionNotes(c: Cursor, time: number): void {
    const index = this.levelIndex(c);
    const notes = index.level.notes;
    c.nextNoteIndex = firstIndexAtOrAfter(notes, time, (n) => n.startTime);
    c.nextNoteIndexPerString = index.byString.map((list) => {
      const k = firstIndexAtOrAfter(list, time, (i) => notes[i].startTime);
      return k < list.length ? list[k] : notes.length;
    });
    c.active = new Map();
    c.pending = soundingBefore(index, c.nextNoteIndex, time);
  }

  /** Forward path: visit only what was crossed since the last call. */
  private walk(c: Cursor, time: number): AdvanceResult {
    const index = this.levelIndex(c);
    const notes = index.level.notes;
    const previousTime = c.time;
    const newlyActive: NoteEvent[] = [];
    const expired: NoteEvent[] = [];

    for (const note of c.active.values()) {
      if (endOf(note) <= time) {
        c.active.delete(note.index);
        expired.push(note);
      }
    }

    const crossed = c.pending;
    c.pending = [];
    while (c.nextNoteIndex < notes.length && notes[c.nextNoteIndex].startTime <= time) {
      const note = notes[c.nextNoteIndex];
      crossed.push(note);
      const next = index.nextOnString[note.index];
      c.nextNoteIndexPerString[note.string] = next >= 0 ? next : notes.length;
      c.nextNoteIndex++;
    }
    for (const note of crossed) {
      newlyActive.push(note);
      // Struck and finished between two advances: report both edges.
      if (endOf(note) <= time) {
        expired.push(note);
      } else {
        c.active.set(note.index, note);
      }
    }

    const { beats, phrases, sections } = c.arrangement;
    const beatsCrossed: Beat[] = [];
    while (c.nextBeatIndex < beats.length && beats[c.nextBeatIndex].time <= time) {
      beatsCrossed.push(beats[c.nextBeatIndex++]);
    }
    const phrasesEntered: Phrase[] = [];
    while (c.nextPhraseIndex < phrases.length && phrases[c.nextPhraseIndex].startTime <= time) {
      phrasesEntered.push(phrases[c.nextPhraseIndex++]);
    }
    const sectionsEntered: Section[] = [];
    while (c.nextSectionIndex < sections.length && sections[c.nextSectionIndex].startTime <= time) {
      sectionsEntered.push(sections[c.nextSectionIndex++]);
    }

    c.time = time;
    return {
      time,
      previousTime,
      newlyActive,
      expired: expired.sort(byIndex),
      beatsCrossed,
      phrasesEntered,
      sectionsEntered,
      currentPhrase: regionAt(phrases, time),
      currentSection: regionAt(sections, time),
      activeNotes: activeList(c),
      regressed: false,
    };
  }

  /**
   * The clock went backwards. Rebuild as if playback had advanced straight
   * to `time`, and report the difference in the active set.
   */
  private regress(c: Cursor, time: number): AdvanceResult {
    const index = this.levelIndex(c);
    const notes = index.level.notes;
    const previousTime = c.time;
    const { beats, phrases, sections } = c.arrangement;

    c.nextNoteIndex = firstIndexAfter(notes, time, (n) => n.startTime);
    c.nextNoteIndexPerString = index.byString.map((list) => {
      const k = firstIndexAfter(list, time, (i) => notes[i].startTime);
      return k < list.length ? list[k] : notes.length;
    });
    c.nextBeatIndex = firstIndexAfter(beats, time, (b) => b.time);
    c.nextPhraseIndex = firstIndexAfter(phrases, time, (p) => p.startTime);
    c.nextSectionIndex = firstIndexAfter(sections, time, (s) => s.startTime);
    c.pending = [];

    const sounding = soundingBefore(index, c.nextNoteIndex, time);
    const before = c.active;
    c.active = new Map(sounding.map((n) => [n.index, n]));
    const expired = [...before.values()].filter((n) => !c.active.has(n.index)).sort(byIndex);
    const newlyActive = sounding.filter((n) => !before.has(n.index));

    c.time = time;
    return {
      time,
      previousTime,
      newlyActive,
      expired,
      beatsCrossed: [],
      phrasesEntered: [],
      sectionsEntered: [],
      currentPhrase: regionAt(phrases, time),
      currentSection: regionAt(sections, time),
      activeNotes: activeList(c),
      regressed: true,
    };
  }

  private publish(): void {
    const c = this.cursor;
    this.published = Object.freeze({
      state: this._state,
      time: c?.time ?? 0,
      difficulty: c?.difficulty ?? null,
      activeNotes: Object.freeze(c ? activeList(c) : []),
      currentPhrase: c ? regionAt(c.arrangement.phrases, c.time) : null,
      currentSection: c ? regionAt(c.arrangement.sections, c.time) : null,
      nextBeatIndex: c?.nextBeatIndex ?? 0,
    });
  }
}

function checkDifficulty(arrangement: Arrangement, difficulty: number): void {
  if (!Number.isInteger(difficulty) || difficulty < 0 || difficulty >= arrangement.levels.length) {
    throw new PlaybackError(
      "NoSuchDifficulty",
      `difficulty ${difficulty} requested, arrangement has levels 0..${arrangement.levels.length - 1}`
    );
  }
}

/**
 * Notes before index `end` still sounding at `time`. Only looks back as far
 * as the level's longest sustain.
 */
function soundingBefore(index: LevelIndex, end: number, time: number): NoteEvent[] {
  const notes = index.level.notes;
  const from = firstIndexAtOrAfter(notes, time - index.maxSustain, (n) => n.startTime);
  const out: NoteEvent[] = [];
  for (let i = from; i < end; i++) {
    if (endOf(notes[i]) > time) out.push(notes[i]);
  }
  return out;
}

function activeList(c: Cursor): NoteEvent[] {
  return [...c.active.values()].sort(byIndex);
}
