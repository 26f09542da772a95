// ─── Arrangement Queries ────────────────────────────────────────────────────
//
// Binary searches over the time-ordered collections, plus the summaries the
// CLI and MCP tools print.
// ─────────────────────────────────────────────────────────────────────────────

import type { Arrangement, DifficultyLevel, NoteEvent, Phrase, Section } from "./types.js";

/**
 * Index of the first item whose time is strictly greater than `time`.
 * Returns items.length if none is.
 */
export function firstIndexAfter<T>(items: readonly T[], time: number, timeOf: (item: T) => number): number {
  let lo = 0;
  let hi = items.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (timeOf(items[mid]) <= time) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}

/**
 * Index of the first item whose time is at or after `time`.
 */
export function firstIndexAtOrAfter<T>(items: readonly T[], time: number, timeOf: (item: T) => number): number {
  let lo = 0;
  let hi = items.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (timeOf(items[mid]) < time) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}

/** Notes of a level with start time in [start, end). */
export function notesBetween(level: DifficultyLevel, start: number, end: number): NoteEvent[] {
  const from = firstIndexAtOrAfter(level.notes, start, (n) => n.startTime);
  const to = firstIndexAtOrAfter(level.notes, end, (n) => n.startTime);
  return level.notes.slice(from, Math.max(from, to));
}

/** The region containing `time`, or null between/outside regions. */
export function regionAt<T extends Phrase | Section>(regions: readonly T[], time: number): T | null {
  const i = firstIndexAfter(regions, time, (r) => r.startTime) - 1;
  if (i < 0) return null;
  const region = regions[i];
  return time < region.endTime ? region : null;
}

/** Follow a legato chain from a note to the note it links to. */
export function linkedNote(level: DifficultyLevel, note: NoteEvent): NoteEvent | null {
  return note.linkedNext === null ? null : (level.notes[note.linkedNext] ?? null);
}

export function highestDifficulty(arrangement: Arrangement): number {
  return arrangement.levels.length - 1;
}

/** Latest time anything in the arrangement reaches. */
export function durationOf(arrangement: Arrangement): number {
  let end = 0;
  const lastBeat = arrangement.beats[arrangement.beats.length - 1];
  if (lastBeat) end = Math.max(end, lastBeat.time);
  for (const region of [...arrangement.phrases, ...arrangement.sections]) {
    end = Math.max(end, region.endTime);
  }
  for (const level of arrangement.levels) {
    for (const note of level.notes) {
      end = Math.max(end, note.startTime + note.sustain);
    }
  }
  return end;
}

export interface LevelSummary {
  levelIndex: number;
  noteCount: number;
  chordNoteCount: number;
  sustainedCount: number;
  linkedCount: number;
  firstNoteTime: number | null;
  lastNoteTime: number | null;
}

export function summarizeLevel(level: DifficultyLevel): LevelSummary {
  const notes = level.notes;
  return {
    levelIndex: level.levelIndex,
    noteCount: notes.length,
    chordNoteCount: notes.filter((n) => n.chordId !== null).length,
    sustainedCount: notes.filter((n) => n.sustain > 0).length,
    linkedCount: notes.filter((n) => n.linkedNext !== null).length,
    firstNoteTime: notes.length > 0 ? notes[0].startTime : null,
    lastNoteTime: notes.length > 0 ? notes[notes.length - 1].startTime : null,
  };
}
