// ─── Tab View Renderer ───────────────────────────────────────────────────────
//
// Pure string generator: renders the synchronizer's view of "now" as a
// window of plain-text tablature scrolling right to left.
//
// Layout:
//   header  = time, transport state, level, current phrase and section
//   one row per string, highest string on top, labelled with its open note
//   column 0 = now; each column covers lookaheadSeconds / columns
//   cells   = fret number, optionally followed by a technique mark
// ─────────────────────────────────────────────────────────────────────────────

import type { Arrangement, NoteEvent } from "../arrangement/types.js";
import { Synchronizer, type SyncSnapshot } from "../playback/synchronizer.js";
import { midiToNoteName, openStringNotes } from "../songs/tuning.js";
import { TECHNIQUES } from "../arrangement/techniques.js";

export interface TabViewOptions {
  stringCount: number;
  /** Per-string semitone offsets from standard. Default: standard. */
  tuning?: readonly number[];
  /** Width of the note area in characters. Default: 64 */
  columns?: number;
  /** Seconds covered by the note area. Default: 4 */
  lookaheadSeconds?: number;
  /** Append b / h p x marks after fret numbers. Default: true */
  showTechniques?: boolean;
}

/** First matching mark wins. */
const TECHNIQUE_MARKS: Array<[number, string]> = [
  [TECHNIQUES.bend, "b"],
  [TECHNIQUES.slide | TECHNIQUES.unpitchedSlide, "/"],
  [TECHNIQUES.hammerOn, "h"],
  [TECHNIQUES.pullOff, "p"],
  [TECHNIQUES.mute | TECHNIQUES.palmMute, "x"],
];

function techniqueMark(mask: number): string {
  for (const [bits, mark] of TECHNIQUE_MARKS) {
    if ((mask & bits) !== 0) return mark;
  }
  return "";
}

function header(snapshot: SyncSnapshot): string {
  const parts = [`${snapshot.time.toFixed(2)}s`, snapshot.state, `level ${snapshot.difficulty ?? "-"}`];
  if (snapshot.currentPhrase) parts.push(`phrase ${snapshot.currentPhrase.name}`);
  if (snapshot.currentSection) {
    parts.push(`section ${snapshot.currentSection.name} ${snapshot.currentSection.number}`);
  }
  return parts.join("  ");
}

/**
 * Render the tab window for a snapshot and the notes coming up after it.
 * Sounding notes sit in column 0.
 */
export function renderTab(
  snapshot: SyncSnapshot,
  upcoming: readonly NoteEvent[],
  options: TabViewOptions
): string {
  const columns = options.columns ?? 64;
  const lookahead = options.lookaheadSeconds ?? 4;
  const showTechniques = options.showTechniques ?? true;
  const open = openStringNotes(options.tuning ?? [], options.stringCount);
  const labels = open.map(midiToNoteName);
  const labelWidth = Math.max(...labels.map((l) => l.length));

  const rows: string[][] = open.map(() => new Array<string>(columns).fill("-"));

  const place = (note: NoteEvent, col: number): void => {
    const row = rows[note.string];
    if (!row) return;
    const text = `${note.fret}${showTechniques ? techniqueMark(note.techniques) : ""}`;
    for (let i = 0; i < text.length && col + i < columns; i++) {
      row[col + i] = text[i];
    }
  };

  for (const note of snapshot.activeNotes) place(note, 0);
  for (const note of upcoming) {
    const offset = note.startTime - snapshot.time;
    const col = Math.min(columns - 1, Math.max(0, Math.floor((offset / lookahead) * columns)));
    place(note, col);
  }

  const lines = [header(snapshot)];
  for (let s = open.length - 1; s >= 0; s--) {
    lines.push(`${labels[s].padEnd(labelWidth)} |${rows[s].join("")}|`);
  }
  return lines.join("\n");
}

/**
 * Render the tab window at `time` without running playback: a fresh
 * synchronizer is started, seeked, and advanced to `time`.
 */
export function renderTabAt(
  arrangement: Arrangement,
  difficulty: number,
  time: number,
  options: Omit<TabViewOptions, "stringCount">
): string {
  const sync = new Synchronizer();
  sync.start(arrangement, difficulty);
  sync.seek(time);
  sync.advance(sync.time);
  const lookahead = options.lookaheadSeconds ?? 4;
  return renderTab(sync.snapshot(), sync.upcoming(lookahead), { ...options, stringCount: arrangement.stringCount });
}
