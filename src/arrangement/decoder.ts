// ─── Arrangement Decoder ────────────────────────────────────────────────────
//
// Layout (little-endian):
//   "SNGA" u16 version u16 stringCount
//   then typed sections until end of input: tag[4] u32 bodyLength body
//
//   BEAT  u32 count, 12-byte records: f32 time, u16 measure, u16 beat, u32 mask
//   PHRS  u32 count, 44-byte records: f32 start, f32 end, u32 maxDifficulty, char[32] name
//   CHRD  u32 count, 44-byte records: char[32] name, i8 frets[6], i8 fingers[6]
//   SECT  u32 count, 44-byte records: f32 start, f32 end, u32 number, char[32] name
//   LEVL  u32 difficulty, u32 count, 25-byte records:
//           f32 time, f32 sustain, f32 maxBend, u32 techniques, i32 linkNext,
//           i16 chordId, u8 string, u8 fret, i8 slideTo
//
// Unknown tags are skipped by length. One forward pass; levels are decoded
// independently and never merged.
// ─────────────────────────────────────────────────────────────────────────────

import { ArrangementError } from "../errors.js";
import { BinaryReader } from "./reader.js";
import type {
  Arrangement,
  Beat,
  ChordTemplate,
  DifficultyLevel,
  NoteEvent,
  Phrase,
  Section,
} from "./types.js";

export const ARRANGEMENT_MAGIC = "SNGA";
export const ARRANGEMENT_VERSION = 1;
export const MIN_STRINGS = 4;
export const MAX_STRINGS = 8;
export const NAME_WIDTH = 32;
export const CHORD_STRINGS = 6;

export const RECORD_SIZE = {
  BEAT: 12,
  PHRS: 44,
  CHRD: 44,
  SECT: 44,
  NOTE: 25,
} as const;

const DOWNBEAT_MASK = 1;

/** Slack for float32 rounding when comparing a note's end to its link target. */
const LINK_TOLERANCE = 1e-4;

/** Times must be finite; a NaN would slip past every ordering check. */
function checkTime(what: string, value: number, at: number): void {
  if (!Number.isFinite(value)) {
    throw new ArrangementError("MalformedArrangement", `${what} is ${value}`, at);
  }
}

/** Read a count and check the body holds exactly that many records. */
function readCount(body: BinaryReader, recordSize: number, tag: string): number {
  const count = body.u32(`${tag} count`);
  if (count * recordSize !== body.remaining) {
    throw new ArrangementError(
      "MalformedArrangement",
      `${tag} declares ${count} records of ${recordSize} bytes but has ${body.remaining} bytes`,
      body.offset
    );
  }
  return count;
}

function decodeBeats(body: BinaryReader): Beat[] {
  const count = readCount(body, RECORD_SIZE.BEAT, "BEAT");
  const beats: Beat[] = [];
  for (let i = 0; i < count; i++) {
    const at = body.offset;
    const time = body.f32("beat time");
    const measure = body.u16("beat measure");
    const beat = body.u16("beat number");
    const mask = body.u32("beat mask");
    checkTime(`beat ${i} time`, time, at);
    const prev = beats[beats.length - 1];
    if (prev && !(time > prev.time)) {
      throw new ArrangementError(
        "UnorderedBeatData",
        `beat ${i} at ${time}s does not follow beat ${i - 1} at ${prev.time}s`,
        at
      );
    }
    beats.push(Object.freeze({ time, measure, beat, isDownbeat: (mask & DOWNBEAT_MASK) !== 0 }));
  }
  return beats;
}

/** Regions must be well-formed and must not overlap their predecessor. */
function checkRegion(
  kind: string,
  i: number,
  start: number,
  end: number,
  prev: { startTime: number; endTime: number } | undefined,
  at: number
): void {
  checkTime(`${kind} ${i} start`, start, at);
  checkTime(`${kind} ${i} end`, end, at);
  if (end < start) {
    throw new ArrangementError("UnorderedSectionData", `${kind} ${i} ends at ${end}s before it starts at ${start}s`, at);
  }
  if (prev && start < prev.endTime) {
    throw new ArrangementError(
      "UnorderedSectionData",
      `${kind} ${i} starts at ${start}s inside ${kind} ${i - 1} (${prev.startTime}s–${prev.endTime}s)`,
      at
    );
  }
}

function decodePhrases(body: BinaryReader): Phrase[] {
  const count = readCount(body, RECORD_SIZE.PHRS, "PHRS");
  const phrases: Phrase[] = [];
  for (let i = 0; i < count; i++) {
    const at = body.offset;
    const startTime = body.f32("phrase start");
    const endTime = body.f32("phrase end");
    const maxDifficulty = body.u32("phrase max difficulty");
    const name = body.fixedString(NAME_WIDTH, "phrase name");
    checkRegion("phrase", i, startTime, endTime, phrases[i - 1], at);
    phrases.push(Object.freeze({ startTime, endTime, name, maxDifficulty }));
  }
  return phrases;
}

function decodeSections(body: BinaryReader): Section[] {
  const count = readCount(body, RECORD_SIZE.SECT, "SECT");
  const sections: Section[] = [];
  for (let i = 0; i < count; i++) {
    const at = body.offset;
    const startTime = body.f32("section start");
    const endTime = body.f32("section end");
    const number = body.u32("section number");
    const name = body.fixedString(NAME_WIDTH, "section name");
    checkRegion("section", i, startTime, endTime, sections[i - 1], at);
    sections.push(Object.freeze({ startTime, endTime, name, number }));
  }
  return sections;
}

function decodeChords(body: BinaryReader): ChordTemplate[] {
  const count = readCount(body, RECORD_SIZE.CHRD, "CHRD");
  const chords: ChordTemplate[] = [];
  for (let i = 0; i < count; i++) {
    const name = body.fixedString(NAME_WIDTH, "chord name");
    const frets: number[] = [];
    const fingers: number[] = [];
    for (let s = 0; s < CHORD_STRINGS; s++) frets.push(body.i8("chord fret"));
    for (let s = 0; s < CHORD_STRINGS; s++) fingers.push(body.i8("chord finger"));
    chords.push(Object.freeze({ name, frets: Object.freeze(frets), fingers: Object.freeze(fingers) }));
  }
  return chords;
}

interface RawLevel {
  level: DifficultyLevel;
  /** Offset of each note record, for link and chord errors. */
  noteOffsets: number[];
}

function decodeLevel(body: BinaryReader, stringCount: number): RawLevel {
  const levelIndex = body.u32("level difficulty");
  const count = readCount(body, RECORD_SIZE.NOTE, "LEVL");

  const notes: NoteEvent[] = [];
  const noteOffsets: number[] = [];
  for (let i = 0; i < count; i++) {
    const at = body.offset;
    const startTime = body.f32("note time");
    const sustain = body.f32("note sustain");
    const maxBend = body.f32("note bend");
    const techniques = body.u32("note techniques");
    const linkNext = body.i32("note link");
    const chordId = body.i16("note chord");
    const string = body.u8("note string");
    const fret = body.u8("note fret");
    const slideTo = body.i8("note slide");

    checkTime(`level ${levelIndex} note ${i} time`, startTime, at);
    checkTime(`level ${levelIndex} note ${i} sustain`, sustain, at);
    if (string >= stringCount) {
      throw new ArrangementError(
        "InvalidNoteString",
        `level ${levelIndex} note ${i} is on string ${string}, arrangement has ${stringCount}`,
        at
      );
    }
    if (!(sustain >= 0)) {
      throw new ArrangementError("MalformedArrangement", `level ${levelIndex} note ${i} has sustain ${sustain}`, at);
    }
    const prev = notes[i - 1];
    if (prev && startTime < prev.startTime) {
      throw new ArrangementError(
        "UnorderedNoteData",
        `level ${levelIndex} note ${i} at ${startTime}s comes before note ${i - 1} at ${prev.startTime}s`,
        at
      );
    }

    notes.push({
      index: i,
      startTime,
      sustain,
      string,
      fret,
      techniques,
      maxBend,
      slideTo: slideTo < 0 ? null : slideTo,
      chordId: chordId < 0 ? null : chordId,
      linkedNext: linkNext < 0 ? null : linkNext,
    });
    noteOffsets.push(at);
  }

  // Links can only be checked once the whole level is read.
  for (const note of notes) {
    if (note.linkedNext === null) continue;
    const target = notes[note.linkedNext];
    const at = noteOffsets[note.index];
    if (note.linkedNext <= note.index || !target) {
      throw new ArrangementError(
        "InvalidNoteLink",
        `level ${levelIndex} note ${note.index} links to note ${note.linkedNext}; links must point forward within the level`,
        at
      );
    }
    if (target.string !== note.string) {
      throw new ArrangementError(
        "InvalidNoteLink",
        `level ${levelIndex} note ${note.index} on string ${note.string} links to note ${target.index} on string ${target.string}`,
        at
      );
    }
    if (target.startTime + LINK_TOLERANCE < note.startTime + note.sustain) {
      throw new ArrangementError(
        "InvalidNoteLink",
        `level ${levelIndex} note ${note.index} sounds until ${note.startTime + note.sustain}s but links to note ${target.index} at ${target.startTime}s`,
        at
      );
    }
  }

  return {
    level: Object.freeze({ levelIndex, notes: Object.freeze(notes.map((n) => Object.freeze(n))) }),
    noteOffsets,
  };
}

/**
 * Decode one arrangement file.
 *
 * Throws `ArrangementError` on any structural or ordering violation; the
 * offset points at the offending record.
 */
export function decodeArrangement(bytes: Uint8Array): Arrangement {
  const r = new BinaryReader(bytes);

  const magic = r.tag("magic");
  if (magic !== ARRANGEMENT_MAGIC) {
    throw new ArrangementError("MalformedArrangement", `bad magic "${magic}"`, 0);
  }
  const version = r.u16("version");
  if (version !== ARRANGEMENT_VERSION) {
    throw new ArrangementError("MalformedArrangement", `unsupported version ${version}`, 4);
  }
  const stringCount = r.u16("string count");
  if (stringCount < MIN_STRINGS || stringCount > MAX_STRINGS) {
    throw new ArrangementError("MalformedArrangement", `string count ${stringCount} out of range`, 6);
  }

  let beats: Beat[] = [];
  let phrases: Phrase[] = [];
  let sections: Section[] = [];
  let chordTemplates: ChordTemplate[] = [];
  const levels = new Map<number, RawLevel>();
  const seen = new Set<string>();

  while (!r.done) {
    const at = r.offset;
    const tag = r.tag("section tag");
    const length = r.u32("section length");
    const body = r.slice(length, `${tag} body`);

    if (tag !== "LEVL") {
      if (seen.has(tag)) {
        throw new ArrangementError("MalformedArrangement", `duplicate ${tag} section`, at);
      }
      seen.add(tag);
    }

    switch (tag) {
      case "BEAT":
        beats = decodeBeats(body);
        break;
      case "PHRS":
        phrases = decodePhrases(body);
        break;
      case "SECT":
        sections = decodeSections(body);
        break;
      case "CHRD":
        chordTemplates = decodeChords(body);
        break;
      case "LEVL": {
        const raw = decodeLevel(body, stringCount);
        if (levels.has(raw.level.levelIndex)) {
          throw new ArrangementError("MalformedArrangement", `duplicate level ${raw.level.levelIndex}`, at);
        }
        levels.set(raw.level.levelIndex, raw);
        break;
      }
      default:
        // Unknown section: already skipped by slice().
        break;
    }
  }

  const ordered: DifficultyLevel[] = [];
  for (let d = 0; d < levels.size; d++) {
    const raw = levels.get(d);
    if (!raw) {
      throw new ArrangementError(
        "MalformedArrangement",
        `levels must be numbered 0..${levels.size - 1}; level ${d} is missing`,
        r.offset
      );
    }
    for (const note of raw.level.notes) {
      if (note.chordId !== null && note.chordId >= chordTemplates.length) {
        throw new ArrangementError(
          "MalformedArrangement",
          `level ${d} note ${note.index} uses chord ${note.chordId}, only ${chordTemplates.length} defined`,
          raw.noteOffsets[note.index]
        );
      }
    }
    ordered.push(raw.level);
  }

  return Object.freeze({
    version,
    stringCount,
    beats: Object.freeze(beats),
    phrases: Object.freeze(phrases),
    sections: Object.freeze(sections),
    chordTemplates: Object.freeze(chordTemplates),
    levels: Object.freeze(ordered),
  });
}
