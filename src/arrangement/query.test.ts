import { describe, it, expect } from "vitest";
import { decodeArrangement } from "./decoder.js";
import {
  durationOf,
  firstIndexAfter,
  firstIndexAtOrAfter,
  highestDifficulty,
  linkedNote,
  notesBetween,
  regionAt,
  summarizeLevel,
} from "./query.js";
import { encodeArrangement } from "../testing/arrangement-builder.js";
import { SAMPLE_ARRANGEMENT } from "../testing/song-fixture.js";

const arr = decodeArrangement(encodeArrangement(SAMPLE_ARRANGEMENT));
const level = arr.levels[1];

describe("binary searches", () => {
  const times = [1, 2, 2, 3];
  const id = (t: number) => t;

  it("finds the first item after a time", () => {
    expect(firstIndexAfter(times, 2, id)).toBe(3);
    expect(firstIndexAfter(times, 0, id)).toBe(0);
    expect(firstIndexAfter(times, 3, id)).toBe(4);
  });

  it("finds the first item at or after a time", () => {
    expect(firstIndexAtOrAfter(times, 2, id)).toBe(1);
    expect(firstIndexAtOrAfter(times, 3.5, id)).toBe(4);
  });
});

describe("regionAt", () => {
  it("returns the region containing a time", () => {
    expect(regionAt(arr.phrases, 0)?.name).toBe("intro");
    expect(regionAt(arr.phrases, 1)?.name).toBe("riff");
    expect(regionAt(arr.sections, 2.4)?.name).toBe("verse");
  });

  it("returns null outside every region", () => {
    expect(regionAt(arr.phrases, -1)).toBeNull();
    expect(regionAt(arr.phrases, 2.5)).toBeNull();
  });
});

describe("level queries", () => {
  it("selects notes by start time, end exclusive", () => {
    expect(notesBetween(level, 1, 2).map((n) => n.index)).toEqual([1, 2, 3]);
    expect(notesBetween(level, 3, 4)).toEqual([]);
  });

  it("follows links", () => {
    expect(linkedNote(level, level.notes[4])).toBe(level.notes[5]);
    expect(linkedNote(level, level.notes[0])).toBeNull();
  });

  it("summarizes a level", () => {
    expect(summarizeLevel(level)).toEqual({
      levelIndex: 1,
      noteCount: 6,
      chordNoteCount: 2,
      sustainedCount: 5,
      linkedCount: 1,
      firstNoteTime: 0.5,
      lastNoteTime: 2.25,
    });
  });
});

describe("arrangement queries", () => {
  it("reports the highest level and the end time", () => {
    expect(highestDifficulty(arr)).toBe(1);
    expect(durationOf(arr)).toBe(2.5);
  });
});
