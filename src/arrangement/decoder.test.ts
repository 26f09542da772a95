import { describe, it, expect } from "vitest";
import { decodeArrangement } from "./decoder.js";
import { TECHNIQUES } from "./techniques.js";
import { encodeArrangement, type ArrangementSpec, type NoteSpec } from "../testing/arrangement-builder.js";
import { SAMPLE_ARRANGEMENT } from "../testing/song-fixture.js";

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected a throw");
}

function decodeError(spec: ArrangementSpec): unknown {
  return thrown(() => decodeArrangement(encodeArrangement(spec)));
}

/** One level 0 with the given notes; its first record sits at byte 24. */
function levelSpec(notes: NoteSpec[], extra: ArrangementSpec = {}): ArrangementSpec {
  return { ...extra, levels: [{ difficulty: 0, notes }] };
}

describe("decodeArrangement", () => {
  const arr = decodeArrangement(encodeArrangement(SAMPLE_ARRANGEMENT));

  it("reads the header and every section", () => {
    expect(arr.version).toBe(1);
    expect(arr.stringCount).toBe(6);
    expect(arr.beats).toHaveLength(5);
    expect(arr.beats[0]).toEqual({ time: 0, measure: 1, beat: 0, isDownbeat: true });
    expect(arr.beats[1]).toEqual({ time: 0.5, measure: 1, beat: 1, isDownbeat: false });
    expect(arr.phrases.map((p) => [p.name, p.startTime, p.endTime, p.maxDifficulty])).toEqual([
      ["intro", 0, 1, 1],
      ["riff", 1, 2.5, 1],
    ]);
    expect(arr.sections).toEqual([{ startTime: 0, endTime: 2.5, name: "verse", number: 1 }]);
    expect(arr.chordTemplates).toEqual([
      { name: "E5", frets: [0, 2, 2, -1, -1, -1], fingers: [-1, 1, 1, -1, -1, -1] },
    ]);
  });

  it("keeps each level's notes separate and in order", () => {
    expect(arr.levels.map((l) => l.levelIndex)).toEqual([0, 1]);
    expect(arr.levels[0].notes.map((n) => n.startTime)).toEqual([0.5, 1.5]);
    expect(arr.levels[1].notes.map((n) => n.index)).toEqual([0, 1, 2, 3, 4, 5]);
  });

  it("maps sentinel fields to null", () => {
    expect(arr.levels[1].notes[4]).toEqual({
      index: 4,
      startTime: 2,
      sustain: 0.25,
      string: 2,
      fret: 4,
      techniques: TECHNIQUES.bend,
      maxBend: 1,
      slideTo: null,
      chordId: null,
      linkedNext: 5,
    });
    expect(arr.levels[1].notes[1].chordId).toBe(0);
    expect(arr.levels[0].notes[0].linkedNext).toBeNull();
  });

  it("freezes the decoded model", () => {
    expect(Object.isFrozen(arr)).toBe(true);
    expect(Object.isFrozen(arr.levels[1].notes)).toBe(true);
    expect(Object.isFrozen(arr.levels[1].notes[0])).toBe(true);
  });

  it("skips unknown sections", () => {
    const decoded = decodeArrangement(
      encodeArrangement({ ...SAMPLE_ARRANGEMENT, extraSections: [{ tag: "XTRA", body: new Uint8Array([1, 2, 3]) }] })
    );
    expect(decoded.levels).toHaveLength(2);
  });

  it("accepts an arrangement with no sections", () => {
    const decoded = decodeArrangement(encodeArrangement({ stringCount: 4 }));
    expect(decoded.stringCount).toBe(4);
    expect(decoded.beats).toEqual([]);
    expect(decoded.levels).toEqual([]);
  });
});

describe("decodeArrangement errors", () => {
  it.each<[string, ArrangementSpec, number]>([
    ["bad magic", { magic: "SNGX" }, 0],
    ["unsupported version", { version: 2 }, 4],
    ["too few strings", { stringCount: 3 }, 6],
    ["too many strings", { stringCount: 9 }, 6],
  ])("rejects %s", (_label, spec, offset) => {
    expect(decodeError(spec)).toMatchObject({ kind: "MalformedArrangement", offset });
  });

  it("rejects a truncated file", () => {
    const bytes = encodeArrangement(SAMPLE_ARRANGEMENT);
    expect(thrown(() => decodeArrangement(bytes.subarray(0, bytes.length - 1)))).toMatchObject({
      kind: "MalformedArrangement",
    });
  });

  it("rejects a section whose count does not match its length", () => {
    const body = new Uint8Array(16);
    new DataView(body.buffer).setUint32(0, 2, true);
    expect(decodeError({ extraSections: [{ tag: "BEAT", body }] })).toMatchObject({
      kind: "MalformedArrangement",
      offset: 20,
    });
  });

  it("rejects a duplicate section", () => {
    expect(decodeError({ beats: [{ time: 0 }], extraSections: [{ tag: "BEAT", body: new Uint8Array(4) }] })).toMatchObject({
      kind: "MalformedArrangement",
      offset: 32,
    });
  });

  it("rejects beats that do not strictly increase", () => {
    expect(decodeError({ beats: [{ time: 1 }, { time: 1 }] })).toMatchObject({
      kind: "UnorderedBeatData",
      offset: 32,
    });
  });

  it("rejects overlapping phrases", () => {
    expect(
      decodeError({
        phrases: [
          { start: 0, end: 2, name: "a" },
          { start: 1, end: 3, name: "b" },
        ],
      })
    ).toMatchObject({ kind: "UnorderedSectionData", offset: 64 });
  });

  it("rejects a section that ends before it starts", () => {
    expect(decodeError({ sections: [{ start: 2, end: 1, name: "solo" }] })).toMatchObject({
      kind: "UnorderedSectionData",
      offset: 20,
    });
  });

  it("rejects a note on a string the arrangement does not have", () => {
    expect(decodeError(levelSpec([{ time: 0, string: 6, fret: 0 }]))).toMatchObject({
      kind: "InvalidNoteString",
      offset: 24,
    });
  });

  it("rejects notes out of time order", () => {
    expect(
      decodeError(
        levelSpec([
          { time: 1, string: 0, fret: 0 },
          { time: 0.5, string: 0, fret: 0 },
        ])
      )
    ).toMatchObject({ kind: "UnorderedNoteData", offset: 49 });
  });

  it.each<[string, ArrangementSpec, number]>([
    ["a NaN beat time", { beats: [{ time: 0 }, { time: Number.NaN }] }, 32],
    ["a NaN phrase start", { phrases: [{ start: Number.NaN, end: 1, name: "a" }] }, 20],
    ["an infinite section end", { sections: [{ start: 0, end: Number.POSITIVE_INFINITY, name: "a" }] }, 20],
    [
      "a NaN note time",
      levelSpec([
        { time: Number.NaN, string: 0, fret: 0 },
        { time: 0.5, string: 0, fret: 0 },
        { time: 1, string: 0, fret: 0 },
      ]),
      24,
    ],
    ["an infinite sustain", levelSpec([{ time: 0, string: 0, fret: 0, sustain: Number.POSITIVE_INFINITY }]), 24],
  ])("rejects %s", (_label, spec, offset) => {
    expect(decodeError(spec)).toMatchObject({ kind: "MalformedArrangement", offset });
  });

  it("rejects a negative sustain", () => {
    expect(decodeError(levelSpec([{ time: 0, string: 0, fret: 0, sustain: -1 }]))).toMatchObject({
      kind: "MalformedArrangement",
      offset: 24,
    });
  });

  it.each<[string, NoteSpec[]]>([
    ["a link to itself", [{ time: 0, string: 0, fret: 0, linkNext: 0 }]],
    ["a link past the level", [{ time: 0, string: 0, fret: 0, linkNext: 3 }]],
    [
      "a link to another string",
      [
        { time: 0, string: 0, fret: 0, linkNext: 1 },
        { time: 1, string: 1, fret: 0 },
      ],
    ],
    [
      "a link to a note that starts while this one sounds",
      [
        { time: 0, string: 0, fret: 0, sustain: 1, linkNext: 1 },
        { time: 0.5, string: 0, fret: 2 },
      ],
    ],
  ])("rejects %s", (_label, notes) => {
    expect(decodeError(levelSpec(notes))).toMatchObject({ kind: "InvalidNoteLink", offset: 24 });
  });

  it("rejects a chord id with no template", () => {
    expect(decodeError(levelSpec([{ time: 0, string: 0, fret: 0, chordId: 0 }]))).toMatchObject({
      kind: "MalformedArrangement",
      offset: 24,
    });
  });

  it("rejects gaps in level numbering", () => {
    const err = decodeError({ levels: [{ difficulty: 1, notes: [] }] });
    expect(err).toMatchObject({ kind: "MalformedArrangement" });
    expect(err).toHaveProperty("message", expect.stringContaining("level 0 is missing"));
  });

  it("rejects a repeated level", () => {
    expect(
      decodeError({
        levels: [
          { difficulty: 0, notes: [] },
          { difficulty: 0, notes: [] },
        ],
      })
    ).toMatchObject({ kind: "MalformedArrangement", offset: 24 });
  });
});
