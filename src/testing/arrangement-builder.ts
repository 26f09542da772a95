// ─── Test Arrangement Builder ───────────────────────────────────────────────
//
// Encodes arrangement files for tests, in the layout decoder.ts reads.
// Times should be exact in float32 (0.5, 0.25, 1.75, ...) so assertions can
// compare with toBe.
// ─────────────────────────────────────────────────────────────────────────────

import { NAME_WIDTH } from "../arrangement/decoder.js";

export interface BeatSpec {
  time: number;
  measure?: number;
  beat?: number;
  downbeat?: boolean;
}

export interface RegionSpec {
  start: number;
  end: number;
  name: string;
  /** maxDifficulty for phrases, number for sections. */
  value?: number;
}

export interface ChordSpec {
  name: string;
  frets: number[];
  fingers?: number[];
}

export interface NoteSpec {
  time: number;
  string: number;
  fret: number;
  sustain?: number;
  maxBend?: number;
  techniques?: number;
  linkNext?: number;
  chordId?: number;
  slideTo?: number;
}

export interface LevelSpec {
  difficulty: number;
  notes: NoteSpec[];
}

export interface ArrangementSpec {
  magic?: string;
  version?: number;
  stringCount?: number;
  beats?: BeatSpec[];
  phrases?: RegionSpec[];
  sections?: RegionSpec[];
  chords?: ChordSpec[];
  levels?: LevelSpec[];
  /** Written after everything else, e.g. unknown tags. */
  extraSections?: Array<{ tag: string; body: Uint8Array }>;
}

const encoder = new TextEncoder();

class Writer {
  private chunks: Uint8Array[] = [];

  private push(size: number, fill: (view: DataView) => void): void {
    const bytes = new Uint8Array(size);
    fill(new DataView(bytes.buffer));
    this.chunks.push(bytes);
  }

  u8(v: number): void { this.push(1, (d) => d.setUint8(0, v)); }
  i8(v: number): void { this.push(1, (d) => d.setInt8(0, v)); }
  u16(v: number): void { this.push(2, (d) => d.setUint16(0, v, true)); }
  i16(v: number): void { this.push(2, (d) => d.setInt16(0, v, true)); }
  u32(v: number): void { this.push(4, (d) => d.setUint32(0, v, true)); }
  i32(v: number): void { this.push(4, (d) => d.setInt32(0, v, true)); }
  f32(v: number): void { this.push(4, (d) => d.setFloat32(0, v, true)); }

  ascii(s: string): void {
    this.chunks.push(encoder.encode(s));
  }

  name(s: string): void {
    const field = new Uint8Array(NAME_WIDTH);
    field.set(encoder.encode(s).subarray(0, NAME_WIDTH));
    this.chunks.push(field);
  }

  bytes(b: Uint8Array): void {
    this.chunks.push(b);
  }

  section(tag: string, body: Writer): void {
    const bytes = body.finish();
    this.ascii(tag);
    this.u32(bytes.length);
    this.bytes(bytes);
  }

  finish(): Uint8Array {
    const total = this.chunks.reduce((n, c) => n + c.length, 0);
    const out = new Uint8Array(total);
    let at = 0;
    for (const c of this.chunks) {
      out.set(c, at);
      at += c.length;
    }
    return out;
  }
}

/** Encode an arrangement. Sections are only written when given. */
export function encodeArrangement(spec: ArrangementSpec): Uint8Array {
  const w = new Writer();
  w.ascii(spec.magic ?? "SNGA");
  w.u16(spec.version ?? 1);
  w.u16(spec.stringCount ?? 6);

  if (spec.beats) {
    const body = new Writer();
    body.u32(spec.beats.length);
    for (const b of spec.beats) {
      body.f32(b.time);
      body.u16(b.measure ?? 1);
      body.u16(b.beat ?? 0);
      body.u32(b.downbeat ? 1 : 0);
    }
    w.section("BEAT", body);
  }

  if (spec.phrases) {
    const body = new Writer();
    body.u32(spec.phrases.length);
    for (const p of spec.phrases) {
      body.f32(p.start);
      body.f32(p.end);
      body.u32(p.value ?? 0);
      body.name(p.name);
    }
    w.section("PHRS", body);
  }

  if (spec.chords) {
    const body = new Writer();
    body.u32(spec.chords.length);
    for (const c of spec.chords) {
      body.name(c.name);
      for (let s = 0; s < 6; s++) body.i8(c.frets[s] ?? -1);
      for (let s = 0; s < 6; s++) body.i8(c.fingers?.[s] ?? -1);
    }
    w.section("CHRD", body);
  }

  if (spec.sections) {
    const body = new Writer();
    body.u32(spec.sections.length);
    for (const s of spec.sections) {
      body.f32(s.start);
      body.f32(s.end);
      body.u32(s.value ?? 1);
      body.name(s.name);
    }
    w.section("SECT", body);
  }

  for (const level of spec.levels ?? []) {
    const body = new Writer();
    body.u32(level.difficulty);
    body.u32(level.notes.length);
    for (const n of level.notes) {
      body.f32(n.time);
      body.f32(n.sustain ?? 0);
      body.f32(n.maxBend ?? 0);
      body.u32(n.techniques ?? 0);
      body.i32(n.linkNext ?? -1);
      body.i16(n.chordId ?? -1);
      body.u8(n.string);
      body.u8(n.fret);
      body.i8(n.slideTo ?? -1);
    }
    w.section("LEVL", body);
  }

  for (const extra of spec.extraSections ?? []) {
    const body = new Writer();
    body.bytes(extra.body);
    w.section(extra.tag, body);
  }

  return w.finish();
}

