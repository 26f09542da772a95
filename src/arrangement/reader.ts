// ─── Binary Reader ──────────────────────────────────────────────────────────
//
// Little-endian forward-only cursor over a byte slice. Every read is bounds
// checked and a short read is a MalformedArrangement carrying the absolute
// offset into the arrangement file.
// ─────────────────────────────────────────────────────────────────────────────

import { ArrangementError } from "../errors.js";

const utf8 = new TextDecoder("utf-8");

export class BinaryReader {
  private readonly view: DataView;
  private pos = 0;

  constructor(
    private readonly bytes: Uint8Array,
    /** Absolute offset of `bytes[0]` in the whole file, for error messages. */
    readonly base: number = 0
  ) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  /** Absolute offset of the next byte. */
  get offset(): number {
    return this.base + this.pos;
  }

  get remaining(): number {
    return this.bytes.length - this.pos;
  }

  get done(): boolean {
    return this.pos >= this.bytes.length;
  }

  private take(n: number, what: string): number {
    if (this.pos + n > this.bytes.length) {
      throw new ArrangementError(
        "MalformedArrangement",
        `need ${n} bytes for ${what}, ${this.remaining} left`,
        this.offset
      );
    }
    const at = this.pos;
    this.pos += n;
    return at;
  }

  u8(what = "u8"): number {
    return this.view.getUint8(this.take(1, what));
  }

  i8(what = "i8"): number {
    return this.view.getInt8(this.take(1, what));
  }

  u16(what = "u16"): number {
    return this.view.getUint16(this.take(2, what), true);
  }

  i16(what = "i16"): number {
    return this.view.getInt16(this.take(2, what), true);
  }

  u32(what = "u32"): number {
    return this.view.getUint32(this.take(4, what), true);
  }

  i32(what = "i32"): number {
    return this.view.getInt32(this.take(4, what), true);
  }

  f32(what = "f32"): number {
    return this.view.getFloat32(this.take(4, what), true);
  }

  /** Four ASCII characters. */
  tag(what = "tag"): string {
    const at = this.take(4, what);
    return String.fromCharCode(this.bytes[at], this.bytes[at + 1], this.bytes[at + 2], this.bytes[at + 3]);
  }

  /** Fixed-width NUL-padded UTF-8 string. */
  fixedString(width: number, what = "string"): string {
    const at = this.take(width, what);
    const field = this.bytes.subarray(at, at + width);
    const end = field.indexOf(0);
    return utf8.decode(end === -1 ? field : field.subarray(0, end));
  }

  /** Consume `length` bytes and return a reader over just them. */
  slice(length: number, what = "section"): BinaryReader {
    const base = this.offset;
    const at = this.take(length, what);
    return new BinaryReader(this.bytes.subarray(at, at + length), base);
  }
}
