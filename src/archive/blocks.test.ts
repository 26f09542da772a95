import { describe, it, expect } from "vitest";
import { deflateSync, inflateSync } from "node:zlib";
import { compressEntry, extract, extractText } from "./blocks.js";
import { openArchive } from "./index-reader.js";
import { bufferSource } from "./source.js";
import { buildTestArchive } from "../testing/archive-builder.js";

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected a throw");
}

const TEN_BYTES = new TextEncoder().encode("abcdefghij");

/** Block size 4: a deflated block, a stored full block, a deflated tail. */
function mixedArchive(): Uint8Array {
  return buildTestArchive({
    blockSize: 4,
    files: [{ path: "data.bin", data: TEN_BYTES, blockModes: ["deflate", "store", "deflate"] }],
  });
}

describe("extract", () => {
  it("joins deflated and stored blocks back into the entry", () => {
    const bytes = mixedArchive();
    const source = bufferSource(bytes);
    const index = openArchive(source);
    const entry = index.entries[1];
    expect(entry.blockCount).toBe(3);
    expect(index.blockLengths[entry.firstBlockIndex + 1]).toBe(4);
    expect(extract(index, entry, source)).toEqual(TEN_BYTES);
  });

  it("treats a recorded length of 0 as a stored full block", () => {
    const bytes = mixedArchive();
    const index = openArchive(bufferSource(bytes));
    const entry = index.entries[1];
    // Block table starts after the header and two records.
    const slot = 32 + 2 * 30 + (entry.firstBlockIndex + 1) * 4;
    new DataView(bytes.buffer).setUint32(slot, 0, false);

    const source = bufferSource(bytes);
    const reopened = openArchive(source);
    expect(reopened.blockLengths[entry.firstBlockIndex + 1]).toBe(0);
    expect(extract(reopened, reopened.entries[1], source)).toEqual(TEN_BYTES);
  });

  it("round-trips a compressible entry across many blocks", () => {
    const text = "abc".repeat(400);
    const source = bufferSource(buildTestArchive({ blockSize: 64, files: [{ path: "big.txt", data: text }] }));
    const index = openArchive(source);
    expect(index.entries[1].blockCount).toBe(19);
    expect(extractText(index, index.entries[1], source)).toBe(text);
  });

  it("extracts an empty entry as zero bytes", () => {
    const source = bufferSource(buildTestArchive({ files: [{ path: "empty.txt", data: "" }] }));
    const index = openArchive(source);
    expect(extract(index, index.entries[1], source)).toEqual(new Uint8Array(0));
  });

  it("reports a block that neither inflates nor fits as CorruptEntry", () => {
    const bytes = mixedArchive();
    const index = openArchive(bufferSource(bytes));
    const entry = index.entries[1];
    bytes[entry.offset] = 0xff;
    bytes[entry.offset + 1] = 0xff;
    expect(thrown(() => extract(index, entry, bufferSource(bytes)))).toMatchObject({
      kind: "CorruptEntry",
      entryHash: entry.nameHash,
    });
  });

  it("reports a size mismatch as CorruptEntry", () => {
    const bytes = mixedArchive();
    // Uncompressed size of record 1 (u40 at header 32 + record 30 + 20) → 11.
    const view = new DataView(bytes.buffer);
    view.setUint8(82, 0);
    view.setUint32(83, 11, false);
    const source = bufferSource(bytes);
    const index = openArchive(source);
    expect(index.entries[1].uncompressedSize).toBe(11);
    expect(thrown(() => extract(index, index.entries[1], source))).toMatchObject({ kind: "CorruptEntry" });
  });
});

describe("extract stored remainders", () => {
  const open = (data: Uint8Array) => {
    const source = bufferSource(
      buildTestArchive({ blockSize: 64, files: [{ path: "tail.bin", data, blockModes: ["store", "store"] }] })
    );
    const index = openArchive(source);
    return { source, index, entry: index.entries[1] };
  };

  it("keeps a short final block raw when it has no zlib header", () => {
    const data = new Uint8Array(70).fill(0x61);
    const { source, index, entry } = open(data);
    expect(index.blockLengths.slice(entry.firstBlockIndex, entry.firstBlockIndex + 2)).toEqual([64, 6]);
    expect(extract(index, entry, source)).toEqual(data);
  });

  it("inflates a final block that starts with a zlib header and fails when it is broken", () => {
    const data = new Uint8Array(70).fill(0x61);
    data.set([0x78, 0x9c, 0x73, 0x72, 0x02, 0x01], 64);
    const { source, index, entry } = open(data);
    expect(thrown(() => extract(index, entry, source))).toMatchObject({
      kind: "CorruptEntry",
      entryHash: entry.nameHash,
    });
  });

  it("round-trips an entry that is itself a zlib stream", () => {
    const nested = new Uint8Array(deflateSync("hello hello hello hello 123"));
    expect(nested[0]).toBe(0x78);
    const source = bufferSource(buildTestArchive({ blockSize: 64, files: [{ path: "nested.z", data: nested }] }));
    const index = openArchive(source);
    expect(extract(index, index.entries[1], source)).toEqual(nested);
  });
});

describe("extractText", () => {
  it("rejects bytes that are not UTF-8", () => {
    const source = bufferSource(
      buildTestArchive({ files: [{ path: "bad.txt", data: new Uint8Array([0x61, 0xff, 0xfe]) }] })
    );
    const index = openArchive(source);
    expect(thrown(() => extractText(index, index.entries[1], source))).toMatchObject({ kind: "CorruptEntry" });
  });
});

describe("compressEntry", () => {
  it("stores blocks that deflate would grow", () => {
    const { blocks, lengths } = compressEntry(new Uint8Array([1, 2, 3]), 64);
    expect(lengths).toEqual([3]);
    expect(blocks[0]).toEqual(new Uint8Array([1, 2, 3]));
  });

  it("deflates a short final block that starts with a zlib header", () => {
    const nested = new Uint8Array(deflateSync("hello hello hello hello 123"));
    const { blocks, lengths } = compressEntry(nested, 64);
    expect(lengths).toEqual([blocks[0].length]);
    expect(blocks[0]).not.toEqual(nested);
    expect(new Uint8Array(inflateSync(blocks[0]))).toEqual(nested);
  });

  it("deflates compressible blocks", () => {
    const { lengths } = compressEntry(new Uint8Array(128), 64);
    expect(lengths).toHaveLength(2);
    for (const length of lengths) expect(length).toBeLessThan(64);
  });
});
