// ─── Block Decompressor ─────────────────────────────────────────────────────
//
// Turns one entry's run of blocks back into its bytes. A block is either
// zlib-compressed or stored raw:
//   - recorded length 0 or == blockSize → stored full block
//   - final block whose length equals the bytes still missing and whose first
//     byte is not a zlib header (0x78) → stored remainder
//   - anything else → zlib; a failed inflate is CorruptEntry
// ─────────────────────────────────────────────────────────────────────────────

import { constants, deflateSync, inflateSync } from "node:zlib";
import { ArchiveError, describeError } from "../errors.js";
import type { ArchiveEntry, ArchiveIndex, ByteSource } from "./types.js";

/** First byte of every zlib stream with a 32K window. */
const ZLIB_HEADER = 0x78;

/**
 * Decompress one entry.
 *
 * The result is always exactly `entry.uncompressedSize` bytes; any other
 * length is a `CorruptEntry`. Nothing is cached; callers own the bytes.
 */
export function extract(index: ArchiveIndex, entry: ArchiveEntry, source: ByteSource): Uint8Array {
  const { blockSize, blockLengths } = index;
  const out = new Uint8Array(entry.uncompressedSize);
  let written = 0;
  let offset = entry.offset;

  for (let b = 0; b < entry.blockCount; b++) {
    const recorded = blockLengths[entry.firstBlockIndex + b];
    const length = recorded === 0 ? blockSize : recorded;
    const raw = source.read(offset, length);
    const remaining = entry.uncompressedSize - written;

    const isLast = b === entry.blockCount - 1;
    let block: Uint8Array;
    if (length === blockSize) {
      block = raw;
    } else if (isLast && length === remaining && raw[0] !== ZLIB_HEADER) {
      block = raw;
    } else {
      try {
        block = inflateSync(raw, { maxOutputLength: blockSize });
      } catch (err) {
        throw new ArchiveError(
          "CorruptEntry",
          `block ${entry.firstBlockIndex + b} of entry ${entry.index} failed to inflate: ${describeError(err)}`,
          { entryHash: entry.nameHash, offset }
        );
      }
    }

    if (written + block.length > out.length) {
      throw new ArchiveError(
        "CorruptEntry",
        `entry ${entry.index} decompresses past its declared ${entry.uncompressedSize} bytes`,
        { entryHash: entry.nameHash, offset }
      );
    }
    out.set(block, written);
    written += block.length;
    offset += length;
  }

  if (written !== entry.uncompressedSize) {
    throw new ArchiveError(
      "CorruptEntry",
      `entry ${entry.index} decompressed to ${written} bytes, expected ${entry.uncompressedSize}`,
      { entryHash: entry.nameHash, offset: entry.offset }
    );
  }

  return out;
}

/** Decompress an entry and decode it as UTF-8. */
export function extractText(index: ArchiveIndex, entry: ArchiveEntry, source: ByteSource): string {
  const bytes = extract(index, entry, source);
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch (err) {
    throw new ArchiveError("CorruptEntry", `entry ${entry.index} is not UTF-8 text: ${describeError(err)}`, {
      entryHash: entry.nameHash,
    });
  }
}

/** Blocks of one entry as they would be laid out in an archive. */
export interface CompressedEntry {
  blocks: Uint8Array[];
  /** Recorded length of each block (the block table values). */
  lengths: number[];
}

/**
 * Deflate a short final chunk that would read back as a zlib stream if
 * stored. The result must not be blockSize long, or it would read as a
 * stored full block.
 */
function deflateRemainder(chunk: Uint8Array, blockSize: number): Uint8Array {
  for (const options of [{}, { strategy: constants.Z_FIXED }]) {
    const deflated = deflateSync(chunk, options);
    if (deflated.length !== blockSize) return deflated;
  }
  throw new Error(`cannot encode a ${chunk.length}-byte final block starting with a zlib header at block size ${blockSize}`);
}

/**
 * Split bytes into blocks and deflate each, storing a block raw whenever
 * deflate does not make it smaller. A short final block that starts like a
 * zlib stream is always deflated, so extract() never mistakes it.
 */
export function compressEntry(bytes: Uint8Array, blockSize: number): CompressedEntry {
  const blocks: Uint8Array[] = [];
  const lengths: number[] = [];

  for (let start = 0; start < bytes.length; start += blockSize) {
    const chunk = bytes.subarray(start, Math.min(start + blockSize, bytes.length));
    const deflated = deflateSync(chunk);
    if (deflated.length < chunk.length) {
      blocks.push(deflated);
      lengths.push(deflated.length);
    } else if (chunk.length < blockSize && chunk[0] === ZLIB_HEADER) {
      const forced = deflateRemainder(chunk, blockSize);
      blocks.push(forced);
      lengths.push(forced.length);
    } else {
      blocks.push(chunk);
      lengths.push(chunk.length);
    }
  }

  return { blocks, lengths };
}
