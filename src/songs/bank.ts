// ─── Sound Bank Index ───────────────────────────────────────────────────────
//
// A song's audio lives in a separate entry referenced through its sound
// bank. The bank is a little-endian chunk stream (tag[4], u32 size, body);
// the DIDX chunk lists the embedded audio ids as 12-byte records
// (u32 id, u32 offset, u32 size).
// ─────────────────────────────────────────────────────────────────────────────

import { ArchiveError } from "../errors.js";

const DIDX_RECORD_SIZE = 12;

/** Chunk tag → body. Later duplicates of a tag replace earlier ones. */
export function bankChunks(bytes: Uint8Array): Map<string, Uint8Array> {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const chunks = new Map<string, Uint8Array>();
  let offset = 0;

  while (offset < bytes.length) {
    if (offset + 8 > bytes.length) {
      throw new ArchiveError("CorruptEntry", `sound bank chunk header cut off at byte ${offset}`, { offset });
    }
    const tag = String.fromCharCode(bytes[offset], bytes[offset + 1], bytes[offset + 2], bytes[offset + 3]);
    const size = view.getUint32(offset + 4, true);
    const start = offset + 8;
    if (start + size > bytes.length) {
      throw new ArchiveError("CorruptEntry", `sound bank chunk "${tag}" runs past the end`, { offset });
    }
    chunks.set(tag, bytes.subarray(start, start + size));
    offset = start + size;
  }

  return chunks;
}

/** Audio ids listed by a bank's DIDX chunk, in file order. */
export function bankAudioIds(bytes: Uint8Array): number[] {
  const didx = bankChunks(bytes).get("DIDX");
  if (!didx) {
    throw new ArchiveError("CorruptEntry", "sound bank has no DIDX chunk");
  }

  const view = new DataView(didx.buffer, didx.byteOffset, didx.byteLength);
  const ids: number[] = [];
  for (let off = 0; off + DIDX_RECORD_SIZE <= didx.length; off += DIDX_RECORD_SIZE) {
    ids.push(view.getUint32(off, true));
  }
  return ids;
}
