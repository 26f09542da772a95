// ─── psarc-player: Error Types ──────────────────────────────────────────────
//
// One error class per layer. Each carries a `kind` so callers can decide
// whether to abort an archive load, skip one song, or report a caller bug.
// ─────────────────────────────────────────────────────────────────────────────

export type ArchiveErrorKind =
  | "MalformedHeader"
  | "TruncatedArchive"
  | "CorruptEntry"
  | "UnresolvedHash"
  | "EntryNotFound";

export type ArrangementErrorKind =
  | "MalformedArrangement"
  | "UnorderedBeatData"
  | "UnorderedNoteData"
  | "UnorderedSectionData"
  | "InvalidNoteString"
  | "InvalidNoteLink";

export type PlaybackErrorKind = "NoSuchDifficulty" | "InvalidState";

/** Where in the archive a failure happened. */
export interface ArchiveErrorLocation {
  /** Hex MD5 name hash of the offending entry. */
  entryHash?: string;
  /** Byte offset into the archive. */
  offset?: number;
}

/**
 * Failure while reading the container: header, table of contents,
 * block data, manifest or song metadata.
 */
export class ArchiveError extends Error {
  readonly entryHash?: string;
  readonly offset?: number;

  constructor(
    public readonly kind: ArchiveErrorKind,
    message: string,
    location: ArchiveErrorLocation = {}
  ) {
    super(`${kind}: ${message}`);
    this.name = "ArchiveError";
    this.entryHash = location.entryHash;
    this.offset = location.offset;
  }
}

/** Failure while decoding an arrangement file. `offset` is into the decompressed entry. */
export class ArrangementError extends Error {
  constructor(
    public readonly kind: ArrangementErrorKind,
    message: string,
    public readonly offset: number
  ) {
    super(`${kind} at byte ${offset}: ${message}`);
    this.name = "ArrangementError";
  }
}

/** Contract violation by a caller of the synchronizer. */
export class PlaybackError extends Error {
  constructor(
    public readonly kind: PlaybackErrorKind,
    message: string
  ) {
    super(`${kind}: ${message}`);
    this.name = "PlaybackError";
  }
}

/** Render any thrown value as a single line for logs. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
