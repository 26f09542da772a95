// ─── Song Metadata Schema ───────────────────────────────────────────────────
//
// The metadata files under manifests/ are JSON:
//   { "Entries": { "<id>": { "Attributes": { ... } } } }
// with one entry per arrangement. Only the attributes the player needs are
// declared; zod drops the rest.
// ─────────────────────────────────────────────────────────────────────────────

import { z } from "zod";

// ─── Zod Schemas ─────────────────────────────────────────────────────────────

export const TuningSchema = z.object({
  string0: z.number().int().default(0),
  string1: z.number().int().default(0),
  string2: z.number().int().default(0),
  string3: z.number().int().default(0),
  string4: z.number().int().default(0),
  string5: z.number().int().default(0),
});

export const AttributesSchema = z.object({
  SongName: z.string().default(""),
  SongNameSort: z.string().default(""),
  ArtistName: z.string().default(""),
  ArtistNameSort: z.string().default(""),
  AlbumName: z.string().default(""),
  SongYear: z.number().int().optional(),
  SongLength: z.number().nonnegative().default(0),
  SongAverageTempo: z.number().nonnegative().default(0),
  ArrangementName: z.string().min(1),
  ArrangementType: z.number().int().optional(),
  Tuning: TuningSchema.default({}),
  CapoFret: z.number().default(0),
  CentOffset: z.number().default(0),
  MaxPhraseDifficulty: z.number().int().min(0),
  SongAsset: z.string().optional(),
  SongBank: z.string().optional(),
  PersistentID: z.string().optional(),
});

export const SongMetadataFileSchema = z.object({
  Entries: z.record(z.object({ Attributes: AttributesSchema })),
});

// ─── Derived Types ───────────────────────────────────────────────────────────

export type Attributes = z.infer<typeof AttributesSchema>;
export type SongMetadataFile = z.infer<typeof SongMetadataFileSchema>;

/**
 * Parse and validate a metadata file's JSON text.
 * Throws with one `path: message` line per issue.
 */
export function parseSongMetadata(json: string): SongMetadataFile {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    throw new Error(`not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }

  const result = SongMetadataFileSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  ${i.path.join(".") || "root"}: ${i.message}`)
      .join("\n");
    throw new Error(`invalid song metadata:\n${issues}`);
  }
  return result.data;
}
