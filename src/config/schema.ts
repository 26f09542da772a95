// ─── Player Config Schema ────────────────────────────────────────────────────
//
// User settings for the CLI and MCP server. Every field has a default, so an
// empty object (or no file at all) is a valid config.
// ─────────────────────────────────────────────────────────────────────────────

import { z } from "zod";

// ─── Zod Schemas ─────────────────────────────────────────────────────────────

export const DifficultyChoiceSchema = z.union([z.number().int().min(0), z.literal("max")]);

export const PlayerConfigSchema = z.object({
  /** Level to start playback at; "max" picks the hardest the arrangement has. */
  defaultDifficulty: DifficultyChoiceSchema.default("max"),
  tickIntervalMs: z.number().int().min(5).max(1000).default(16),
  /** Seconds of upcoming notes shown in the tab view. */
  lookaheadSeconds: z.number().min(0.5).max(30).default(4),
  tabColumns: z.number().int().min(16).max(400).default(64),
  showTechniques: z.boolean().default(true),
  /** Where extract commands write when no output is given. */
  exportDir: z.string().min(1).default("."),
});

// ─── Derived Types ───────────────────────────────────────────────────────────

export type PlayerConfig = z.infer<typeof PlayerConfigSchema>;
export type DifficultyChoice = z.infer<typeof DifficultyChoiceSchema>;

// ─── Validation ──────────────────────────────────────────────────────────────

export interface ConfigError {
  field: string;
  message: string;
}

/**
 * Validate a config object using the zod schema.
 * Returns an empty array if valid.
 */
export function validateConfig(config: unknown): ConfigError[] {
  const result = PlayerConfigSchema.safeParse(config);
  if (result.success) return [];

  return result.error.issues.map((issue) => ({
    field: issue.path.join(".") || "root",
    message: issue.message,
  }));
}

/** Resolve "max" against the number of levels an arrangement has. */
export function resolveDifficulty(choice: DifficultyChoice, levelCount: number): number {
  const highest = Math.max(0, levelCount - 1);
  return choice === "max" ? highest : Math.min(choice, highest);
}

export const DEFAULT_CONFIG: PlayerConfig = PlayerConfigSchema.parse({});
