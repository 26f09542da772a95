// ─── Player Config Loader ────────────────────────────────────────────────────
//
// Reads ~/.psarc-player/config.json (or $PSARC_PLAYER_CONFIG), validates it
// with zod, and fills in defaults. A missing file is not an error.
// ─────────────────────────────────────────────────────────────────────────────

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, join } from "node:path";
import { PlayerConfigSchema, type PlayerConfig } from "./schema.js";

export const CONFIG_ENV_VAR = "PSARC_PLAYER_CONFIG";

/** Config file location: the env override, else under the home directory. */
export function configPath(env: NodeJS.ProcessEnv = process.env): string {
  return env[CONFIG_ENV_VAR] || join(homedir(), ".psarc-player", "config.json");
}

/** Validate raw JSON text. Throws listing every `field: message` issue. */
export function parsePlayerConfig(text: string, source = "config"): PlayerConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new Error(`Invalid ${source}: not valid JSON (${err instanceof Error ? err.message : String(err)})`);
  }
  const result = PlayerConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  ${i.path.join(".") || "root"}: ${i.message}`)
      .join("\n");
    throw new Error(`Invalid ${source}:\n${issues}`);
  }
  return result.data;
}

/** Load the player config. Missing file → all defaults. */
export function loadPlayerConfig(path: string = configPath()): PlayerConfig {
  if (!existsSync(path)) return PlayerConfigSchema.parse({});
  return parsePlayerConfig(readFileSync(path, "utf8"), path);
}

/** Validate and write a config, creating its directory. Returns the saved config. */
export function savePlayerConfig(config: Partial<PlayerConfig>, path: string = configPath()): PlayerConfig {
  const full = PlayerConfigSchema.parse(config);
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, JSON.stringify(full, null, 2) + "\n", "utf8");
  return full;
}
