#!/usr/bin/env node
// ─── psarc-player: CLI Entry Point ──────────────────────────────────────────
//
// Usage:
//   psarc-player                                   # Show help
//   psarc-player list song.psarc                   # List entries
//   psarc-player info song.psarc                   # Header and counts
//   psarc-player songs song.psarc                  # Songs and arrangements
//   psarc-player extract song.psarc <path|hash>    # Extract one entry
//   psarc-player extract-all song.psarc            # Extract everything
//   psarc-player arrangement song.psarc            # Per-level summary
//   psarc-player play song.psarc --arrangement bass  # Scrolling tab
//   psarc-player config                            # Effective config
// ─────────────────────────────────────────────────────────────────────────────

import { mkdirSync, writeFileSync } from "node:fs";
import { basename, dirname, isAbsolute, join, relative } from "node:path";
import { extract } from "./archive/blocks.js";
import { entryName, extractEntry } from "./archive/manifest.js";
import { durationOf, summarizeLevel } from "./arrangement/query.js";
import type { Arrangement } from "./arrangement/types.js";
import { createClockAudioBackend } from "./audio/backends.js";
import { configPath, loadPlayerConfig } from "./config/loader.js";
import {
  DifficultyChoiceSchema,
  resolveDifficulty,
  type DifficultyChoice,
  type PlayerConfig,
} from "./config/schema.js";
import { describeError } from "./errors.js";
import { PlaybackController } from "./playback/controls.js";
import { renderTab } from "./render/tab-view.js";
import {
  findArrangement,
  findSong,
  loadArrangement,
  loadAudio,
  openSongArchive,
  type SongArchive,
} from "./songs/loader.js";
import type { ArrangementRef, SongManifest } from "./songs/types.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

function padRight(s: string, len: number): string {
  return s.length >= len ? s.substring(0, len) : s + " ".repeat(len - s.length);
}

function truncate(s: string, max: number): string {
  return s.length <= max ? s : s.substring(0, max - 1) + "…";
}

function formatSeconds(seconds: number): string {
  const m = Math.floor(seconds / 60);
  const s = Math.floor(seconds % 60);
  return `${m}:${String(s).padStart(2, "0")}`;
}

function getFlag(args: string[], flag: string): string | null {
  const idx = args.indexOf(flag);
  if (idx === -1 || idx + 1 >= args.length) return null;
  return args[idx + 1];
}

/** Check for boolean flag (no value). */
function hasFlag(args: string[], flag: string): boolean {
  return args.includes(flag);
}

function numberFlag(args: string[], flag: string): number | null {
  const raw = getFlag(args, flag);
  if (raw === null) return null;
  const n = Number(raw);
  if (!Number.isFinite(n)) fail(`${flag} expects a number, got "${raw}"`);
  return n;
}

function difficultyFlag(args: string[], fallback: DifficultyChoice): DifficultyChoice {
  const raw = getFlag(args, "--difficulty");
  if (raw === null) return fallback;
  const parsed = DifficultyChoiceSchema.safeParse(raw === "max" ? "max" : Number(raw));
  if (!parsed.success) fail(`--difficulty expects a level number or "max", got "${raw}"`);
  return parsed.data;
}

function fail(message: string): never {
  console.error(message);
  process.exit(1);
}

/** Open the archive named by args[0], run `fn`, and always close it. */
async function withArchive<T>(args: string[], usage: string, fn: (archive: SongArchive) => T | Promise<T>): Promise<T> {
  const file = args[0];
  if (!file) fail(`Usage: ${usage}`);
  const archive = openSongArchive(file);
  try {
    return await fn(archive);
  } finally {
    archive.close();
  }
}

function selectArrangement(archive: SongArchive, args: string[]): { song: SongManifest; ref: ArrangementRef } {
  const songQuery = getFlag(args, "--song") ?? "";
  const song = findSong(archive.resolved, songQuery);
  if (!song) fail(`Song not found: "${songQuery}". Run 'psarc-player songs ${archive.name}' to list them.`);
  const arrQuery = getFlag(args, "--arrangement") ?? "";
  const ref = findArrangement(song, arrQuery);
  if (!ref) fail(`Arrangement not found: "${arrQuery}" in ${song.artist} - ${song.title}`);
  return { song, ref };
}

function printArrangementSummary(song: SongManifest, ref: ArrangementRef, arrangement: Arrangement): void {
  console.log(`\n  ${song.artist} - ${song.title}: ${ref.instrument} (${ref.id})`);
  console.log(`  ${"─".repeat(60)}`);
  console.log(`  Strings:   ${arrangement.stringCount}`);
  console.log(`  Duration:  ${formatSeconds(durationOf(arrangement))}`);
  console.log(`  Beats:     ${arrangement.beats.length}`);
  console.log(`  Phrases:   ${arrangement.phrases.length}`);
  console.log(`  Sections:  ${arrangement.sections.map((s) => `${s.name} ${s.number}`).join(", ") || "(none)"}`);
  console.log(`  Chords:    ${arrangement.chordTemplates.length}`);
  console.log(`\n  ${padRight("Level", 7)}${padRight("Notes", 8)}${padRight("Chord", 8)}${padRight("Held", 7)}${padRight("Linked", 8)}Span`);
  for (const level of arrangement.levels) {
    const s = summarizeLevel(level);
    const span =
      s.firstNoteTime === null || s.lastNoteTime === null
        ? "-"
        : `${s.firstNoteTime.toFixed(2)}s – ${s.lastNoteTime.toFixed(2)}s`;
    console.log(
      `  ${padRight(String(s.levelIndex), 7)}${padRight(String(s.noteCount), 8)}${padRight(String(s.chordNoteCount), 8)}` +
        `${padRight(String(s.sustainedCount), 7)}${padRight(String(s.linkedCount), 8)}${span}`
    );
  }
  console.log();
}

// ─── Commands ───────────────────────────────────────────────────────────────

async function cmdList(args: string[]): Promise<void> {
  await withArchive(args, "psarc-player list <file> [--orphans]", ({ resolved }) => {
    const entries = hasFlag(args, "--orphans") ? resolved.orphans : resolved.index.entries;
    console.log("\n" + padRight("#", 6) + padRight("Size", 12) + padRight("Blocks", 8) + "Path");
    console.log("─".repeat(90));
    for (const e of entries) {
      console.log(
        padRight(String(e.index), 6) +
          padRight(String(e.uncompressedSize), 12) +
          padRight(String(e.blockCount), 8) +
          entryName(resolved, e)
      );
    }
    console.log(`\n${entries.length} entr${entries.length === 1 ? "y" : "ies"}.\n`);
  });
}

async function cmdInfo(args: string[]): Promise<void> {
  await withArchive(args, "psarc-player info <file>", (archive) => {
    const { index, orphans, songs } = archive.resolved;
    const flags = Object.entries(index.flags)
      .filter(([, on]) => on)
      .map(([name]) => name);
    console.log(`\n  ${archive.name}`);
    console.log(`  ${"─".repeat(45)}`);
    console.log(`  Version:      ${index.version.major}.${index.version.minor}`);
    console.log(`  Compression:  ${index.compression}`);
    console.log(`  Block size:   ${index.blockSize}`);
    console.log(`  Flags:        ${flags.join(", ") || "none"}`);
    console.log(`  Entries:      ${index.entries.length}`);
    console.log(`  Blocks:       ${index.blockLengths.length}`);
    console.log(`  Orphans:      ${orphans.length}`);
    console.log(`  Songs:        ${songs.length}\n`);
  });
}

async function cmdSongs(args: string[]): Promise<void> {
  await withArchive(args, "psarc-player songs <file>", ({ resolved }) => {
    if (resolved.songs.length === 0) {
      console.log("\nNo songs found.\n");
      return;
    }
    resolved.songs.forEach((song, i) => {
      const year = song.year === null ? "" : `, ${song.year}`;
      console.log(`\n  ${i + 1}. ${song.artist} - ${song.title}`);
      console.log(`     ${truncate(song.album, 40)}${year}  ${formatSeconds(song.lengthSeconds)}  ${song.averageTempo} BPM  ${song.tuningName}${song.capoFret > 0 ? `  capo ${song.capoFret}` : ""}`);
      song.arrangements.forEach((a, j) => {
        const audio = a.audioEntryPath === null ? "no audio" : "audio";
        console.log(`       ${j + 1}) ${padRight(a.instrument, 8)}${padRight(`${a.difficultyTierCount} levels`, 12)}${audio}`);
      });
    });
    console.log();
  });
}

async function cmdExtract(args: string[], config: PlayerConfig): Promise<void> {
  await withArchive(args, "psarc-player extract <file> <path|hash> [--out FILE]", (archive) => {
    const target = args[1];
    if (!target) fail("Usage: psarc-player extract <file> <path|hash> [--out FILE]");
    const bytes = extractEntry(archive.resolved, target, archive.source);
    const out = getFlag(args, "--out") ?? join(config.exportDir, basename(target));
    mkdirSync(dirname(out), { recursive: true });
    writeFileSync(out, bytes);
    console.log(`  ${target} → ${out} (${bytes.length} bytes)`);
  });
}

async function cmdExtractAll(args: string[], config: PlayerConfig): Promise<void> {
  await withArchive(args, "psarc-player extract-all <file> [--out DIR]", (archive) => {
    const { resolved, source } = archive;
    const outDir = getFlag(args, "--out") ?? join(config.exportDir, basename(archive.name, ".psarc"));
    let written = 0;
    for (const entry of resolved.index.entries) {
      if (entry.index === 0) continue;
      const path = resolved.hashToPath.get(entry.nameHash) ?? join("_orphans", `${entry.nameHash}.bin`);
      const out = join(outDir, path);
      const rel = relative(outDir, out);
      if (rel.startsWith("..") || isAbsolute(rel)) {
        console.error(`  SKIP ${path}: outside ${outDir}`);
        continue;
      }
      mkdirSync(dirname(out), { recursive: true });
      writeFileSync(out, extract(resolved.index, entry, source));
      written++;
    }
    console.log(`  ${written} entries → ${outDir}`);
  });
}

async function cmdArrangement(args: string[]): Promise<void> {
  await withArchive(args, "psarc-player arrangement <file> [--song Q] [--arrangement Q]", (archive) => {
    const { song, ref } = selectArrangement(archive, args);
    printArrangementSummary(song, ref, loadArrangement(archive, ref));
  });
}

async function cmdPlay(args: string[], config: PlayerConfig): Promise<void> {
  await withArchive(
    args,
    "psarc-player play <file> [--song Q] [--arrangement Q] [--difficulty N|max] [--seek S] [--interval MS]",
    async (archive) => {
      const { song, ref } = selectArrangement(archive, args);
      const arrangement = loadArrangement(archive, ref);

      const choice = difficultyFlag(args, config.defaultDifficulty);
      const difficulty = resolveDifficulty(choice, arrangement.levels.length);

      const audio = createClockAudioBackend({ durationSeconds: song.lengthSeconds || durationOf(arrangement) });
      const controller = new PlaybackController(audio, arrangement, { tuning: ref.tuning });
      controller.load(loadAudio(archive, ref) ?? new Uint8Array(0));

      const tabOptions = {
        stringCount: arrangement.stringCount,
        tuning: ref.tuning,
        columns: config.tabColumns,
        lookaheadSeconds: config.lookaheadSeconds,
        showTechniques: config.showTechniques,
      };
      const interactive = process.stdout.isTTY === true;
      controller.on("frame", () => {
        if (!interactive) return;
        const tab = renderTab(controller.sync.snapshot(), controller.sync.upcoming(config.lookaheadSeconds), tabOptions);
        process.stdout.write(`\x1b[H\x1b[2J${song.artist} - ${song.title} (${ref.instrument})\n${tab}\n`);
      });
      controller.on("section", (e) => {
        if (!interactive && e.type === "section") console.log(`  ${e.positionSeconds.toFixed(2)}s  section ${e.section.name} ${e.section.number}`);
      });

      const abort = new AbortController();
      const onSigint = (): void => abort.abort();
      process.once("SIGINT", onSigint);
      try {
        controller.play(difficulty);
        const seek = numberFlag(args, "--seek");
        if (seek !== null) controller.seek(seek);
        await controller.run({
          intervalMs: numberFlag(args, "--interval") ?? config.tickIntervalMs,
          signal: abort.signal,
        });
      } finally {
        process.off("SIGINT", onSigint);
      }
      console.log(`\n  Stopped at ${formatSeconds(controller.positionSeconds)}.`);
    }
  );
}

function cmdConfig(): void {
  const path = configPath();
  console.log(`\n  ${path}\n`);
  console.log(JSON.stringify(loadPlayerConfig(path), null, 2));
  console.log();
}

function cmdHelp(): void {
  console.log(`
psarc-player — Read song archives and play arrangements in time with their audio

Commands:
  list <file> [--orphans]          List archive entries (or only unnamed ones)
  info <file>                      Show header fields and counts
  songs <file>                     List songs and their arrangements
  extract <file> <path|hash>       Extract one entry (--out FILE)
  extract-all <file>               Extract every entry (--out DIR)
  arrangement <file>               Summarize an arrangement per difficulty level
  play <file>                      Play an arrangement as scrolling tablature
  config                           Print the effective configuration
  help                             Show this help

Selection options (arrangement, play):
  --song <n|name>                  Song number from 'songs', or part of "artist - title"
  --arrangement <n|name>           Arrangement number, id, or instrument (lead, bass, ...)

Play options:
  --difficulty <n|max>             Difficulty level (default from config)
  --seek <seconds>                 Start position
  --interval <ms>                  Tick interval (default from config)

Configuration is read from ~/.psarc-player/config.json, or the file named by
PSARC_PLAYER_CONFIG.
`);
}

// ─── CLI Router ─────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0] ?? "help";
  const rest = args.slice(1);

  switch (command) {
    case "list":
      await cmdList(rest);
      break;
    case "info":
      await cmdInfo(rest);
      break;
    case "songs":
      await cmdSongs(rest);
      break;
    case "extract":
      await cmdExtract(rest, loadPlayerConfig());
      break;
    case "extract-all":
      await cmdExtractAll(rest, loadPlayerConfig());
      break;
    case "arrangement":
      await cmdArrangement(rest);
      break;
    case "play":
      await cmdPlay(rest, loadPlayerConfig());
      break;
    case "config":
      cmdConfig();
      break;
    case "help":
    case "--help":
    case "-h":
      cmdHelp();
      break;
    default:
      fail(`Unknown command: "${command}". Run 'psarc-player help' for usage.`);
  }
}

main().catch((err) => {
  console.error(describeError(err));
  process.exit(1);
});
