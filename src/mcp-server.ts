#!/usr/bin/env node
// ─── psarc-player: MCP Server ───────────────────────────────────────────────
//
// Exposes archive inspection and arrangement rendering as MCP tools, so an
// LLM can look inside a song archive, pull files out, and read the tab at
// any moment of a song.
//
// Usage:
//   node dist/mcp-server.js          # stdio transport
//
// Tools:
//   list_entries         entries of an archive with sizes and paths
//   song_info            songs, tunings and arrangements in an archive
//   extract_entry        write one entry to disk
//   arrangement_summary  per-level note counts of one arrangement
//   tab_at               render the tab window at a given time
// ─────────────────────────────────────────────────────────────────────────────

import { mkdirSync, writeFileSync } from "node:fs";
import { basename, dirname, join } from "node:path";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { entryName, extractEntry } from "./archive/manifest.js";
import { durationOf, summarizeLevel } from "./arrangement/query.js";
import { loadPlayerConfig } from "./config/loader.js";
import { DifficultyChoiceSchema, resolveDifficulty } from "./config/schema.js";
import { describeError } from "./errors.js";
import { renderTabAt } from "./render/tab-view.js";
import { findArrangement, findSong, loadArrangement, openSongArchive, type SongArchive } from "./songs/loader.js";
import type { ArrangementRef, SongManifest } from "./songs/types.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

interface ToolResult {
  [key: string]: unknown;
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
}

function textResult(text: string): ToolResult {
  return { content: [{ type: "text", text }] };
}

function errorResult(text: string): ToolResult {
  return { content: [{ type: "text", text }], isError: true };
}

/** Open, run, close. Any thrown error becomes an error result. */
function withArchive(file: string, fn: (archive: SongArchive) => ToolResult): ToolResult {
  let archive: SongArchive;
  try {
    archive = openSongArchive(file);
  } catch (err) {
    return errorResult(`Cannot open ${file}: ${describeError(err)}`);
  }
  try {
    return fn(archive);
  } catch (err) {
    return errorResult(describeError(err));
  } finally {
    archive.close();
  }
}

type Selection = { song: SongManifest; ref: ArrangementRef } | { error: string };

function select(archive: SongArchive, song?: string, arrangement?: string): Selection {
  const s = findSong(archive.resolved, song);
  if (!s) return { error: `Song not found: "${song ?? ""}". Use song_info to list songs.` };
  const ref = findArrangement(s, arrangement);
  if (!ref) return { error: `Arrangement not found: "${arrangement ?? ""}" in ${s.artist} - ${s.title}` };
  return { song: s, ref };
}

const fileParam = z.string().describe("Path to the archive file");
const songParam = z.string().optional().describe("Song number (1-based), key, or part of 'artist - title'. Default: first song");
const arrangementParam = z
  .string()
  .optional()
  .describe("Arrangement number (1-based), id, or instrument (Lead, Rhythm, Combo, Bass). Default: first");

// ─── Server ─────────────────────────────────────────────────────────────────

const server = new McpServer({
  name: "psarc-player",
  version: "0.1.0",
});

// ─── Tool: list_entries ─────────────────────────────────────────────────────

server.tool(
  "list_entries",
  "List the entries of a song archive: index, uncompressed size, and logical path (or name hash for unnamed entries).",
  {
    file: fileParam,
    filter: z.string().optional().describe("Only paths containing this text (case-insensitive)"),
    orphansOnly: z.boolean().optional().describe("Only entries no manifest path names"),
  },
  async ({ file, filter, orphansOnly }) =>
    withArchive(file, ({ resolved }) => {
      const needle = filter?.toLowerCase();
      const entries = (orphansOnly ? resolved.orphans : resolved.index.entries).filter(
        (e) => needle === undefined || entryName(resolved, e).toLowerCase().includes(needle)
      );
      const lines = entries.map((e) => `${e.index}\t${e.uncompressedSize}\t${entryName(resolved, e)}`);
      return textResult(`Found ${entries.length} entr${entries.length === 1 ? "y" : "ies"}:\n\n${lines.join("\n")}`);
    })
);

// ─── Tool: song_info ────────────────────────────────────────────────────────

server.tool(
  "song_info",
  "Describe the songs in an archive: title, artist, album, length, tempo, tuning, and the playable arrangements with their difficulty levels.",
  { file: fileParam },
  async ({ file }) =>
    withArchive(file, ({ resolved }) => {
      if (resolved.songs.length === 0) return textResult("No songs found in this archive.");
      const blocks = resolved.songs.map((song, i) =>
        [
          `# ${i + 1}. ${song.artist} - ${song.title}`,
          `**Album:** ${song.album}${song.year === null ? "" : ` (${song.year})`}`,
          `**Length:** ${song.lengthSeconds.toFixed(1)}s | **Tempo:** ${song.averageTempo} BPM`,
          `**Tuning:** ${song.tuningName} [${song.tuning.join(", ")}]${song.capoFret > 0 ? ` | **Capo:** ${song.capoFret}` : ""}`,
          ``,
          `## Arrangements`,
          ...song.arrangements.map(
            (a, j) =>
              `${j + 1}. ${a.instrument} (${a.id}) — ${a.difficultyTierCount} levels, ${a.audioEntryPath ?? "no audio"}`
          ),
        ].join("\n")
      );
      return textResult(blocks.join("\n\n"));
    })
);

// ─── Tool: extract_entry ────────────────────────────────────────────────────

server.tool(
  "extract_entry",
  "Extract one archive entry, by logical path or 32-digit name hash, and write it to disk. Returns the output path and size.",
  {
    file: fileParam,
    entry: z.string().describe("Logical path (e.g. 'songs/bin/generic/foo_lead.sng') or hex name hash"),
    out: z.string().optional().describe("Output file. Default: the entry's file name under the configured export directory"),
  },
  async ({ file, entry, out }) =>
    withArchive(file, (archive) => {
      const bytes = extractEntry(archive.resolved, entry, archive.source);
      const target = out ?? join(loadPlayerConfig().exportDir, basename(entry));
      mkdirSync(dirname(target), { recursive: true });
      writeFileSync(target, bytes);
      return textResult(`Wrote ${bytes.length} bytes to ${target}`);
    })
);

// ─── Tool: arrangement_summary ──────────────────────────────────────────────

server.tool(
  "arrangement_summary",
  "Decode one arrangement and summarize it: strings, beats, phrases, sections, and note counts per difficulty level.",
  { file: fileParam, song: songParam, arrangement: arrangementParam },
  async ({ file, song, arrangement }) =>
    withArchive(file, (archive) => {
      const picked = select(archive, song, arrangement);
      if ("error" in picked) return errorResult(picked.error);
      const arr = loadArrangement(archive, picked.ref);
      const levels = arr.levels.map((level) => {
        const s = summarizeLevel(level);
        return `- Level ${s.levelIndex}: ${s.noteCount} notes (${s.chordNoteCount} in chords, ${s.sustainedCount} sustained, ${s.linkedCount} linked)`;
      });
      const text = [
        `# ${picked.song.artist} - ${picked.song.title}: ${picked.ref.instrument}`,
        `**Strings:** ${arr.stringCount} | **Duration:** ${durationOf(arr).toFixed(1)}s | **Beats:** ${arr.beats.length}`,
        `**Phrases:** ${arr.phrases.map((p) => p.name).join(", ") || "(none)"}`,
        `**Sections:** ${arr.sections.map((s) => `${s.name} ${s.number}`).join(", ") || "(none)"}`,
        `**Chord templates:** ${arr.chordTemplates.map((c) => c.name).join(", ") || "(none)"}`,
        ``,
        `## Levels`,
        ...levels,
      ].join("\n");
      return textResult(text);
    })
);

// ─── Tool: tab_at ───────────────────────────────────────────────────────────

server.tool(
  "tab_at",
  "Render plain-text tablature for one arrangement at a given time: sounding notes in the first column, upcoming notes to the right.",
  {
    file: fileParam,
    song: songParam,
    arrangement: arrangementParam,
    time: z.number().min(0).describe("Song time in seconds"),
    difficulty: z.union([z.number().int().min(0), z.literal("max")]).optional().describe("Level number or 'max'. Default from config"),
    lookaheadSeconds: z.number().min(0.5).max(30).optional().describe("Seconds of upcoming notes to show"),
  },
  async ({ file, song, arrangement, time, difficulty, lookaheadSeconds }) =>
    withArchive(file, (archive) => {
      const picked = select(archive, song, arrangement);
      if ("error" in picked) return errorResult(picked.error);
      const config = loadPlayerConfig();
      const arr = loadArrangement(archive, picked.ref);
      const choice = DifficultyChoiceSchema.parse(difficulty ?? config.defaultDifficulty);
      const tab = renderTabAt(arr, resolveDifficulty(choice, arr.levels.length), time, {
        tuning: picked.ref.tuning,
        columns: config.tabColumns,
        lookaheadSeconds: lookaheadSeconds ?? config.lookaheadSeconds,
        showTechniques: config.showTechniques,
      });
      return textResult("```\n" + tab + "\n```");
    })
);

// ─── Start ──────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("psarc-player MCP server running on stdio");
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
