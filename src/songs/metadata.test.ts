import { describe, it, expect, vi } from "vitest";
import { openArchive } from "../archive/index-reader.js";
import { resolvePaths } from "../archive/manifest.js";
import { bufferSource } from "../archive/source.js";
import { buildTestArchive } from "../testing/archive-builder.js";
import {
  AUDIO_PATH,
  BANK_PATH,
  BASS_SNG_PATH,
  LEAD_METADATA_PATH,
  LEAD_SNG_PATH,
  buildSongArchive,
  songArchiveFiles,
} from "../testing/song-fixture.js";
import { isSongMetadataPath, readSongManifests, songAssetPath } from "./metadata.js";

function pathsOf(bytes: Uint8Array) {
  const source = bufferSource(bytes);
  return { source, paths: resolvePaths(openArchive(source), source, vi.fn()) };
}

describe("songAssetPath", () => {
  it("maps a song urn to its arrangement file", () => {
    expect(songAssetPath("urn:application:musicgamesong:test_lead")).toBe("songs/bin/generic/test_lead.sng");
  });

  it("rejects other urns", () => {
    expect(() => songAssetPath("urn:image:dds:cover")).toThrow('unsupported song asset urn "urn:image:dds:cover"');
  });
});

describe("isSongMetadataPath", () => {
  it("matches JSON files under manifests/", () => {
    expect(isSongMetadataPath("Manifests/songs_dlc/x.JSON")).toBe(true);
    expect(isSongMetadataPath("songs/x.json")).toBe(false);
    expect(isSongMetadataPath("manifests/songs_dlc/x.hsan")).toBe(false);
  });
});

describe("readSongManifests", () => {
  it("groups arrangements into songs and resolves asset paths", () => {
    const { source, paths } = pathsOf(buildSongArchive());
    const log = vi.fn();
    const songs = readSongManifests(paths, source, log);

    expect(songs).toEqual([
      {
        key: "test artist - test song",
        title: "Test Song",
        artist: "Test Artist",
        album: "Test Album",
        year: 2001,
        lengthSeconds: 12.5,
        averageTempo: 120,
        tuning: [-2, 0, 0, 0, 0, 0],
        tuningName: "Drop D",
        capoFret: 0,
        sourcePath: LEAD_METADATA_PATH,
        arrangements: [
          {
            id: "LEAD-ID",
            instrument: "Lead",
            difficultyTierCount: 2,
            audioEntryPath: AUDIO_PATH,
            arrangementEntryPath: LEAD_SNG_PATH,
            tuning: [-2, 0, 0, 0, 0, 0],
          },
          {
            id: "BASS-ID",
            instrument: "Bass",
            difficultyTierCount: 2,
            audioEntryPath: null,
            arrangementEntryPath: BASS_SNG_PATH,
            tuning: [0, 0, 0, 0, 0, 0],
          },
        ],
      },
    ]);
    expect(log).toHaveBeenCalledWith(
      `  SKIP ${LEAD_METADATA_PATH}#VOCALS: "Vocals" is not an instrument arrangement`
    );
  });

  it("leaves audio null when the bank is missing", () => {
    const { source, paths } = pathsOf(buildSongArchive({ withoutAudio: true }));
    const [song] = readSongManifests(paths, source, vi.fn());
    expect(song.arrangements[0].audioEntryPath).toBeNull();
  });

  it("keeps an arrangement whose bank cannot be read, without audio", () => {
    const files = songArchiveFiles().map((f) =>
      f.path === BANK_PATH ? { path: BANK_PATH, data: new Uint8Array([0x42, 0x4b, 0x48, 0x44, 0, 0, 0, 0]) } : f
    );
    const { source, paths } = pathsOf(buildTestArchive({ blockSize: 256, files }));
    const log = vi.fn();
    const [song] = readSongManifests(paths, source, log);
    expect(song.arrangements.map((a) => [a.id, a.audioEntryPath])).toEqual([
      ["LEAD-ID", null],
      ["BASS-ID", null],
    ]);
    expect(log).toHaveBeenCalledWith(
      `  NO AUDIO ${LEAD_METADATA_PATH}#LEAD-ID: CorruptEntry: sound bank has no DIDX chunk`
    );
  });

  it("skips an arrangement whose data file is not in the archive", () => {
    const files = songArchiveFiles().filter((f) => f.path !== BASS_SNG_PATH);
    const { source, paths } = pathsOf(buildTestArchive({ blockSize: 256, files }));
    const log = vi.fn();
    const [song] = readSongManifests(paths, source, log);
    expect(song.arrangements.map((a) => a.instrument)).toEqual(["Lead"]);
    expect(log).toHaveBeenCalledWith(
      "  SKIP manifests/songs_dlc_test/test_bass.json#BASS-ID: arrangement songs/bin/generic/test_bass.sng is not in the archive"
    );
  });

  it("skips a metadata file that fails validation", () => {
    const { source, paths } = pathsOf(
      buildTestArchive({ files: [{ path: "manifests/broken.json", data: '{"Entries": 5}' }] })
    );
    const log = vi.fn();
    expect(readSongManifests(paths, source, log)).toEqual([]);
    expect(log).toHaveBeenCalledTimes(1);
    expect(log.mock.calls[0][0]).toMatch(/^ {2}SKIP manifests\/broken\.json: invalid song metadata:/);
  });
});
