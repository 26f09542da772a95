// ─── Audio Backends ─────────────────────────────────────────────────────────
//
// The synchronizer never touches audio itself; it is fed the position an
// AudioBackend reports. Two backends ship here:
//
//   clock: a wall clock that behaves like a player (play, pause, seek) but
//           produces no sound. The CLI runs on this.
//   mock:  a manual clock. Tests set the time; calls are recorded.
//
// Usage:
//   const audio = createClockAudioBackend({ durationSeconds: 212.4 });
//   audio.load(wemBytes);
//   audio.play();
//   sync.advance(audio.currentTime());
// ─────────────────────────────────────────────────────────────────────────────

import { PlaybackError } from "../errors.js";

export interface AudioBackend {
  /**
   * Take ownership of the encoded stream. Resets position to 0. Backends
   * with no sound output ignore the stream.
   */
  load(bytes: Uint8Array): void;
  play(): void;
  pause(): void;
  seek(seconds: number): void;
  stop(): void;
  /** Stream position in seconds. */
  currentTime(): number;
  isPlaying(): boolean;
  /** Length of the loaded stream, or null when unknown. */
  readonly durationSeconds: number | null;
}

export interface ClockBackendOptions {
  /** Reported length; playback stops there. */
  durationSeconds?: number | null;
  /** Millisecond clock. Default: performance.now. */
  now?: () => number;
}

/** Wall-clock backend with no audio output; `load()` discards the bytes. */
export function createClockAudioBackend(options: ClockBackendOptions = {}): AudioBackend {
  const now = options.now ?? (() => performance.now());
  const duration = options.durationSeconds ?? null;
  let loaded = false;
  /** Position when the clock last stopped moving. */
  let baseSeconds = 0;
  /** now() at the last play(), or null while not playing. */
  let startedAt: number | null = null;

  const clamp = (t: number): number => (duration === null ? t : Math.min(t, duration));

  function position(): number {
    if (startedAt === null) return baseSeconds;
    return clamp(baseSeconds + (now() - startedAt) / 1000);
  }

  function requireLoaded(op: string): void {
    if (!loaded) throw new PlaybackError("InvalidState", `${op} before load()`);
  }

  return {
    get durationSeconds() {
      return duration;
    },
    load() {
      loaded = true;
      baseSeconds = 0;
      startedAt = null;
    },
    play() {
      requireLoaded("play");
      if (startedAt === null) startedAt = now();
    },
    pause() {
      baseSeconds = position();
      startedAt = null;
    },
    seek(seconds) {
      requireLoaded("seek");
      baseSeconds = clamp(Math.max(0, seconds));
      if (startedAt !== null) startedAt = now();
    },
    stop() {
      baseSeconds = 0;
      startedAt = null;
    },
    currentTime: position,
    isPlaying() {
      return startedAt !== null && (duration === null || position() < duration);
    },
  };
}

export type MockAudioCall = "load" | "play" | "pause" | "seek" | "stop";

export interface MockAudioBackend extends AudioBackend {
  /** Set the position the next currentTime() returns. */
  setTime(seconds: number): void;
  /** Operations received, in order. */
  readonly calls: MockAudioCall[];
  /** Bytes handed to the last load(). */
  readonly loadedBytes: Uint8Array | null;
}

/** Manually driven backend for tests. */
export function createMockAudioBackend(durationSeconds: number | null = null): MockAudioBackend {
  const calls: MockAudioCall[] = [];
  let time = 0;
  let playing = false;
  let loadedBytes: Uint8Array | null = null;

  return {
    calls,
    get durationSeconds() {
      return durationSeconds;
    },
    get loadedBytes() {
      return loadedBytes;
    },
    setTime(seconds) {
      time = seconds;
    },
    load(bytes) {
      calls.push("load");
      loadedBytes = bytes;
      time = 0;
    },
    play() {
      calls.push("play");
      playing = true;
    },
    pause() {
      calls.push("pause");
      playing = false;
    },
    seek(seconds) {
      calls.push("seek");
      time = seconds;
    },
    stop() {
      calls.push("stop");
      playing = false;
      time = 0;
    },
    currentTime: () => time,
    isPlaying: () => playing && (durationSeconds === null || time < durationSeconds),
  };
}
