import { describe, it, expect } from "vitest";
import { createClockAudioBackend, createMockAudioBackend } from "./backends.js";

describe("createClockAudioBackend", () => {
  function clock(durationSeconds: number | null = 10) {
    const state = { ms: 0 };
    const audio = createClockAudioBackend({ durationSeconds, now: () => state.ms });
    return { state, audio };
  }

  it("refuses to play before load", () => {
    const { audio } = clock();
    expect(() => audio.play()).toThrow(/^InvalidState/);
    expect(() => audio.seek(1)).toThrow(/^InvalidState/);
  });

  it("moves only while playing", () => {
    const { state, audio } = clock();
    audio.load(new Uint8Array());
    expect(audio.isPlaying()).toBe(false);
    audio.play();
    state.ms = 1500;
    expect(audio.currentTime()).toBe(1.5);
    audio.pause();
    state.ms = 3000;
    expect(audio.currentTime()).toBe(1.5);
    audio.play();
    state.ms = 4000;
    expect(audio.currentTime()).toBe(2.5);
    expect(audio.isPlaying()).toBe(true);
  });

  it("seeks while playing and stops at the end", () => {
    const { state, audio } = clock();
    audio.load(new Uint8Array());
    audio.play();
    state.ms = 1000;
    audio.seek(9);
    expect(audio.currentTime()).toBe(9);
    state.ms = 3000;
    expect(audio.currentTime()).toBe(10);
    expect(audio.isPlaying()).toBe(false);
  });

  it("clamps seek targets", () => {
    const { audio } = clock();
    audio.load(new Uint8Array());
    audio.seek(-3);
    expect(audio.currentTime()).toBe(0);
    audio.seek(50);
    expect(audio.currentTime()).toBe(10);
  });

  it("runs without a known duration", () => {
    const { state, audio } = clock(null);
    audio.load(new Uint8Array());
    audio.play();
    state.ms = 600_000;
    expect(audio.currentTime()).toBe(600);
    expect(audio.isPlaying()).toBe(true);
    expect(audio.durationSeconds).toBeNull();
  });

  it("rewinds on stop", () => {
    const { state, audio } = clock();
    audio.load(new Uint8Array());
    audio.play();
    state.ms = 2000;
    audio.stop();
    expect(audio.currentTime()).toBe(0);
    expect(audio.isPlaying()).toBe(false);
  });
});

describe("createMockAudioBackend", () => {
  it("records calls and follows setTime", () => {
    const audio = createMockAudioBackend(5);
    audio.load(new Uint8Array([7]));
    audio.play();
    audio.setTime(4);
    expect(audio.isPlaying()).toBe(true);
    audio.setTime(5);
    expect(audio.isPlaying()).toBe(false);
    audio.seek(1);
    audio.stop();
    expect(audio.calls).toEqual(["load", "play", "seek", "stop"]);
    expect(audio.currentTime()).toBe(0);
    expect(audio.loadedBytes).toEqual(new Uint8Array([7]));
  });
});
