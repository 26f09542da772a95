// ─── Real-Time Playback Controls ────────────────────────────────────────────
//
// Binds a Synchronizer to an AudioBackend and turns each AdvanceResult into
// events. External systems (tab view, CLI, MCP) subscribe to playback events
// and react in real time. All state changes flow through here.
// ─────────────────────────────────────────────────────────────────────────────

import { setTimeout as sleep } from "node:timers/promises";
import type { AudioBackend } from "../audio/backends.js";
import type { Arrangement, Beat, NoteEvent, Phrase, Section } from "../arrangement/types.js";
import { describeError } from "../errors.js";
import type { LogFn } from "../songs/metadata.js";
import { midiToNoteName, openStringNotes } from "../songs/tuning.js";
import { Synchronizer, type AdvanceResult, type SyncState } from "./synchronizer.js";

// ─── Event Types ────────────────────────────────────────────────────────────

export type PlaybackEventType =
  | "frame"
  | "noteOn"
  | "noteOff"
  | "beat"
  | "phrase"
  | "section"
  | "stateChange"
  | "regression";

interface PlaybackEventBase {
  type: PlaybackEventType;
  /** Audio position in seconds when this event was emitted. */
  positionSeconds: number;
  state: SyncState;
}

export interface FrameEvent extends PlaybackEventBase {
  type: "frame";
  result: AdvanceResult;
}

export interface NoteOnEvent extends PlaybackEventBase {
  type: "noteOn";
  note: NoteEvent;
  /** MIDI pitch of string + fret under the arrangement's tuning. */
  pitch: number;
  noteName: string;
}

export interface NoteOffEvent extends PlaybackEventBase {
  type: "noteOff";
  note: NoteEvent;
}

export interface BeatEvent extends PlaybackEventBase {
  type: "beat";
  beat: Beat;
}

export interface PhraseEvent extends PlaybackEventBase {
  type: "phrase";
  phrase: Phrase;
}

export interface SectionEvent extends PlaybackEventBase {
  type: "section";
  section: Section;
}

export interface StateChangeEvent extends PlaybackEventBase {
  type: "stateChange";
  previousState: SyncState;
}

export interface RegressionEvent extends PlaybackEventBase {
  type: "regression";
  previousTime: number;
}

export type AnyPlaybackEvent =
  | FrameEvent
  | NoteOnEvent
  | NoteOffEvent
  | BeatEvent
  | PhraseEvent
  | SectionEvent
  | StateChangeEvent
  | RegressionEvent;

export type PlaybackListener = (event: AnyPlaybackEvent) => void;

// ─── Options ────────────────────────────────────────────────────────────────

export interface PlaybackControllerOptions {
  /** Per-string semitone offsets from standard, for note names. */
  tuning?: readonly number[];
  /** Where listener failures are reported. Default: console.error. */
  log?: LogFn;
}

export interface RunOptions {
  /** Milliseconds between ticks. Default: 16. */
  intervalMs?: number;
  signal?: AbortSignal;
}

// ─── PlaybackController ─────────────────────────────────────────────────────

/**
 * Real-time playback controller for one arrangement.
 *
 * - Event listeners (frame, noteOn, noteOff, beat, phrase, section,
 *   stateChange, regression)
 * - Transport (play, pause, resume, seek, stop) applied to audio first,
 *   then to the synchronizer
 * - tick() for callers with their own loop, run() for a timer-driven one
 */
export class PlaybackController {
  readonly sync = new Synchronizer();
  private listeners = new Map<PlaybackEventType | "*", Set<PlaybackListener>>();
  private openNotes: number[] = [];
  private readonly log: LogFn;

  constructor(
    private readonly audio: AudioBackend,
    public readonly arrangement: Arrangement,
    options: PlaybackControllerOptions = {}
  ) {
    this.log = options.log ?? console.error;
    this.openNotes = openStringNotes(options.tuning ?? [], arrangement.stringCount);
  }

  // ─── State Accessors ────────────────────────────────────────────────────

  get state(): SyncState { return this.sync.state; }
  get positionSeconds(): number { return this.sync.time; }
  get difficulty(): number | null { return this.sync.difficulty; }
  get durationSeconds(): number | null { return this.audio.durationSeconds; }

  // ─── Event System ───────────────────────────────────────────────────────

  /** Subscribe to a specific event type or "*" for all events. */
  on(type: PlaybackEventType | "*", listener: PlaybackListener): () => void {
    let set = this.listeners.get(type);
    if (!set) {
      set = new Set();
      this.listeners.set(type, set);
    }
    set.add(listener);
    return () => {
      this.listeners.get(type)?.delete(listener);
    };
  }

  off(type: PlaybackEventType | "*", listener: PlaybackListener): void {
    this.listeners.get(type)?.delete(listener);
  }

  removeAllListeners(): void {
    this.listeners.clear();
  }

  private emit(event: AnyPlaybackEvent): void {
    for (const key of [event.type, "*"] as const) {
      const set = this.listeners.get(key);
      if (!set) continue;
      for (const fn of set) {
        try {
          fn(event);
        } catch (err) {
          // Listener errors don't break playback.
          this.log(`  LISTENER ${event.type}: ${describeError(err)}`);
        }
      }
    }
  }

  private emitStateChange(previousState: SyncState): void {
    if (this.sync.state === previousState) return;
    this.emit({
      type: "stateChange",
      state: this.sync.state,
      previousState,
      positionSeconds: this.sync.time,
    });
  }

  private emitNoteOffs(notes: readonly NoteEvent[]): void {
    for (const note of notes) {
      this.emit({ type: "noteOff", state: this.sync.state, positionSeconds: this.sync.time, note });
    }
  }

  // ─── Playback Controls ──────────────────────────────────────────────────

  /** Hand the audio stream to the backend. */
  load(audioBytes: Uint8Array): void {
    this.audio.load(audioBytes);
  }

  /** Start from 0 at `difficulty`. Throws NoSuchDifficulty before touching audio. */
  play(difficulty: number): void {
    const prev = this.sync.state;
    const sounding = this.sync.snapshot().activeNotes;
    this.sync.start(this.arrangement, difficulty);
    this.emitNoteOffs(sounding);
    this.audio.seek(0);
    this.audio.play();
    this.emitStateChange(prev);
  }

  pause(): void {
    const prev = this.sync.state;
    if (!this.sync.pause()) return;
    this.audio.pause();
    this.emitStateChange(prev);
  }

  resume(): void {
    const prev = this.sync.state;
    if (!this.sync.resume()) return;
    this.audio.play();
    this.emitStateChange(prev);
  }

  /** Seek audio, then the synchronizer. Notes sounding before the jump get noteOff. */
  seek(seconds: number): void {
    this.audio.seek(seconds);
    this.emitNoteOffs(this.sync.seek(seconds));
  }

  setDifficulty(level: number): void {
    this.emitNoteOffs(this.sync.setDifficulty(level));
  }

  stop(): void {
    const prev = this.sync.state;
    this.emitNoteOffs(this.sync.snapshot().activeNotes);
    this.audio.stop();
    this.sync.stop();
    this.emitStateChange(prev);
  }

  /** Read the audio clock once, advance, and emit what happened. */
  tick(): AdvanceResult {
    const result = this.sync.advance(this.audio.currentTime());
    if (this.sync.state === "stopped") return result;

    const base = { state: this.sync.state, positionSeconds: result.time };
    if (result.regressed) {
      this.emit({ ...base, type: "regression", previousTime: result.previousTime });
    }
    for (const note of result.expired) {
      // Struck-and-finished notes get their noteOn first.
      if (result.newlyActive.includes(note)) continue;
      this.emit({ ...base, type: "noteOff", note });
    }
    for (const note of result.newlyActive) {
      const pitch = this.openNotes[note.string] + note.fret;
      this.emit({ ...base, type: "noteOn", note, pitch, noteName: midiToNoteName(pitch) });
      if (result.expired.includes(note)) this.emit({ ...base, type: "noteOff", note });
    }
    for (const beat of result.beatsCrossed) this.emit({ ...base, type: "beat", beat });
    for (const phrase of result.phrasesEntered) this.emit({ ...base, type: "phrase", phrase });
    for (const section of result.sectionsEntered) this.emit({ ...base, type: "section", section });
    this.emit({ ...base, type: "frame", result });
    return result;
  }

  /**
   * Tick on a timer until the audio ends, stop() is called, or the signal
   * aborts. Resolves once the loop has exited and playback is stopped.
   */
  async run(options: RunOptions = {}): Promise<void> {
    const intervalMs = options.intervalMs ?? 16;
    const { signal } = options;
    while (this.sync.state !== "stopped" && !signal?.aborted) {
      this.tick();
      if (this.sync.state === "playing" && !this.audio.isPlaying()) break;
      try {
        await sleep(intervalMs, undefined, { signal });
      } catch (err) {
        if (!signal?.aborted) throw err;
      }
    }
    if (this.sync.state !== "stopped") this.stop();
  }
}

export function createPlaybackController(
  audio: AudioBackend,
  arrangement: Arrangement,
  options?: PlaybackControllerOptions
): PlaybackController {
  return new PlaybackController(audio, arrangement, options);
}
