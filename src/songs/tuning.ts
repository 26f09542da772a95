// ─── Tunings ────────────────────────────────────────────────────────────────
//
// Tunings are stored as a semitone offset per string relative to standard
// (E A D G B E for guitar, E A D G for bass), low string first.
// ─────────────────────────────────────────────────────────────────────────────

/** MIDI note of each open string in standard tuning, low string first. */
export const GUITAR_STANDARD = [40, 45, 50, 55, 59, 64] as const;
export const BASS_STANDARD = [28, 33, 38, 43] as const;

const NAMED_TUNINGS: Array<{ name: string; offsets: number[] }> = [
  { name: "E Standard", offsets: [0, 0, 0, 0, 0, 0] },
  { name: "Drop D", offsets: [-2, 0, 0, 0, 0, 0] },
  { name: "Eb Standard", offsets: [-1, -1, -1, -1, -1, -1] },
  { name: "Drop C#", offsets: [-3, -1, -1, -1, -1, -1] },
  { name: "D Standard", offsets: [-2, -2, -2, -2, -2, -2] },
  { name: "Drop C", offsets: [-4, -2, -2, -2, -2, -2] },
  { name: "C# Standard", offsets: [-3, -3, -3, -3, -3, -3] },
  { name: "C Standard", offsets: [-4, -4, -4, -4, -4, -4] },
  { name: "Open G", offsets: [-2, -2, 0, 0, 0, -2] },
  { name: "Open D", offsets: [-2, 0, 0, -1, -2, -2] },
  { name: "DADGAD", offsets: [-2, 0, 0, 0, -2, -2] },
];

/**
 * Name a tuning, or "Custom". Only the strings present are compared, so a
 * four-string bass tuning matches on its first four offsets.
 */
export function tuningName(offsets: readonly number[]): string {
  for (const t of NAMED_TUNINGS) {
    if (offsets.every((o, i) => t.offsets[i] === o)) return t.name;
  }
  return "Custom";
}

/** Same naming as MIDI note names elsewhere: C4 = 60. */
export function midiToNoteName(midi: number): string {
  const noteNames = ["C", "C#", "D", "D#", "E", "F", "F#", "G", "G#", "A", "A#", "B"];
  const octave = Math.floor(midi / 12) - 1;
  return `${noteNames[((midi % 12) + 12) % 12]}${octave}`;
}

/**
 * Open-string MIDI notes for a tuning, low string first.
 * Four or fewer strings are treated as bass.
 */
export function openStringNotes(offsets: readonly number[], stringCount: number): number[] {
  const base: readonly number[] = stringCount <= 4 ? BASS_STANDARD : GUITAR_STANDARD;
  const notes: number[] = [];
  for (let s = 0; s < stringCount; s++) {
    // Strings past the standard set continue in fourths above the highest.
    const open = s < base.length ? base[s] : base[base.length - 1] + 5 * (s - base.length + 1);
    notes.push(open + (offsets[s] ?? 0));
  }
  return notes;
}
