// ─── Note Techniques ────────────────────────────────────────────────────────

/** Bit assignments of `NoteEvent.techniques`. */
export const TECHNIQUES = {
  bend: 1 << 0,
  slide: 1 << 1,
  unpitchedSlide: 1 << 2,
  hammerOn: 1 << 3,
  pullOff: 1 << 4,
  harmonic: 1 << 5,
  pinchHarmonic: 1 << 6,
  palmMute: 1 << 7,
  mute: 1 << 8,
  vibrato: 1 << 9,
  tremolo: 1 << 10,
  tap: 1 << 11,
  slap: 1 << 12,
  pop: 1 << 13,
  accent: 1 << 14,
  linkNext: 1 << 15,
} as const;

export type Technique = keyof typeof TECHNIQUES;

const TECHNIQUE_LIST = Object.keys(TECHNIQUES).filter((k): k is Technique => k in TECHNIQUES);

export function hasTechnique(mask: number, technique: Technique): boolean {
  return (mask & TECHNIQUES[technique]) !== 0;
}

/** Names of the set bits, in bit order. */
export function techniqueNames(mask: number): Technique[] {
  return TECHNIQUE_LIST.filter((t) => hasTechnique(mask, t));
}

/** Combine technique names into a mask. */
export function techniqueMask(...techniques: Technique[]): number {
  return techniques.reduce((mask, t) => mask | TECHNIQUES[t], 0);
}
