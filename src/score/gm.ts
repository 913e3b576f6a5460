// ─── General MIDI Constants ─────────────────────────────────────────────────

/** GM program numbers (0-based) used by the built-in composition. */
export const GM_PROGRAM = {
  STRING_ENSEMBLE_1: 48,
  DRAWBAR_ORGAN: 16,
  ELECTRIC_BASS_FINGER: 33,
  DISTORTION_GUITAR: 30,
} as const;

/** GM percussion channel (channel 10, zero-based 9). */
export const DRUM_CHANNEL = 9;

/** GM percussion key map (channel 10). */
export const DRUM = {
  KICK: 36,
  SNARE: 38,
  TOM_LOW: 41,
  HIHAT_CLOSED: 42,
  CRASH: 49,
  RIDE: 51,
} as const;
