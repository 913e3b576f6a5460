// ─── genre-blend: Core Types ────────────────────────────────────────────────
//
// A composition is static authored data: per-style chord tables, a bass
// table, instrument assignments, and an ordered list of sections. The score
// builder turns it into MIDI events; nothing here is mutated after load.
// ─────────────────────────────────────────────────────────────────────────────

// ─── Enums ──────────────────────────────────────────────────────────────────

/** Section styles, each with its own pattern generator and chord table. */
export const STYLES = ["classical", "reggae", "rock"] as const;
export type Style = (typeof STYLES)[number];

/**
 * Instrument parts. Program changes are emitted at tick 0 in this order
 * for every part that names a program.
 */
export const PARTS = ["classical", "reggae", "bass", "rock", "drums"] as const;
export type Part = (typeof PARTS)[number];

/** Styles whose generator plays the bass part. */
export const BASS_STYLES: readonly Style[] = ["reggae", "rock"];

// ─── Tables ─────────────────────────────────────────────────────────────────

/** Chord name → ordered MIDI pitches, e.g. { Am: [57, 60, 64] }. */
export type ChordTable = Readonly<Record<string, readonly number[]>>;

/** Root letter → single low-octave bass pitch, e.g. { A: 33 }. */
export type BassTable = Readonly<Record<string, number>>;

// ─── Composition ────────────────────────────────────────────────────────────

/** A MIDI channel assignment, with an optional General MIDI program. */
export interface Instrument {
  /** MIDI channel (0–15). 9 is the GM percussion channel. */
  readonly channel: number;
  /** GM program number (0–127). Omitted for the drum kit. */
  readonly program?: number;
}

/** One contiguous section; each progression entry lasts one bar. */
export interface SectionDefinition {
  readonly style: Style;
  /** Tempo in BPM, applied at the section's first tick. */
  readonly bpm: number;
  readonly progression: readonly string[];
}

export interface Composition {
  readonly title: string;
  readonly sections: readonly SectionDefinition[];
  readonly chords: Readonly<Record<Style, ChordTable>>;
  readonly bass: BassTable;
  readonly instruments: Readonly<Record<Part, Instrument>>;
}

/** Summary of a written file, reported by the CLI. */
export interface WriteResult {
  path: string;
  /** File size in bytes. */
  bytes: number;
  /** Number of events in the track, End-of-Track included. */
  events: number;
}
