// ─── Voicings ────────────────────────────────────────────────────────────────
//
// Chord/bass table lookups for the score builder, plus chord naming for
// pitch sets so voicing tables can be summarized and checked.
//
// Usage:
//   lookupChord(table, "Am", "rock")   // → [45, 52, 57]
//   nameVoicing([45, 52, 57])          // → "A5"
//   nameVoicing([52, 56, 59])          // → "E"
// ─────────────────────────────────────────────────────────────────────────────

import type { BassTable, ChordTable, Style } from "../types.js";

const NOTE_NAMES = ["C", "C#", "D", "D#", "E", "F", "F#", "G", "G#", "A", "A#", "B"];

/** Chord pattern: intervals from root as a sorted set of semitones. */
interface ChordPattern {
  intervals: number[];
  suffix: string;
}

/**
 * Known chord patterns, ordered by priority (simpler chords first).
 * When multiple patterns match, the first match wins.
 */
const PATTERNS: ChordPattern[] = [
  // Triads
  { intervals: [0, 4, 7],     suffix: "" },
  { intervals: [0, 3, 7],     suffix: "m" },
  { intervals: [0, 3, 6],     suffix: "dim" },
  { intervals: [0, 4, 8],     suffix: "aug" },
  { intervals: [0, 5, 7],     suffix: "sus4" },
  { intervals: [0, 2, 7],     suffix: "sus2" },

  // Seventh chords
  { intervals: [0, 4, 7, 11], suffix: "maj7" },
  { intervals: [0, 3, 7, 10], suffix: "m7" },
  { intervals: [0, 4, 7, 10], suffix: "7" },
  { intervals: [0, 3, 6, 10], suffix: "m7b5" },
  { intervals: [0, 3, 6, 9],  suffix: "dim7" },
];

// ─── Lookups ─────────────────────────────────────────────────────────────────

/**
 * Pitches for a chord name. A name missing from the table is a data bug,
 * so this throws instead of returning an empty chord.
 */
export function lookupChord(table: ChordTable, name: string, style: Style): readonly number[] {
  const pitches = Object.hasOwn(table, name) ? table[name] : undefined;
  if (!pitches || pitches.length === 0) {
    throw new Error(`Unknown chord "${name}" in ${style} chord table`);
  }
  return pitches;
}

/** Root letter of a chord name: "Am" → "A", "F#m" → "F". */
export function rootLetter(chordName: string): string {
  return chordName.charAt(0);
}

/** Bass pitch for a chord's root letter. Throws if the root is missing. */
export function lookupBass(table: BassTable, chordName: string): number {
  const root = rootLetter(chordName);
  const pitch = Object.hasOwn(table, root) ? table[root] : undefined;
  if (pitch === undefined) {
    throw new Error(`No bass note for root "${root}" (chord "${chordName}")`);
  }
  return pitch;
}

// ─── Naming ──────────────────────────────────────────────────────────────────

/** Scientific pitch name: 60 → "C4", 33 → "A1". */
export function pitchName(midi: number): string {
  const octave = Math.floor(midi / 12) - 1;
  return `${NOTE_NAMES[midi % 12]}${octave}`;
}

/** Space-separated pitch names, lowest first: "A3 C4 E4". */
export function pitchNames(pitches: readonly number[]): string {
  return [...pitches].sort((a, b) => a - b).map(pitchName).join(" ");
}

/**
 * Name the chord a pitch set forms ("Am", "G", "E5"), or null if no known
 * pattern matches. The bass note is preferred as root; a different bass
 * note on a 3+ note voicing is shown as a slash chord.
 */
export function nameVoicing(pitches: readonly number[]): string | null {
  if (pitches.length < 2) return null;

  const pitchClasses = [...new Set(pitches.map(n => n % 12))].sort((a, b) => a - b);
  if (pitchClasses.length < 2) return null;

  const bassPc = Math.min(...pitches) % 12;

  // Root + fifth only (octave doublings allowed): power chord.
  if (pitchClasses.length === 2) {
    const other = pitchClasses[0] === bassPc ? pitchClasses[1] : pitchClasses[0];
    return (other - bassPc + 12) % 12 === 7 ? `${NOTE_NAMES[bassPc]}5` : null;
  }

  const rootOrder = [bassPc, ...Array.from({ length: 12 }, (_, i) => i).filter(r => r !== bassPc)];

  for (const root of rootOrder) {
    const intervals = pitchClasses.map(pc => (pc - root + 12) % 12);

    for (const pattern of PATTERNS) {
      if (pattern.intervals.every(p => intervals.includes(p))) {
        const name = NOTE_NAMES[root] + pattern.suffix;
        return bassPc !== root ? `${name}/${NOTE_NAMES[bassPc]}` : name;
      }
    }
  }

  return null;
}
