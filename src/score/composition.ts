// ─── Genre Blend ─────────────────────────────────────────────────────────────
//
// The built-in composition: 8 bars each of classical strings, a reggae
// one-drop, and rock, all over an A-minor Am–G–F–E cycle.
// ─────────────────────────────────────────────────────────────────────────────

import type { ChordTable, Composition } from "../types.js";
import { GM_PROGRAM, DRUM_CHANNEL } from "./gm.js";

// Mid-range string triads
const CLASSICAL_CHORDS: ChordTable = {
  Am: [57, 60, 64], // A3 C4 E4
  G: [55, 59, 62],  // G3 B3 D4
  F: [53, 57, 60],  // F3 A3 C4
  E: [52, 56, 59],  // E3 G#3 B3
};

// Same voicings; E minor for bar 4, E major kept for the turnaround
const REGGAE_CHORDS: ChordTable = {
  ...CLASSICAL_CHORDS,
  Em: [52, 55, 59], // E3 G3 B3
};

// Power chords: root, fifth, octave
const ROCK_CHORDS: ChordTable = {
  Am: [45, 52, 57], // A2 E3 A3
  G: [43, 50, 55],
  F: [41, 48, 53],
  E: [40, 47, 52],
};

export const GENRE_BLEND: Composition = {
  title: "Genre Blend",
  sections: [
    { style: "classical", bpm: 90, progression: ["Am", "G", "F", "E", "Am", "G", "F", "E"] },
    { style: "reggae", bpm: 80, progression: ["Am", "G", "F", "Em", "Am", "G", "F", "E"] },
    { style: "rock", bpm: 120, progression: ["Am", "G", "F", "E", "Am", "G", "F", "E"] },
  ],
  chords: {
    classical: CLASSICAL_CHORDS,
    reggae: REGGAE_CHORDS,
    rock: ROCK_CHORDS,
  },
  bass: { A: 33, G: 31, F: 29, E: 28 },
  instruments: {
    classical: { channel: 0, program: GM_PROGRAM.STRING_ENSEMBLE_1 },
    reggae: { channel: 1, program: GM_PROGRAM.DRAWBAR_ORGAN },
    bass: { channel: 2, program: GM_PROGRAM.ELECTRIC_BASS_FINGER },
    rock: { channel: 4, program: GM_PROGRAM.DISTORTION_GUITAR },
    drums: { channel: DRUM_CHANNEL },
  },
};

/** Default output path for the CLI. */
export const DEFAULT_OUTPUT = "genre_blend.mid";
