// ─── Section Context ─────────────────────────────────────────────────────────
//
// What a style's pattern generator sees: its section, where it starts, and
// the tables and instruments of the composition.
// ─────────────────────────────────────────────────────────────────────────────

import type { MidiEvent } from "../midi/types.js";
import type { BassTable, ChordTable, Composition, Instrument, Part, SectionDefinition } from "../types.js";
import { beatsToTicks, BEATS_PER_BAR } from "./timing.js";

export interface SectionContext {
  readonly section: SectionDefinition;
  /** Absolute tick of the section's first bar. */
  readonly startTick: number;
  /** Chord table for this section's style. */
  readonly chords: ChordTable;
  readonly bass: BassTable;
  readonly instruments: Readonly<Record<Part, Instrument>>;
}

/** A style's pattern generator: section in, unordered events out. */
export type SectionGenerator = (ctx: SectionContext) => MidiEvent[];

/** Absolute ticks of a bar's start and its four beats. */
export interface BarTimes {
  start: number;
  beat1: number;
  beat2: number;
  beat3: number;
  beat4: number;
  /** First tick of the following bar. */
  end: number;
}

export function createSectionContext(
  composition: Composition,
  sectionIndex: number,
  startTick: number,
): SectionContext {
  const section = composition.sections[sectionIndex];
  if (!section) {
    throw new RangeError(
      `Section index ${sectionIndex} out of range (composition has ${composition.sections.length})`,
    );
  }
  return {
    section,
    startTick,
    chords: composition.chords[section.style],
    bass: composition.bass,
    instruments: composition.instruments,
  };
}

export function barTimes(ctx: SectionContext, barIndex: number): BarTimes {
  const start = ctx.startTick + beatsToTicks(BEATS_PER_BAR * barIndex);
  return {
    start,
    beat1: start + beatsToTicks(0),
    beat2: start + beatsToTicks(1),
    beat3: start + beatsToTicks(2),
    beat4: start + beatsToTicks(3),
    end: start + beatsToTicks(BEATS_PER_BAR),
  };
}
