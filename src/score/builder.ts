// ─── Score Builder ───────────────────────────────────────────────────────────
//
// Generates the full, unordered event list for a composition:
//   1. Program changes at tick 0 for every part with a program
//   2. A set-tempo meta at the first tick of each section
//   3. Each section's events, from its style's generator
//   4. End-of-Track at the final tick
//
// Events at the same tick are serialized in this emission order.
// ─────────────────────────────────────────────────────────────────────────────

import type { MidiEvent } from "../midi/types.js";
import { programChange, setTempoMicroseconds, endOfTrack } from "../midi/events.js";
import { PARTS, type Composition, type Style } from "../types.js";
import { createSectionContext, type SectionGenerator } from "./context.js";
import { sectionStarts, endTick, tempoMap } from "./timing.js";
import { buildClassical } from "./classical.js";
import { buildReggae } from "./reggae.js";
import { buildRock } from "./rock.js";
import { GENRE_BLEND } from "./composition.js";

const GENERATORS: Record<Style, SectionGenerator> = {
  classical: buildClassical,
  reggae: buildReggae,
  rock: buildRock,
};

// ─── Public API ──────────────────────────────────────────────────────────────

/** Build every event of the composition (unsorted). */
export function buildScore(composition: Composition = GENRE_BLEND): MidiEvent[] {
  const events: MidiEvent[] = [];

  for (const part of PARTS) {
    const { channel, program } = composition.instruments[part];
    if (program !== undefined) {
      events.push(programChange(0, channel, program));
    }
  }

  for (const change of tempoMap(composition)) {
    events.push(setTempoMicroseconds(change.tick, change.microsecondsPerBeat));
  }

  composition.sections.forEach((_, i) => {
    events.push(...buildSection(composition, i));
  });

  events.push(endOfTrack(endTick(composition)));
  return events;
}

/**
 * Build the note events of a single section, placed at its absolute
 * position in the piece. No tempo or program changes are included.
 */
export function buildSection(composition: Composition, index: number): MidiEvent[] {
  const starts = sectionStarts(composition);
  const ctx = createSectionContext(composition, index, starts[index] ?? 0);
  return GENERATORS[ctx.section.style](ctx);
}
