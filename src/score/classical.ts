// ─── Classical Section ───────────────────────────────────────────────────────
//
// Sustained string triads: one chord per bar, held for the whole bar.
// ─────────────────────────────────────────────────────────────────────────────

import type { MidiEvent } from "../midi/types.js";
import { noteOn, noteOff } from "../midi/events.js";
import { lookupChord } from "./voicing.js";
import { barTimes, type SectionContext } from "./context.js";

const VELOCITY = 100;

export function buildClassical(ctx: SectionContext): MidiEvent[] {
  const events: MidiEvent[] = [];
  const { channel } = ctx.instruments.classical;

  ctx.section.progression.forEach((chordName, i) => {
    const bar = barTimes(ctx, i);
    const pitches = lookupChord(ctx.chords, chordName, ctx.section.style);

    for (const pitch of pitches) {
      events.push(noteOn(bar.start, channel, pitch, VELOCITY));
    }
    for (const pitch of pitches) {
      events.push(noteOff(bar.end, channel, pitch));
    }
  });

  return events;
}
