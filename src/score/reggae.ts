// ─── Reggae Section ──────────────────────────────────────────────────────────
//
// One-drop feel:
//   bass   — root on beats 1 and 3, one beat long
//   organ  — chord stabs on beats 2 and 4, half a beat long
//   drums  — closed hat on the off-beat eighths, kick + snare on beat 3
//
// The section's last bar drops the beat-4 stab and the final hat to make
// room for a snare/low-tom fill into the next section.
// ─────────────────────────────────────────────────────────────────────────────

import type { MidiEvent } from "../midi/types.js";
import { noteOn, noteOff } from "../midi/events.js";
import { lookupChord, lookupBass } from "./voicing.js";
import { barTimes, type SectionContext } from "./context.js";
import { beatsToTicks } from "./timing.js";
import { DRUM } from "./gm.js";

const BASS_VELOCITY = 100;
const STAB_VELOCITY = 90;
const HAT_VELOCITY = 80;
const DROP_VELOCITY = 100;
const FILL_VELOCITY = 110;

/** Off-beat eighths, in beats from the bar start. */
const HAT_BEATS = [0.5, 1.5, 2.5, 3.5];

export function buildReggae(ctx: SectionContext): MidiEvent[] {
  const events: MidiEvent[] = [];
  const organ = ctx.instruments.reggae.channel;
  const bass = ctx.instruments.bass.channel;
  const drums = ctx.instruments.drums.channel;
  const { progression, style } = ctx.section;

  progression.forEach((chordName, i) => {
    const bar = barTimes(ctx, i);
    const lastBar = i === progression.length - 1;

    // Bass
    const root = lookupBass(ctx.bass, chordName);
    for (const beat of [bar.beat1, bar.beat3]) {
      events.push(noteOn(beat, bass, root, BASS_VELOCITY));
      events.push(noteOff(beat + beatsToTicks(1), bass, root));
    }

    // Skank
    const pitches = lookupChord(ctx.chords, chordName, style);
    const stabs = lastBar ? [bar.beat2] : [bar.beat2, bar.beat4];
    for (const beat of stabs) {
      for (const pitch of pitches) {
        events.push(noteOn(beat, organ, pitch, STAB_VELOCITY));
        events.push(noteOff(beat + beatsToTicks(0.5), organ, pitch));
      }
    }

    // Drums
    const hats = lastBar ? HAT_BEATS.slice(0, -1) : HAT_BEATS;
    for (const beat of hats) {
      events.push(noteOn(bar.start + beatsToTicks(beat), drums, DRUM.HIHAT_CLOSED, HAT_VELOCITY));
    }
    events.push(noteOn(bar.beat3, drums, DRUM.KICK, DROP_VELOCITY));
    events.push(noteOn(bar.beat3, drums, DRUM.SNARE, DROP_VELOCITY));

    if (lastBar) {
      events.push(noteOn(bar.beat4, drums, DRUM.SNARE, FILL_VELOCITY));
      events.push(noteOn(bar.beat4 + beatsToTicks(0.5), drums, DRUM.TOM_LOW, FILL_VELOCITY));
    }
  });

  return events;
}
