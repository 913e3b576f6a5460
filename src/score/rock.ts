// ─── Rock Section ────────────────────────────────────────────────────────────
//
// Power chords strummed on 1 and 3, driving quarter-note bass, and two
// drum grooves: a straight eighth-note hat beat for the first half of the
// section, then double-kick sixteenths under a ride for the second half.
// A crash on the downbeat marks the section's arrival.
// ─────────────────────────────────────────────────────────────────────────────

import type { MidiEvent } from "../midi/types.js";
import { noteOn, noteOff } from "../midi/events.js";
import { lookupChord, lookupBass } from "./voicing.js";
import { barTimes, type BarTimes, type SectionContext } from "./context.js";
import { beatsToTicks, BEATS_PER_BAR } from "./timing.js";
import { DRUM } from "./gm.js";

const GUITAR_VELOCITY = 120;
const BASS_VELOCITY = 100;
const KICK_VELOCITY = 127;
const SNARE_VELOCITY = 120;
const HAT_VELOCITY = 90;
const RIDE_VELOCITY = 100;
const CRASH_VELOCITY = 127;

/** Bass notes are cut at 90% of a beat to keep them punchy. */
const BASS_GATE_BEATS = 0.9;

const EIGHTH_BEATS = [0, 0.5, 1, 1.5, 2, 2.5, 3, 3.5];

export function buildRock(ctx: SectionContext): MidiEvent[] {
  const events: MidiEvent[] = [];
  const guitar = ctx.instruments.rock.channel;
  const bass = ctx.instruments.bass.channel;
  const drums = ctx.instruments.drums.channel;
  const { progression, style } = ctx.section;
  const doubleTimeFrom = Math.floor(progression.length / 2);

  progression.forEach((chordName, i) => {
    const bar = barTimes(ctx, i);

    // Guitar: strum on 1, release and re-strum on 3, release at bar end
    const pitches = lookupChord(ctx.chords, chordName, style);
    for (const pitch of pitches) events.push(noteOn(bar.beat1, guitar, pitch, GUITAR_VELOCITY));
    for (const pitch of pitches) events.push(noteOff(bar.beat3, guitar, pitch));
    for (const pitch of pitches) events.push(noteOn(bar.beat3, guitar, pitch, GUITAR_VELOCITY));
    for (const pitch of pitches) events.push(noteOff(bar.end, guitar, pitch));

    // Bass: root on every beat
    const root = lookupBass(ctx.bass, chordName);
    for (const beat of [bar.beat1, bar.beat2, bar.beat3, bar.beat4]) {
      events.push(noteOn(beat, bass, root, BASS_VELOCITY));
      events.push(noteOff(beat + beatsToTicks(BASS_GATE_BEATS), bass, root));
    }

    // Drums
    if (i < doubleTimeFrom) {
      events.push(...straightGroove(bar, drums, i === 0));
    } else {
      events.push(...doubleTimeGroove(bar, drums));
    }
  });

  const firstBar = barTimes(ctx, 0);
  events.push(noteOn(firstBar.start, drums, DRUM.CRASH, CRASH_VELOCITY));

  return events;
}

/** Kick on 1 and 3, snare on 2 and 4, eighth-note hats. */
function straightGroove(bar: BarTimes, channel: number, leaveRoomForCrash: boolean): MidiEvent[] {
  const events = [
    noteOn(bar.beat1, channel, DRUM.KICK, KICK_VELOCITY),
    noteOn(bar.beat2, channel, DRUM.SNARE, SNARE_VELOCITY),
    noteOn(bar.beat3, channel, DRUM.KICK, KICK_VELOCITY),
    noteOn(bar.beat4, channel, DRUM.SNARE, SNARE_VELOCITY),
  ];

  const hats = leaveRoomForCrash ? EIGHTH_BEATS.slice(1) : EIGHTH_BEATS;
  for (const beat of hats) {
    events.push(noteOn(bar.start + beatsToTicks(beat), channel, DRUM.HIHAT_CLOSED, HAT_VELOCITY));
  }
  return events;
}

/** Sixteenth-note kicks, snare on 2 and 4, ride on every beat. */
function doubleTimeGroove(bar: BarTimes, channel: number): MidiEvent[] {
  const events: MidiEvent[] = [];

  const step = beatsToTicks(0.25);
  for (let t = bar.start; t < bar.start + beatsToTicks(BEATS_PER_BAR); t += step) {
    events.push(noteOn(t, channel, DRUM.KICK, KICK_VELOCITY));
  }

  events.push(noteOn(bar.beat2, channel, DRUM.SNARE, SNARE_VELOCITY));
  events.push(noteOn(bar.beat4, channel, DRUM.SNARE, SNARE_VELOCITY));

  for (const beat of [bar.beat1, bar.beat2, bar.beat3, bar.beat4]) {
    events.push(noteOn(beat, channel, DRUM.RIDE, RIDE_VELOCITY));
  }
  return events;
}
