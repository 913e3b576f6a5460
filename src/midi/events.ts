// ─── MIDI Event Factories ───────────────────────────────────────────────────
//
// Build MidiEvent values with range-checked channel/data bytes.
//
// Usage:
//   noteOn(0, 0, 57, 100)     // Note On, channel 1, A3, velocity 100
//   setTempo(3072, 80)        // FF 51 03 0B 71 B0
//   endOfTrack(9216)          // FF 2F 00
// ─────────────────────────────────────────────────────────────────────────────

import {
  NOTE_ON,
  NOTE_OFF,
  PROGRAM_CHANGE,
  META,
  META_SET_TEMPO,
  META_END_OF_TRACK,
  MAX_MICROSECONDS_PER_BEAT,
  type MidiEvent,
} from "./types.js";

/** Release velocity used when none is given. */
export const DEFAULT_RELEASE_VELOCITY = 64;

// ─── Validation ──────────────────────────────────────────────────────────────

/** Throw unless `value` is an integer in 0–127. */
export function assertDataByte(value: number, label: string): void {
  if (!Number.isInteger(value) || value < 0 || value > 127) {
    throw new RangeError(`${label} must be an integer in 0-127, got ${value}`);
  }
}

/** Throw unless `channel` is an integer in 0–15. */
export function assertChannel(channel: number): void {
  if (!Number.isInteger(channel) || channel < 0 || channel > 15) {
    throw new RangeError(`MIDI channel must be an integer in 0-15, got ${channel}`);
  }
}

// ─── Factories ───────────────────────────────────────────────────────────────

/**
 * Create an event from raw bytes. The tick must be a non-negative integer;
 * the payload is copied so later mutation of the input cannot leak in.
 */
export function createEvent(tick: number, payload: ArrayLike<number>): MidiEvent {
  if (!Number.isSafeInteger(tick) || tick < 0) {
    throw new RangeError(`Event tick must be a non-negative integer, got ${tick}`);
  }
  return { tick, payload: Uint8Array.from(payload) };
}

export function noteOn(tick: number, channel: number, pitch: number, velocity: number): MidiEvent {
  assertChannel(channel);
  assertDataByte(pitch, "Pitch");
  assertDataByte(velocity, "Velocity");
  return createEvent(tick, [NOTE_ON | channel, pitch, velocity]);
}

export function noteOff(
  tick: number,
  channel: number,
  pitch: number,
  velocity: number = DEFAULT_RELEASE_VELOCITY,
): MidiEvent {
  assertChannel(channel);
  assertDataByte(pitch, "Pitch");
  assertDataByte(velocity, "Velocity");
  return createEvent(tick, [NOTE_OFF | channel, pitch, velocity]);
}

export function programChange(tick: number, channel: number, program: number): MidiEvent {
  assertChannel(channel);
  assertDataByte(program, "Program");
  return createEvent(tick, [PROGRAM_CHANGE | channel, program]);
}

/**
 * Microseconds per quarter note for a BPM value, truncated to an integer.
 * 90 BPM → 666666, 120 BPM → 500000.
 */
export function bpmToMicroseconds(bpm: number): number {
  if (!Number.isFinite(bpm) || bpm <= 0) {
    throw new RangeError(`Tempo must be a positive number of BPM, got ${bpm}`);
  }
  return Math.trunc(60_000_000 / bpm);
}

/** Set-tempo meta event from a raw microseconds-per-quarter value. */
export function setTempoMicroseconds(tick: number, microsecondsPerBeat: number): MidiEvent {
  if (
    !Number.isInteger(microsecondsPerBeat) ||
    microsecondsPerBeat <= 0 ||
    microsecondsPerBeat > MAX_MICROSECONDS_PER_BEAT
  ) {
    throw new RangeError(
      `Tempo must be 1-${MAX_MICROSECONDS_PER_BEAT} microseconds per beat, got ${microsecondsPerBeat}`,
    );
  }
  return createEvent(tick, [
    META, META_SET_TEMPO, 0x03,
    (microsecondsPerBeat >> 16) & 0xff,
    (microsecondsPerBeat >> 8) & 0xff,
    microsecondsPerBeat & 0xff,
  ]);
}

/** Set-tempo meta event (FF 51 03 tt tt tt) for a BPM value. */
export function setTempo(tick: number, bpm: number): MidiEvent {
  return setTempoMicroseconds(tick, bpmToMicroseconds(bpm));
}

/** End-of-Track meta event (FF 2F 00). */
export function endOfTrack(tick: number): MidiEvent {
  return createEvent(tick, [META, META_END_OF_TRACK, 0x00]);
}

/** True if the payload is an End-of-Track meta event. */
export function isEndOfTrack(event: MidiEvent): boolean {
  const p = event.payload;
  return p.length === 3 && p[0] === META && p[1] === META_END_OF_TRACK && p[2] === 0x00;
}
