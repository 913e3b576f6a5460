// ─── MIDI Event Types ───────────────────────────────────────────────────────
//
// Types and wire constants for the Standard MIDI File writer.
// Events carry absolute tick positions; delta-times only exist once the
// serializer has sorted the list.
// ─────────────────────────────────────────────────────────────────────────────

/** Timing resolution of every file we write: ticks per quarter note. */
export const TICKS_PER_BEAT = 96;

/** A single timestamped MIDI event, before delta encoding. */
export interface MidiEvent {
  /** Absolute tick position from the start of the piece (>= 0). */
  readonly tick: number;
  /**
   * Exact status + data bytes (or meta-event bytes), without the delta-time.
   * Treat as immutable once the event is created: `readonly` only guards the
   * reference, and the serializer re-checks every byte it writes.
   */
  readonly payload: Uint8Array;
}

/** A tempo change at an absolute tick position. */
export interface TempoChange {
  tick: number;
  /** Microseconds per quarter note (raw MIDI tempo value). */
  microsecondsPerBeat: number;
}

// ─── Status Bytes ────────────────────────────────────────────────────────────

export const NOTE_OFF = 0x80;
export const NOTE_ON = 0x90;
export const POLY_AFTERTOUCH = 0xa0;
export const CONTROL_CHANGE = 0xb0;
export const PROGRAM_CHANGE = 0xc0;
export const CHANNEL_PRESSURE = 0xd0;
export const PITCH_BEND = 0xe0;

export const META = 0xff;
export const META_SET_TEMPO = 0x51;
export const META_END_OF_TRACK = 0x2f;

// ─── Chunk Framing ───────────────────────────────────────────────────────────

export const HEADER_TAG = "MThd";
export const TRACK_TAG = "MTrk";
/** Byte length of the MThd payload (format + track count + division). */
export const HEADER_LENGTH = 6;
/** Only format 0 (single multi-channel track) is written. */
export const SMF_FORMAT = 0;

/** Largest value a 4-byte MIDI variable-length quantity can hold. */
export const MAX_VLQ = 0x0fffffff;

/** Largest tempo the 3-byte set-tempo payload can carry. */
export const MAX_MICROSECONDS_PER_BEAT = 0xffffff;
