// ─── Standard MIDI File Writer ──────────────────────────────────────────────
//
// Turns an unordered list of absolute-tick events into a format 0 SMF:
//
//   MThd | len=6 | format=0 | tracks=1 | division
//   MTrk | len   | (delta-VLQ, payload)*  ... FF 2F 00
//
// Nothing is written unless every event passes validation, so a bad event
// list never yields a truncated or malformed file.
// ─────────────────────────────────────────────────────────────────────────────

import {
  TICKS_PER_BEAT,
  HEADER_TAG,
  TRACK_TAG,
  HEADER_LENGTH,
  SMF_FORMAT,
  NOTE_OFF,
  NOTE_ON,
  POLY_AFTERTOUCH,
  CONTROL_CHANGE,
  PROGRAM_CHANGE,
  CHANNEL_PRESSURE,
  PITCH_BEND,
  META,
  type MidiEvent,
} from "./types.js";
import { encodeVariableLength, decodeVariableLength } from "./vlq.js";
import { isEndOfTrack } from "./events.js";

export interface SerializeOptions {
  /** Division written to the header (ticks per quarter note). Default 96. */
  ticksPerBeat?: number;
}

// ─── Public API ──────────────────────────────────────────────────────────────

/**
 * Serialize an event list into a complete Standard MIDI File.
 * The input is not modified; it is sorted into a copy first.
 */
export function serializeMidi(
  events: readonly MidiEvent[],
  options: SerializeOptions = {},
): Uint8Array {
  const ticksPerBeat = options.ticksPerBeat ?? TICKS_PER_BEAT;
  const header = buildHeaderChunk(ticksPerBeat);
  const track = buildTrackChunk(encodeTrack(sortEvents(events)));
  return concatBytes([header, track]);
}

/**
 * Stable ascending sort by tick. Events sharing a tick keep their
 * relative input order.
 */
export function sortEvents(events: readonly MidiEvent[]): MidiEvent[] {
  return [...events].sort((a, b) => a.tick - b.tick);
}

/**
 * Encode sorted events into a track body (delta-time + payload pairs).
 *
 * Throws on a negative delta, on an invalid payload, or when the list
 * does not end with exactly one End-of-Track event.
 */
export function encodeTrack(sorted: readonly MidiEvent[]): Uint8Array {
  assertEndOfTrack(sorted);

  const body: number[] = [];
  let lastTick = 0;

  sorted.forEach((event, index) => {
    const delta = event.tick - lastTick;
    if (delta < 0) {
      throw new Error(
        `Negative delta-time ${delta} at event ${index} (tick ${event.tick} after tick ${lastTick})`,
      );
    }
    validatePayload(event.payload, index);
    body.push(...encodeVariableLength(delta));
    for (const byte of event.payload) body.push(byte);
    lastTick = event.tick;
  });

  return Uint8Array.from(body);
}

/** 14-byte MThd chunk for a single-track format 0 file. */
export function buildHeaderChunk(ticksPerBeat: number = TICKS_PER_BEAT): Uint8Array {
  if (!Number.isInteger(ticksPerBeat) || ticksPerBeat < 1 || ticksPerBeat > 0x7fff) {
    throw new RangeError(`Division must be 1-32767 ticks per beat, got ${ticksPerBeat}`);
  }

  const chunk = new Uint8Array(8 + HEADER_LENGTH);
  const view = new DataView(chunk.buffer);
  writeTag(chunk, 0, HEADER_TAG);
  view.setUint32(4, HEADER_LENGTH);
  view.setUint16(8, SMF_FORMAT);
  view.setUint16(10, 1);
  view.setUint16(12, ticksPerBeat);
  return chunk;
}

/** MTrk chunk: tag, 32-bit big-endian body length, body. */
export function buildTrackChunk(body: Uint8Array): Uint8Array {
  const chunk = new Uint8Array(8 + body.length);
  writeTag(chunk, 0, TRACK_TAG);
  new DataView(chunk.buffer).setUint32(4, body.length);
  chunk.set(body, 8);
  return chunk;
}

// ─── Internal: Validation ────────────────────────────────────────────────────

/** Data-byte count that follows each channel-voice status nibble. */
const CHANNEL_DATA_LENGTH: Readonly<Partial<Record<number, number>>> = {
  [NOTE_OFF]: 2,
  [NOTE_ON]: 2,
  [POLY_AFTERTOUCH]: 2,
  [CONTROL_CHANGE]: 2,
  [PROGRAM_CHANGE]: 1,
  [CHANNEL_PRESSURE]: 1,
  [PITCH_BEND]: 2,
};

function validatePayload(payload: Uint8Array, index: number): void {
  if (payload.length === 0) {
    throw new Error(`Event ${index} has an empty payload`);
  }

  const status = payload[0];

  const dataLength = CHANNEL_DATA_LENGTH[status & 0xf0];
  if (dataLength !== undefined) {
    const expected = 1 + dataLength;
    if (payload.length !== expected) {
      throw new Error(
        `Event ${index}: status 0x${hex(status)} needs ${expected} bytes, got ${payload.length}`,
      );
    }
    for (let i = 1; i < payload.length; i++) {
      if (payload[i] > 0x7f) {
        throw new RangeError(
          `Event ${index}: data byte ${payload[i]} out of range 0-127`,
        );
      }
    }
    return;
  }

  if (status === META) {
    if (payload.length < 3) {
      throw new Error(`Event ${index}: meta event is too short`);
    }
    const { value, length } = decodeVariableLength(payload, 2);
    if (2 + length + value !== payload.length) {
      throw new Error(
        `Event ${index}: meta 0x${hex(payload[1])} declares ${value} data bytes, has ${payload.length - 2 - length}`,
      );
    }
    return;
  }

  throw new Error(`Event ${index}: unsupported status byte 0x${hex(status)}`);
}

function assertEndOfTrack(sorted: readonly MidiEvent[]): void {
  const last = sorted.at(-1);
  if (!last || !isEndOfTrack(last)) {
    throw new Error("Track must end with an End-of-Track meta event (FF 2F 00)");
  }
  const count = sorted.filter(isEndOfTrack).length;
  if (count > 1) {
    throw new Error(`Track contains ${count} End-of-Track events; expected exactly one`);
  }
}

// ─── Internal: Bytes ─────────────────────────────────────────────────────────

function writeTag(target: Uint8Array, offset: number, tag: string): void {
  for (let i = 0; i < tag.length; i++) {
    target[offset + i] = tag.charCodeAt(i);
  }
}

function concatBytes(parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((sum, p) => sum + p.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

function hex(byte: number): string {
  return byte.toString(16).padStart(2, "0").toUpperCase();
}
