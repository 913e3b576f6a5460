// ─── Variable-Length Quantities ─────────────────────────────────────────────
//
// MIDI VLQ: 7 data bits per byte, most significant group first, the
// continuation bit (0x80) set on every byte except the last.
// ─────────────────────────────────────────────────────────────────────────────

import { MAX_VLQ } from "./types.js";

/** Result of decoding a VLQ from a byte buffer. */
export interface DecodedQuantity {
  value: number;
  /** Number of bytes consumed. */
  length: number;
}

/**
 * Encode a non-negative integer as a canonical (minimum-length) VLQ.
 *
 * Examples:
 *   0     → [0x00]
 *   127   → [0x7f]
 *   128   → [0x81, 0x00]
 *   16384 → [0x81, 0x80, 0x00]
 */
export function encodeVariableLength(value: number): number[] {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`VLQ value must be a non-negative integer, got ${value}`);
  }
  if (value > MAX_VLQ) {
    throw new RangeError(`VLQ value ${value} exceeds the 4-byte maximum ${MAX_VLQ}`);
  }

  const bytes = [value & 0x7f];
  let rest = value >>> 7;
  while (rest > 0) {
    bytes.unshift((rest & 0x7f) | 0x80);
    rest >>>= 7;
  }
  return bytes;
}

/**
 * Decode a VLQ starting at `offset`.
 * Throws if the buffer ends mid-quantity or the quantity runs past 4 bytes.
 */
export function decodeVariableLength(
  bytes: ArrayLike<number>,
  offset = 0,
): DecodedQuantity {
  let value = 0;
  for (let i = 0; i < 4; i++) {
    const index = offset + i;
    if (index >= bytes.length) {
      throw new RangeError(`Truncated VLQ at offset ${offset}`);
    }
    const byte = bytes[index];
    value = value * 128 + (byte & 0x7f);
    if ((byte & 0x80) === 0) {
      return { value, length: i + 1 };
    }
  }
  throw new RangeError(`VLQ at offset ${offset} is longer than 4 bytes`);
}
