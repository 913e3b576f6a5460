// ─── Generation Pipeline ─────────────────────────────────────────────────────
//
// build → sort → serialize → write, in one synchronous pass.
// The whole file is assembled in memory before anything touches disk.
// ─────────────────────────────────────────────────────────────────────────────

import type { Composition, WriteResult } from "./types.js";
import { buildScore } from "./score/builder.js";
import { GENRE_BLEND } from "./score/composition.js";
import { serializeMidi } from "./midi/writer.js";
import { writeMidiFile } from "./midi/file.js";

/** Render a composition to Standard MIDI File bytes. */
export function renderComposition(composition: Composition = GENRE_BLEND): Uint8Array {
  return serializeMidi(buildScore(composition));
}

/** Render a composition and write it to `filePath`. */
export function writeComposition(
  filePath: string,
  composition: Composition = GENRE_BLEND,
): WriteResult {
  const events = buildScore(composition);
  const bytes = serializeMidi(events);
  writeMidiFile(filePath, bytes);
  return { path: filePath, bytes: bytes.length, events: events.length };
}
