// ─── genre-blend ────────────────────────────────────────────────────────────
//
// Builds a classical → reggae → rock piece as MIDI events and writes it as
// a format 0 Standard MIDI File.
//
// Usage:
//   import { renderComposition, writeComposition } from "genre-blend";
//   writeComposition("genre_blend.mid");
// ─────────────────────────────────────────────────────────────────────────────

// Pipeline
export { renderComposition, writeComposition } from "./generate.js";

// MIDI event model + serializer
export {
  createEvent,
  noteOn,
  noteOff,
  programChange,
  setTempo,
  setTempoMicroseconds,
  endOfTrack,
  isEndOfTrack,
  bpmToMicroseconds,
  assertChannel,
  assertDataByte,
} from "./midi/events.js";
export { encodeVariableLength, decodeVariableLength } from "./midi/vlq.js";
export type { DecodedQuantity } from "./midi/vlq.js";
export {
  serializeMidi,
  sortEvents,
  encodeTrack,
  buildHeaderChunk,
  buildTrackChunk,
} from "./midi/writer.js";
export type { SerializeOptions } from "./midi/writer.js";
export { writeMidiFile } from "./midi/file.js";
export { TICKS_PER_BEAT } from "./midi/types.js";
export type { MidiEvent, TempoChange } from "./midi/types.js";

// Score builder
export { buildScore, buildSection } from "./score/builder.js";
export { GENRE_BLEND, DEFAULT_OUTPUT } from "./score/composition.js";
export {
  beatsToTicks,
  ticksPerMeasure,
  ticksPerBar,
  sectionStarts,
  endTick,
  tempoMap,
  ticksToSeconds,
  BEATS_PER_BAR,
} from "./score/timing.js";
export {
  lookupChord,
  lookupBass,
  rootLetter,
  nameVoicing,
  pitchName,
  pitchNames,
} from "./score/voicing.js";
export type { SectionContext, SectionGenerator, BarTimes } from "./score/context.js";

// Config
export {
  CompositionSchema,
  SectionSchema,
  InstrumentSchema,
  ChordTableSchema,
  BassTableSchema,
  CliOptionsSchema,
  validateComposition,
  parseComposition,
} from "./config/schema.js";
export type { CliOptions, ConfigError } from "./config/schema.js";
export { loadComposition } from "./config/loader.js";

// Types
export { STYLES, PARTS, BASS_STYLES } from "./types.js";
export type {
  Style,
  Part,
  ChordTable,
  BassTable,
  Instrument,
  SectionDefinition,
  Composition,
  WriteResult,
} from "./types.js";
