// ─── Score Timing ────────────────────────────────────────────────────────────
//
// Beat → tick conversion, section placement, and the tempo map.
// All positions are absolute ticks at TICKS_PER_BEAT resolution.
// ─────────────────────────────────────────────────────────────────────────────

import { TICKS_PER_BEAT, type TempoChange } from "../midi/types.js";
import { bpmToMicroseconds } from "../midi/events.js";
import type { Composition } from "../types.js";

/** Every section is written in 4/4. */
export const BEATS_PER_BAR = 4;

/**
 * Convert beats to ticks, truncating toward zero.
 *
 * Each call truncates independently: callers add `beatsToTicks(0.5)` to a
 * tick position rather than accumulating fractional beats.
 */
export function beatsToTicks(beats: number, ticksPerBeat: number = TICKS_PER_BEAT): number {
  return Math.trunc(beats * ticksPerBeat);
}

/** Bar length in ticks for a `numerator`/`denominator` time signature. */
export function ticksPerMeasure(
  ticksPerBeat: number,
  numerator: number,
  denominator: number,
): number {
  return beatsToTicks((numerator * 4) / denominator, ticksPerBeat);
}

/** Ticks in one bar of the composition. */
export function ticksPerBar(): number {
  return ticksPerMeasure(TICKS_PER_BEAT, BEATS_PER_BAR, 4);
}

/** Absolute start tick of each section, in section order. */
export function sectionStarts(composition: Composition): number[] {
  const starts: number[] = [];
  let tick = 0;
  for (const section of composition.sections) {
    starts.push(tick);
    tick += beatsToTicks(BEATS_PER_BAR * section.progression.length);
  }
  return starts;
}

/** Tick at which the last section ends (where End-of-Track goes). */
export function endTick(composition: Composition): number {
  const bars = composition.sections.reduce((sum, s) => sum + s.progression.length, 0);
  return beatsToTicks(BEATS_PER_BAR * bars);
}

/** One tempo change per section, at its first tick. */
export function tempoMap(composition: Composition): TempoChange[] {
  const starts = sectionStarts(composition);
  return composition.sections.map((section, i) => ({
    tick: starts[i],
    microsecondsPerBeat: bpmToMicroseconds(section.bpm),
  }));
}

// ─── Wall-Clock Time ─────────────────────────────────────────────────────────

/** Tempo assumed before any Set Tempo event (120 BPM). */
const DEFAULT_MICROSECONDS_PER_BEAT = 500_000;

function spanSeconds(ticks: number, microsecondsPerBeat: number, ticksPerBeat: number): number {
  return (ticks / ticksPerBeat) * (microsecondsPerBeat / 1_000_000);
}

/**
 * Seconds from tick 0 to `targetTick` under a sorted tempo map such as
 * `tempoMap()` returns. Each change holds until the next one; ticks before
 * the first change play at the first change's tempo.
 */
export function ticksToSeconds(
  targetTick: number,
  tempoChanges: readonly TempoChange[],
  ticksPerBeat: number = TICKS_PER_BEAT,
): number {
  const active = tempoChanges.filter(change => change.tick < targetTick);
  const initial = tempoChanges.length > 0
    ? tempoChanges[0].microsecondsPerBeat
    : DEFAULT_MICROSECONDS_PER_BEAT;

  const lead = active.length > 0 ? active[0].tick : Math.max(targetTick, 0);
  let seconds = spanSeconds(lead, initial, ticksPerBeat);

  active.forEach((change, i) => {
    const until = i + 1 < active.length ? active[i + 1].tick : targetTick;
    seconds += spanSeconds(until - change.tick, change.microsecondsPerBeat, ticksPerBeat);
  });
  return seconds;
}
