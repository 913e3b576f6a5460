import { describe, it, expect } from "vitest";
import { buildScore, buildSection } from "./builder.js";
import { GENRE_BLEND } from "./composition.js";
import { isEndOfTrack } from "../midi/events.js";
import type { MidiEvent } from "../midi/types.js";
import type { Composition } from "../types.js";

const status = (e: MidiEvent) => e.payload[0];
const channelOf = (e: MidiEvent) => e.payload[0] & 0x0f;
const isNoteOn = (e: MidiEvent) => (e.payload[0] & 0xf0) === 0x90;
const isNoteOff = (e: MidiEvent) => (e.payload[0] & 0xf0) === 0x80;
const drumHits = (events: MidiEvent[], note: number) =>
  events.filter(e => status(e) === 0x99 && e.payload[1] === note);

describe("buildSection: classical", () => {
  const events = buildSection(GENRE_BLEND, 0);

  it("emits 8 bars × 3 notes × on/off = 48 events on channel 0", () => {
    expect(events).toHaveLength(48);
    expect(events.every(e => channelOf(e) === 0)).toBe(true);
    expect(events.filter(isNoteOn)).toHaveLength(24);
    expect(events.filter(isNoteOff)).toHaveLength(24);
  });

  it("starts the first Am chord at tick 0 and releases it at 384", () => {
    expect(events.slice(0, 6).map(e => [e.tick, ...e.payload])).toEqual([
      [0, 0x90, 57, 100],
      [0, 0x90, 60, 100],
      [0, 0x90, 64, 100],
      [384, 0x80, 57, 64],
      [384, 0x80, 60, 64],
      [384, 0x80, 64, 64],
    ]);
  });

  it("holds the last chord (E) until the end of the section", () => {
    const last = events.slice(-3);
    expect(last.map(e => [e.tick, e.payload[1]])).toEqual([[3072, 52], [3072, 56], [3072, 59]]);
  });
});

describe("buildSection: reggae", () => {
  const events = buildSection(GENRE_BLEND, 1);
  const lastBar = 3072 + 7 * 384;

  it("emits 22 events per bar and 17 in the fill bar", () => {
    expect(events).toHaveLength(7 * 22 + 17);
  });

  it("plays bass roots on beats 1 and 3 for one beat", () => {
    const bass = events.filter(e => channelOf(e) === 2).slice(0, 4);
    expect(bass.map(e => [e.tick, ...e.payload])).toEqual([
      [3072, 0x92, 33, 100],
      [3168, 0x82, 33, 64],
      [3264, 0x92, 33, 100],
      [3360, 0x82, 33, 64],
    ]);
  });

  it("stabs the chord on beats 2 and 4 for half a beat", () => {
    const firstBarOrgan = events.filter(e => channelOf(e) === 1 && e.tick < 3456);
    expect(firstBarOrgan.filter(isNoteOn).map(e => e.tick)).toEqual([3168, 3168, 3168, 3360, 3360, 3360]);
    expect(firstBarOrgan.filter(isNoteOff).map(e => e.tick)).toEqual([3216, 3216, 3216, 3408, 3408, 3408]);
  });

  it("voices bar 4 as E minor and bar 8 as E major", () => {
    const stabAt = (tick: number) =>
      events.filter(e => channelOf(e) === 1 && isNoteOn(e) && e.tick === tick).map(e => e.payload[1]);
    expect(stabAt(3072 + 3 * 384 + 96)).toEqual([52, 55, 59]);
    expect(stabAt(lastBar + 96)).toEqual([52, 56, 59]);
  });

  it("drops the beat-4 stab in the last bar", () => {
    const organ = events.filter(e => channelOf(e) === 1 && isNoteOn(e) && e.tick >= lastBar);
    expect(organ.map(e => e.tick)).toEqual([lastBar + 96, lastBar + 96, lastBar + 96]);
  });

  it("drops the last off-beat hat and adds a snare/tom fill", () => {
    const hats = drumHits(events, 42).filter(e => e.tick >= lastBar).map(e => e.tick);
    expect(hats).toEqual([lastBar + 48, lastBar + 144, lastBar + 240]);

    const fill = events.slice(-2).map(e => [e.tick, ...e.payload]);
    expect(fill).toEqual([
      [lastBar + 288, 0x99, 38, 110],
      [lastBar + 336, 0x99, 41, 110],
    ]);
  });

  it("drops kick and snare together on beat 3", () => {
    const kicks = drumHits(events, 36).map(e => e.tick);
    expect(kicks).toHaveLength(8);
    expect(kicks[0]).toBe(3072 + 192);
  });
});

describe("buildSection: rock", () => {
  const events = buildSection(GENRE_BLEND, 2);
  const start = 6144;

  it("emits the expected number of events", () => {
    // bar 1: 12 guitar + 8 bass + 4 kick/snare + 7 hats
    // bars 2-4: 12 + 8 + 4 + 8; bars 5-8: 12 + 8 + 16 kicks + 2 snares + 4 rides; plus the crash
    expect(events).toHaveLength(31 + 3 * 32 + 4 * 42 + 1);
  });

  it("releases the beat-1 strum before re-strumming on beat 3", () => {
    const guitarAtBeat3 = events.filter(e => channelOf(e) === 4 && e.tick === start + 192);
    expect(guitarAtBeat3.map(e => [...e.payload])).toEqual([
      [0x84, 45, 64], [0x84, 52, 64], [0x84, 57, 64],
      [0x94, 45, 120], [0x94, 52, 120], [0x94, 57, 120],
    ]);
  });

  it("cuts each bass note after 86 ticks", () => {
    const bass = events.filter(e => channelOf(e) === 2).slice(0, 2);
    expect(bass.map(e => [e.tick, ...e.payload])).toEqual([
      [start, 0x92, 33, 100],
      [start + 86, 0x82, 33, 64],
    ]);
  });

  it("leaves the downbeat hat out and ends with the crash", () => {
    const firstBarHats = drumHits(events, 42).filter(e => e.tick < start + 384).map(e => e.tick);
    expect(firstBarHats).toEqual([6192, 6240, 6288, 6336, 6384, 6432, 6480]);

    const crash = events[events.length - 1];
    expect([crash.tick, ...crash.payload]).toEqual([start, 0x99, 49, 127]);
  });

  it("switches to sixteenth-note kicks and ride in bars 5-8", () => {
    const bar5 = start + 4 * 384;
    const kicks = drumHits(events, 36).filter(e => e.tick >= bar5 && e.tick < bar5 + 384);
    expect(kicks.map(e => e.tick)).toEqual(Array.from({ length: 16 }, (_, k) => bar5 + 24 * k));

    const rides = drumHits(events, 51).map(e => e.tick);
    expect(rides).toHaveLength(16);
    expect(rides.every(t => t >= bar5)).toBe(true);
    expect(drumHits(events, 42).every(e => e.tick < bar5)).toBe(true);
  });
});

describe("buildScore", () => {
  const events = buildScore();

  it("emits every section plus program, tempo and End-of-Track events", () => {
    expect(events).toHaveLength(4 + 3 + 48 + 171 + 296 + 1);
  });

  it("starts with program changes for the melodic channels", () => {
    expect(events.slice(0, 4).map(e => [e.tick, ...e.payload])).toEqual([
      [0, 0xc0, 48],
      [0, 0xc1, 16],
      [0, 0xc2, 33],
      [0, 0xc4, 30],
    ]);
  });

  it("sets the tempo at the first tick of each section", () => {
    const tempos = events.filter(e => e.payload[0] === 0xff && e.payload[1] === 0x51);
    expect(tempos.map(e => e.tick)).toEqual([0, 3072, 6144]);
  });

  it("ends with End-of-Track at tick 9216", () => {
    const last = events[events.length - 1];
    expect(isEndOfTrack(last)).toBe(true);
    expect(last.tick).toBe(9216);
    expect(Math.max(...events.map(e => e.tick))).toBe(9216);
  });

  it("fails fast on a chord missing from the style's table", () => {
    const broken: Composition = {
      ...GENRE_BLEND,
      sections: [{ style: "rock", bpm: 120, progression: ["Am", "Bm"] }],
    };
    expect(() => buildScore(broken)).toThrow('Unknown chord "Bm" in rock chord table');
  });

  it("fails fast on a missing bass root", () => {
    const broken: Composition = {
      ...GENRE_BLEND,
      chords: { ...GENRE_BLEND.chords, reggae: { ...GENRE_BLEND.chords.reggae, C: [48, 52, 55] } },
      sections: [{ style: "reggae", bpm: 80, progression: ["C"] }],
    };
    expect(() => buildScore(broken)).toThrow('No bass note for root "C" (chord "C")');
  });

  it("rejects a section index out of range", () => {
    expect(() => buildSection(GENRE_BLEND, 3)).toThrow("Section index 3 out of range");
  });
});
