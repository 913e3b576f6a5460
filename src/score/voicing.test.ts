import { describe, it, expect } from "vitest";
import { nameVoicing, pitchName, pitchNames, lookupChord, lookupBass, rootLetter } from "./voicing.js";
import { GENRE_BLEND } from "./composition.js";

describe("nameVoicing", () => {
  it("names the classical triads", () => {
    const { classical } = GENRE_BLEND.chords;
    expect(nameVoicing(classical.Am)).toBe("Am");
    expect(nameVoicing(classical.G)).toBe("G");
    expect(nameVoicing(classical.F)).toBe("F");
    expect(nameVoicing(classical.E)).toBe("E");
  });

  it("names the reggae E minor", () => {
    expect(nameVoicing(GENRE_BLEND.chords.reggae.Em)).toBe("Em");
  });

  it("names power chords with a 5 suffix", () => {
    const { rock } = GENRE_BLEND.chords;
    expect(nameVoicing(rock.Am)).toBe("A5");
    expect(nameVoicing(rock.G)).toBe("G5");
    expect(nameVoicing(rock.E)).toBe("E5");
  });

  it("shows inversions as slash chords", () => {
    expect(nameVoicing([64, 67, 72])).toBe("C/E");
  });

  it("returns null for single notes and unknown sets", () => {
    expect(nameVoicing([60])).toBeNull();
    expect(nameVoicing([48, 60])).toBeNull();
    expect(nameVoicing([60, 61])).toBeNull();
  });
});

describe("pitchName", () => {
  it("uses scientific pitch notation", () => {
    expect(pitchName(60)).toBe("C4");
    expect(pitchName(33)).toBe("A1");
    expect(pitchName(56)).toBe("G#3");
  });

  it("lists pitches lowest first without mutating the input", () => {
    const pitches = [64, 57, 60];
    expect(pitchNames(pitches)).toBe("A3 C4 E4");
    expect(pitches).toEqual([64, 57, 60]);
  });
});

describe("lookups", () => {
  it("returns the voicing for a known chord", () => {
    expect(lookupChord(GENRE_BLEND.chords.rock, "F", "rock")).toEqual([41, 48, 53]);
  });

  it("throws on an unknown chord instead of returning an empty one", () => {
    expect(() => lookupChord(GENRE_BLEND.chords.classical, "Em", "classical")).toThrow(
      'Unknown chord "Em" in classical chord table',
    );
  });

  it("does not treat inherited properties as chords", () => {
    expect(() => lookupChord(GENRE_BLEND.chords.rock, "toString", "rock")).toThrow("Unknown chord");
  });

  it("finds the bass note from the chord's root letter", () => {
    expect(rootLetter("Em")).toBe("E");
    expect(lookupBass(GENRE_BLEND.bass, "Em")).toBe(28);
    expect(lookupBass(GENRE_BLEND.bass, "Am")).toBe(33);
  });

  it("throws when the root has no bass note", () => {
    expect(() => lookupBass(GENRE_BLEND.bass, "Dm")).toThrow('No bass note for root "D" (chord "Dm")');
  });
});
