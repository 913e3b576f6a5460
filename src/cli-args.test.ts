import { describe, it, expect } from "vitest";
import { getFlag } from "./cli-args.js";

describe("getFlag", () => {
  it("returns the value after the flag", () => {
    expect(getFlag(["--out", "song.mid"], "--out")).toBe("song.mid");
    expect(getFlag(["--composition", "a.json", "--out", "b.mid"], "--out")).toBe("b.mid");
  });

  it("returns undefined when the flag is absent", () => {
    expect(getFlag(["--composition", "a.json"], "--out")).toBeUndefined();
    expect(getFlag([], "--out")).toBeUndefined();
  });

  it("throws when the flag is the last argument", () => {
    expect(() => getFlag(["--out"], "--out")).toThrow("Missing value for --out");
  });

  it("throws when another flag follows instead of a value", () => {
    expect(() => getFlag(["--out", "--composition", "a.json"], "--out")).toThrow(
      "Missing value for --out",
    );
  });
});
