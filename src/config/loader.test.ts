import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, writeFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadComposition } from "./loader.js";
import { GENRE_BLEND } from "../score/composition.js";

const tempDirs: string[] = [];

function writeTemp(name: string, contents: string): string {
  const dir = mkdtempSync(join(tmpdir(), "genre-blend-config-"));
  tempDirs.push(dir);
  const path = join(dir, name);
  writeFileSync(path, contents, "utf8");
  return path;
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) rmSync(dir, { recursive: true, force: true });
});

describe("loadComposition", () => {
  it("loads a composition saved as JSON", () => {
    const path = writeTemp("blend.json", JSON.stringify(GENRE_BLEND, null, 2));
    expect(loadComposition(path)).toEqual(GENRE_BLEND);
  });

  it("throws when the file does not exist", () => {
    const path = join(tmpdir(), "genre-blend-no-such-dir", "missing.json");
    expect(() => loadComposition(path)).toThrow(`Composition not found: ${path}`);
  });

  it("names the file when the JSON is malformed", () => {
    const path = writeTemp("broken.json", "{ \"title\": ");
    expect(() => loadComposition(path)).toThrow(/^Invalid JSON in broken\.json: /);
  });

  it("lists every schema issue with its path", () => {
    const bad = {
      ...GENRE_BLEND,
      sections: [{ style: "classical", bpm: 90, progression: ["Am", "Bm"] }],
    };
    const path = writeTemp("bad.json", JSON.stringify(bad));
    expect(() => loadComposition(path)).toThrow(
      'Invalid composition bad.json:\n  sections.0.progression.1: chord "Bm" is not in the classical chord table',
    );
  });
});
