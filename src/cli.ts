#!/usr/bin/env node
// ─── genre-blend: CLI Entry Point ───────────────────────────────────────────
//
// Usage:
//   genre-blend                               # Write genre_blend.mid
//   genre-blend write --out song.mid          # Write to a different path
//   genre-blend write --composition my.json   # Render another composition
//   genre-blend info                          # Summarize the sections
//   genre-blend help                          # Show help
// ─────────────────────────────────────────────────────────────────────────────

import type { Composition } from "./types.js";
import { CliOptionsSchema, type CliOptions } from "./config/schema.js";
import { loadComposition } from "./config/loader.js";
import { GENRE_BLEND } from "./score/composition.js";
import { sectionStarts, endTick, tempoMap, ticksToSeconds, ticksPerBar } from "./score/timing.js";
import { nameVoicing, pitchNames } from "./score/voicing.js";
import { writeComposition } from "./generate.js";
import { getFlag } from "./cli-args.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

function padRight(s: string, len: number): string {
  return s.length >= len ? s.substring(0, len) : s + " ".repeat(len - s.length);
}

/** Parse flags through the zod schema; exits on invalid input. */
function parseOptions(args: string[]): CliOptions {
  const result = CliOptionsSchema.safeParse({
    out: getFlag(args, "--out"),
    composition: getFlag(args, "--composition"),
  });
  if (!result.success) {
    for (const issue of result.error.issues) {
      console.error(`Invalid --${issue.path.join(".")}: ${issue.message}`);
    }
    process.exit(1);
  }
  return result.data;
}

function resolveComposition(options: CliOptions): Composition {
  return options.composition ? loadComposition(options.composition) : GENRE_BLEND;
}

// ─── Commands ───────────────────────────────────────────────────────────────

function cmdWrite(args: string[]): void {
  const options = parseOptions(args);
  const composition = resolveComposition(options);
  const result = writeComposition(options.out, composition);
  console.log(
    `MIDI file "${result.path}" written (${result.bytes} bytes, ${result.events} events). Open it in a MIDI player or DAW.`,
  );
}

function cmdInfo(args: string[]): void {
  const composition = resolveComposition(parseOptions(args));
  const starts = sectionStarts(composition);
  const end = endTick(composition);

  console.log(`\n${"═".repeat(60)}`);
  console.log(`  ${composition.title}`);
  console.log(`${"═".repeat(60)}`);

  composition.sections.forEach((section, i) => {
    const sectionEnd = i + 1 < starts.length ? starts[i + 1] : end;
    console.log(
      `\n  ${padRight(section.style, 10)} ${section.progression.length} bars | ${section.bpm} BPM | ticks ${starts[i]}–${sectionEnd}`,
    );
    const table = composition.chords[section.style];
    for (const chord of new Set(section.progression)) {
      const pitches = table[chord] ?? [];
      const voiced = nameVoicing(pitches) ?? "?";
      console.log(`    ${padRight(chord, 4)} → ${padRight(voiced, 6)} ${pitchNames(pitches)}`);
    }
    console.log(`    ${section.progression.join(" ")}`);
  });

  const seconds = ticksToSeconds(end, tempoMap(composition));
  const bars = end / ticksPerBar();
  console.log(`\n  ${bars} bars, ${end} ticks, ~${seconds.toFixed(1)}s\n`);
}

function cmdHelp(): void {
  console.log(`
genre-blend — write a classical/reggae/rock Standard MIDI File

Commands:
  write [--out FILE] [--composition FILE]   Write the MIDI file (default command)
  info [--composition FILE]                 Show sections, voicings and duration
  help                                      Show this help

Options:
  --out FILE            Output path, must end in .mid or .midi (default: genre_blend.mid)
  --composition FILE    Composition JSON to render instead of the built-in piece
`);
}

// ─── CLI Router ─────────────────────────────────────────────────────────────

function main(): void {
  const args = process.argv.slice(2);
  const first = args[0];
  const implicitWrite = first === undefined || (first.startsWith("--") && first !== "--help");
  const command = implicitWrite ? "write" : first;
  const rest = implicitWrite ? args : args.slice(1);

  switch (command) {
    case "write":
      cmdWrite(rest);
      break;
    case "info":
      cmdInfo(rest);
      break;
    case "help":
    case "--help":
    case "-h":
      cmdHelp();
      break;
    default:
      console.error(`Unknown command: "${command}". Run 'genre-blend help' for usage.`);
      process.exit(1);
  }
}

try {
  main();
} catch (err) {
  const msg = err instanceof Error ? err.message : String(err);
  console.error(`\nError: ${msg}`);
  process.exit(1);
}
