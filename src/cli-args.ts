// ─── CLI Flag Parsing ───────────────────────────────────────────────────────
//
// `--name value` pairs from argv. Kept apart from cli.ts, which runs on
// import.
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Value following `flag`, or undefined when the flag is absent.
 * Throws when the flag is present but has no value after it.
 */
export function getFlag(args: readonly string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  if (idx === -1) return undefined;

  const value = args[idx + 1];
  if (value === undefined || value.startsWith("--")) {
    throw new Error(`Missing value for ${flag}`);
  }
  return value;
}
