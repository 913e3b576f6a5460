// ─── Composition & CLI Schemas ───────────────────────────────────────────────
//
// Zod schemas for compositions (built-in or loaded from JSON) and for the
// CLI options. Cross-field checks make sure every chord a section plays
// has a voicing in its style's table and a bass root where one is needed.
// ─────────────────────────────────────────────────────────────────────────────

import { z } from "zod";
import { STYLES, BASS_STYLES, type Composition } from "../types.js";
import { rootLetter } from "../score/voicing.js";
import { DEFAULT_OUTPUT } from "../score/composition.js";

// ─── Zod Schemas ─────────────────────────────────────────────────────────────

const DataByteSchema = z.number().int().min(0).max(127);

export const ChordTableSchema = z.record(
  z.string().min(1),
  z.array(DataByteSchema).min(1),
);

export const BassTableSchema = z.record(
  z.string().regex(/^[A-G]$/, "bass roots must be a single letter A-G"),
  DataByteSchema,
);

export const InstrumentSchema = z.object({
  channel: z.number().int().min(0).max(15),
  program: DataByteSchema.optional(),
});

export const SectionSchema = z.object({
  style: z.enum(STYLES),
  bpm: z.number().min(10).max(400),
  progression: z.array(z.string().min(1)).min(1),
});

export const CompositionSchema = z
  .object({
    title: z.string().min(1),
    sections: z.array(SectionSchema).min(1),
    chords: z.object({
      classical: ChordTableSchema,
      reggae: ChordTableSchema,
      rock: ChordTableSchema,
    }),
    bass: BassTableSchema,
    instruments: z.object({
      classical: InstrumentSchema,
      reggae: InstrumentSchema,
      bass: InstrumentSchema,
      rock: InstrumentSchema,
      drums: InstrumentSchema,
    }),
  })
  .superRefine((composition, ctx) => {
    composition.sections.forEach((section, i) => {
      const table = composition.chords[section.style];
      const needsBass = BASS_STYLES.includes(section.style);

      section.progression.forEach((chord, j) => {
        if (!Object.hasOwn(table, chord)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["sections", i, "progression", j],
            message: `chord "${chord}" is not in the ${section.style} chord table`,
          });
        }
        if (needsBass && !Object.hasOwn(composition.bass, rootLetter(chord))) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["sections", i, "progression", j],
            message: `no bass note for root "${rootLetter(chord)}"`,
          });
        }
      });
    });
  });

export const CliOptionsSchema = z.object({
  out: z
    .string()
    .min(1)
    .regex(/\.midi?$/i, "output file must end in .mid or .midi")
    .default(DEFAULT_OUTPUT),
  composition: z.string().min(1).optional(),
});

// ─── Derived Types ───────────────────────────────────────────────────────────

export type CliOptions = z.infer<typeof CliOptionsSchema>;

// ─── Validation ──────────────────────────────────────────────────────────────

export interface ConfigError {
  field: string;
  message: string;
}

/**
 * Validate a composition object using the zod schema.
 * Returns an empty array if valid.
 */
export function validateComposition(composition: unknown): ConfigError[] {
  const result = CompositionSchema.safeParse(composition);
  if (result.success) return [];

  return result.error.issues.map((issue) => ({
    field: issue.path.join(".") || "root",
    message: issue.message,
  }));
}

/** Parse and validate a composition, throwing a ZodError on failure. */
export function parseComposition(raw: unknown): Composition {
  return CompositionSchema.parse(raw);
}
