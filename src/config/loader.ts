// ─── Composition Loader ──────────────────────────────────────────────────────
//
// Reads a composition from a .json file and validates it with Zod.
// ─────────────────────────────────────────────────────────────────────────────

import { readFileSync, existsSync } from "node:fs";
import { basename } from "node:path";
import { CompositionSchema } from "./schema.js";
import type { Composition } from "../types.js";

/**
 * Load and validate a composition file.
 * Throws with one line per schema issue if the file is invalid.
 */
export function loadComposition(filePath: string): Composition {
  if (!existsSync(filePath)) {
    throw new Error(`Composition not found: ${filePath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf8"));
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid JSON in ${basename(filePath)}: ${msg}`);
  }

  const result = CompositionSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map(i => `  ${i.path.join(".") || "root"}: ${i.message}`)
      .join("\n");
    throw new Error(`Invalid composition ${basename(filePath)}:\n${issues}`);
  }

  return result.data;
}
