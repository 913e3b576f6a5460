// ─── MIDI File Output ───────────────────────────────────────────────────────
//
// Writes a fully built byte buffer in one shot via a temp file + rename,
// so a failed run never leaves a half-written .mid behind.
// ─────────────────────────────────────────────────────────────────────────────

import { writeFileSync, renameSync, existsSync, unlinkSync } from "node:fs";
import { dirname, basename, join } from "node:path";

/**
 * Write `data` to `filePath` atomically.
 * On failure the temp file is removed and the original error is rethrown.
 */
export function writeMidiFile(filePath: string, data: Uint8Array): void {
  const tmpPath = join(dirname(filePath), `.${basename(filePath)}.${process.pid}.tmp`);

  try {
    writeFileSync(tmpPath, data);
    renameSync(tmpPath, filePath);
  } catch (err) {
    if (existsSync(tmpPath)) unlinkSync(tmpPath);
    throw err;
  }
}
