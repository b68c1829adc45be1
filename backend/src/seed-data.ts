/**
 * Seed Data
 *
 * Sample chunks shipped in data/seed-chunks.json. Each has a fixed id, so
 * seeding a deck twice updates the same chunks instead of duplicating them.
 */

import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { ImportRecordSchema, formatValidationError, type ImportRecord } from "@chunk-recall/shared";

export const SEED_FILE = fileURLToPath(new URL("../data/seed-chunks.json", import.meta.url));

const SeedFileSchema = z.array(ImportRecordSchema);

/**
 * Read and validate the seed file.
 */
export async function readSeedChunks(path: string = SEED_FILE): Promise<ImportRecord[]> {
  const raw: unknown = JSON.parse(await readFile(path, "utf-8"));
  const result = SeedFileSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid seed file ${path}: ${formatValidationError(result.error)}`);
  }
  return result.data;
}
