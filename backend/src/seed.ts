/**
 * Seed Script
 *
 * Imports the sample chunks in data/seed-chunks.json into a deck.
 *
 * Usage: npm run seed -- <deckId>
 */

import { DeckIdSchema, formatValidationError } from "@chunk-recall/shared";
import { loadConfig } from "./config";
import { createLogger, setLogLevel } from "./logger";
import { createChunkManager, openScheduleDatabase } from "./spaced-repetition";
import { readSeedChunks } from "./seed-data";

const log = createLogger("Seed");

async function main(): Promise<void> {
  const deckResult = DeckIdSchema.safeParse(process.argv[2] ?? "default");
  if (!deckResult.success) {
    throw new Error(`Invalid deck ID: ${formatValidationError(deckResult.error)}`);
  }

  const config = await loadConfig();
  setLogLevel(config.logLevel);

  const database = await openScheduleDatabase(config.databasePath);
  try {
    const manager = createChunkManager(database, deckResult.data);
    const result = manager.importChunks(await readSeedChunks(), new Date());
    log.info(
      `Seeded deck "${deckResult.data}": ${result.created} new, ${result.updated} updated`
    );
  } finally {
    database.close();
  }
}

main().catch((error: unknown) => {
  log.error("Seeding failed", error);
  process.exit(1);
});
