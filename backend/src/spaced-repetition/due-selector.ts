/**
 * Due-Set Selector
 *
 * Picks the day's review batch: at most five chunks that are due now,
 * oldest due first. When fewer are due the batch is smaller; not-yet-due
 * chunks are never pulled forward.
 */

import { toTimestamp, type Chunk } from "./chunk-schema.js";
import type { ChunkStore } from "./chunk-store.js";

/** Size of the daily review session */
export const DAILY_BATCH_SIZE = 5;

export function selectTodayBatch(store: ChunkStore, now: Date): Chunk[] {
  return store.listDue(toTimestamp(now), DAILY_BATCH_SIZE);
}
