/**
 * Spaced Repetition Module
 *
 * Re-exports from spaced-repetition submodules for convenient access.
 */

// Chunk manager (main API)
export {
  ChunkManager,
  createChunkManager,
  type ChunkManagerDeps,
  type TransactionRunner,
} from "./chunk-manager.js";

// SM-2 algorithm
export {
  calculateSM2,
  replayReviews,
  verifyHistory,
  isValidQuality,
  isValidScheduleState,
  createNewScheduleState,
  DEFAULT_EASE_FACTOR,
  MIN_EASE_FACTOR,
  MAX_INTERVAL_DAYS,
  PASS_THRESHOLD,
  QUALITY_SCORES,
  type ScheduleState,
  type SM2Result,
  type GradedReview,
} from "./sm2-algorithm.js";

// Chunk schema
export {
  type Chunk,
  type ChunkContent,
  type ReviewEvent,
  type Schedule,
  createNewChunk,
  toTimestamp,
  addDays,
  normalizeTimestamp,
  DAY_MS,
} from "./chunk-schema.js";

// Storage
export {
  ScheduleDatabase,
  openScheduleDatabase,
  IN_MEMORY,
  DEFAULT_BUSY_TIMEOUT_MS,
  type OpenOptions,
} from "./database.js";
export { SqliteChunkStore, type ChunkStore } from "./chunk-store.js";
export { SqliteReviewHistory, type ReviewHistoryLog } from "./review-history.js";

// Due selection and progress
export { selectTodayBatch, DAILY_BATCH_SIZE } from "./due-selector.js";
export { easeFactorSeries, reviewStreaks, summarizeProgress } from "./progress.js";
