/**
 * Chunk Schema
 *
 * Domain types for chunks and review events, plus the timestamp helpers the
 * scheduler and the stores share. The wire shapes live in @chunk-recall/shared;
 * this module re-exports them under their domain names.
 *
 * All timestamps are ISO 8601 strings in UTC (`Date.prototype.toISOString`),
 * which sort lexicographically in time order. The stores rely on that for
 * `due_at <= ?` comparisons.
 */

import {
  ChunkRecordSchema,
  ReviewEventRecordSchema,
  formatValidationError,
  type ChunkRecord,
  type ReviewEventRecord,
  type NewChunkRequest,
} from "@chunk-recall/shared";
import { InvalidInputError } from "../errors.js";

// =============================================================================
// Types
// =============================================================================

export type Chunk = ChunkRecord;
export type ReviewEvent = ReviewEventRecord;
export type ChunkContent = NewChunkRequest;

export { ChunkRecordSchema as ChunkSchema, ReviewEventRecordSchema as ReviewEventSchema };

/** Scheduling fields of a chunk that the scheduler reads and writes */
export interface Schedule {
  ease_factor: number;
  interval_days: number;
  repetition_count: number;
  due_at: string;
}

// =============================================================================
// Timestamp Utilities
// =============================================================================

/** Milliseconds in one scheduling day */
export const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Format a Date as a UTC ISO 8601 timestamp.
 * @throws InvalidInputError if the date is invalid or outside years 0000-9999
 */
export function toTimestamp(date: Date): string {
  if (Number.isNaN(date.getTime())) {
    throw new InvalidInputError("Invalid date");
  }
  const year = date.getUTCFullYear();
  if (year < 0 || year > 9999) {
    throw new InvalidInputError(`Date is outside the supported range: year ${year}`);
  }
  return date.toISOString();
}

/**
 * Add whole days to a Date and return the UTC timestamp.
 */
export function addDays(date: Date, days: number): string {
  return toTimestamp(new Date(date.getTime() + days * DAY_MS));
}

/**
 * Normalize any ISO 8601 timestamp (with or without an offset) to UTC.
 * @throws InvalidInputError if the value does not parse
 */
export function normalizeTimestamp(value: string): string {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new InvalidInputError(`Invalid timestamp: ${value}`);
  }
  return toTimestamp(date);
}

/**
 * Get the UTC calendar day (YYYY-MM-DD) of a timestamp.
 */
export function toUtcDay(timestamp: string): string {
  return normalizeTimestamp(timestamp).slice(0, 10);
}

// =============================================================================
// Factory Functions
// =============================================================================

/**
 * Create a chunk with the default scheduling state of a new chunk:
 * ease 2.5, interval 0, no repetitions, due immediately.
 */
export function createNewChunk(id: string, content: ChunkContent, now: Date): Chunk {
  const timestamp = toTimestamp(now);
  return {
    id,
    prompt: content.prompt,
    answer: content.answer,
    ease_factor: 2.5,
    interval_days: 0,
    repetition_count: 0,
    due_at: timestamp,
    created_at: timestamp,
    last_reviewed_at: null,
    updated_at: timestamp,
  };
}

/**
 * Validate a chunk before it is written.
 * @throws InvalidInputError listing every violated field
 */
export function assertValidChunk(chunk: Chunk): Chunk {
  const result = ChunkRecordSchema.safeParse(chunk);
  if (!result.success) {
    throw new InvalidInputError(
      `Invalid chunk ${chunk.id}: ${formatValidationError(result.error)}`
    );
  }
  return result.data;
}
