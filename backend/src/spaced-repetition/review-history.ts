/**
 * Review History Log
 *
 * Append-only audit trail of review events. Each event carries a snapshot of
 * the schedule it produced, which is what progress graphs read and what
 * recomputation restores from.
 */

import { z } from "zod";
import { formatValidationError } from "@chunk-recall/shared";
import { DataCorruptionError, InvalidInputError } from "../errors.js";
import { ReviewEventSchema, type ReviewEvent } from "./chunk-schema.js";
import type { ScheduleDatabase } from "./database.js";
import { readCount } from "./chunk-store.js";

// =============================================================================
// Interface
// =============================================================================

export interface ReviewHistoryLog {
  append(event: ReviewEvent): void;
  /** Events for one chunk, by reviewed_at then insertion order */
  listForChunk(chunkId: string): ReviewEvent[];
  /** The event that produced the chunk's current schedule, or null */
  latestForChunk(chunkId: string): ReviewEvent | null;
  /** Every event in the deck, by reviewed_at then insertion order */
  listAll(): ReviewEvent[];
  count(): number;
  /** Only used when chunks are deleted. @returns number of events deleted */
  deleteForChunks(chunkIds: readonly string[]): number;
  /** Only used by the wipe. @returns number of events deleted */
  deleteAll(): number;
}

// =============================================================================
// SQLite Implementation
// =============================================================================

const COLUMNS = `id, chunk_id, reviewed_at, quality, ease_factor_after, interval_days_after,
  repetition_count_after, due_at_after, after_schedule_edit`;

/** SQLite has no boolean column; the flag is stored as 0 or 1 */
const EventRowSchema = ReviewEventSchema.extend({
  after_schedule_edit: z.union([z.literal(0), z.literal(1)]).transform((flag) => flag === 1),
});

export class SqliteReviewHistory implements ReviewHistoryLog {
  constructor(
    private readonly database: ScheduleDatabase,
    readonly deckId: string
  ) {}

  append(event: ReviewEvent): void {
    const result = ReviewEventSchema.safeParse(event);
    if (!result.success) {
      throw new InvalidInputError(
        `Invalid review event: ${formatValidationError(result.error)}`
      );
    }
    this.database
      .statement(
        `INSERT INTO review_events (deck_id, ${COLUMNS})
         VALUES (@deck_id, @id, @chunk_id, @reviewed_at, @quality, @ease_factor_after,
           @interval_days_after, @repetition_count_after, @due_at_after, @after_schedule_edit)`
      )
      .run({
        deck_id: this.deckId,
        ...result.data,
        after_schedule_edit: result.data.after_schedule_edit ? 1 : 0,
      });
  }

  listForChunk(chunkId: string): ReviewEvent[] {
    const rows = this.database
      .statement(
        `SELECT ${COLUMNS} FROM review_events
         WHERE deck_id = ? AND chunk_id = ?
         ORDER BY reviewed_at ASC, seq ASC`
      )
      .all(this.deckId, chunkId);
    return rows.map(parseEventRow);
  }

  latestForChunk(chunkId: string): ReviewEvent | null {
    const row = this.database
      .statement(
        `SELECT ${COLUMNS} FROM review_events
         WHERE deck_id = ? AND chunk_id = ?
         ORDER BY reviewed_at DESC, seq DESC
         LIMIT 1`
      )
      .get(this.deckId, chunkId);
    return row === undefined ? null : parseEventRow(row);
  }

  listAll(): ReviewEvent[] {
    const rows = this.database
      .statement(
        `SELECT ${COLUMNS} FROM review_events
         WHERE deck_id = ?
         ORDER BY reviewed_at ASC, seq ASC`
      )
      .all(this.deckId);
    return rows.map(parseEventRow);
  }

  count(): number {
    return readCount(
      this.database
        .statement("SELECT COUNT(*) AS count FROM review_events WHERE deck_id = ?")
        .get(this.deckId)
    );
  }

  deleteForChunks(chunkIds: readonly string[]): number {
    const stmt = this.database.statement(
      "DELETE FROM review_events WHERE deck_id = ? AND chunk_id = ?"
    );
    let deleted = 0;
    for (const chunkId of chunkIds) {
      deleted += stmt.run(this.deckId, chunkId).changes;
    }
    return deleted;
  }

  deleteAll(): number {
    return this.database
      .statement("DELETE FROM review_events WHERE deck_id = ?")
      .run(this.deckId).changes;
  }
}

function parseEventRow(row: unknown): ReviewEvent {
  const result = EventRowSchema.safeParse(row);
  if (!result.success) {
    throw new DataCorruptionError(
      `Stored review event is corrupted: ${formatValidationError(result.error)}`
    );
  }
  return result.data;
}
