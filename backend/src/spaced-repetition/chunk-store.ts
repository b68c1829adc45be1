/**
 * Chunk Store
 *
 * Durable storage of chunk content and scheduling state, namespaced per deck.
 * The ChunkStore interface is all the rest of the core sees; SqliteChunkStore
 * is the better-sqlite3 implementation.
 *
 * Every method is synchronous so it can run inside a ScheduleDatabase
 * transaction. Each write is a single statement, so a concurrent reader never
 * sees a row whose due_at changed without its ease factor and interval.
 */

import { formatValidationError } from "@chunk-recall/shared";
import { DataCorruptionError, InvalidInputError, NotFoundError } from "../errors.js";
import {
  ChunkSchema,
  assertValidChunk,
  type Chunk,
  type Schedule,
} from "./chunk-schema.js";
import type { ScheduleDatabase } from "./database.js";

// =============================================================================
// Interface
// =============================================================================

export interface ChunkStore {
  /** @throws NotFoundError if the chunk does not exist */
  get(id: string): Chunk;
  exists(id: string): boolean;
  /** Create or overwrite by id. @returns the chunk as stored */
  upsert(chunk: Chunk): Chunk;
  /** Chunks with due_at <= beforeOrAt, oldest due first, ties by id */
  listDue(beforeOrAt: string, limit: number): Chunk[];
  /** Every chunk, in creation order */
  listAll(): Chunk[];
  count(): number;
  /** Overwrite only the scheduling fields, without reading the row first */
  writeSchedule(id: string, schedule: Schedule & { last_reviewed_at: string | null; updated_at: string }): void;
  /** @returns number of chunks deleted */
  delete(ids: readonly string[]): number;
  /** @returns number of chunks deleted */
  deleteAll(): number;
}

// =============================================================================
// SQLite Implementation
// =============================================================================

const COLUMNS = `id, prompt, answer, ease_factor, interval_days, repetition_count,
  due_at, created_at, last_reviewed_at, updated_at`;

export class SqliteChunkStore implements ChunkStore {
  constructor(
    private readonly database: ScheduleDatabase,
    readonly deckId: string
  ) {}

  get(id: string): Chunk {
    const row = this.database
      .statement(`SELECT ${COLUMNS} FROM chunks WHERE deck_id = ? AND id = ?`)
      .get(this.deckId, id);
    if (row === undefined) {
      throw new NotFoundError(`Chunk not found: ${id}`);
    }
    return parseRow(row);
  }

  exists(id: string): boolean {
    const row = this.database
      .statement("SELECT 1 FROM chunks WHERE deck_id = ? AND id = ?")
      .get(this.deckId, id);
    return row !== undefined;
  }

  upsert(chunk: Chunk): Chunk {
    const valid = assertValidChunk(chunk);
    this.database
      .statement(
        `INSERT INTO chunks (deck_id, ${COLUMNS})
         VALUES (@deck_id, @id, @prompt, @answer, @ease_factor, @interval_days,
           @repetition_count, @due_at, @created_at, @last_reviewed_at, @updated_at)
         ON CONFLICT(deck_id, id) DO UPDATE SET
           prompt = excluded.prompt,
           answer = excluded.answer,
           ease_factor = excluded.ease_factor,
           interval_days = excluded.interval_days,
           repetition_count = excluded.repetition_count,
           due_at = excluded.due_at,
           created_at = excluded.created_at,
           last_reviewed_at = excluded.last_reviewed_at,
           updated_at = excluded.updated_at`
      )
      .run({ deck_id: this.deckId, ...valid });
    return valid;
  }

  listDue(beforeOrAt: string, limit: number): Chunk[] {
    if (!Number.isInteger(limit) || limit < 0) {
      throw new InvalidInputError(`Limit must be a non-negative integer, got ${limit}`);
    }
    if (limit === 0) {
      return [];
    }
    const rows = this.database
      .statement(
        `SELECT ${COLUMNS} FROM chunks
         WHERE deck_id = ? AND due_at <= ?
         ORDER BY due_at ASC, id ASC
         LIMIT ?`
      )
      .all(this.deckId, beforeOrAt, limit);
    return rows.map(parseRow);
  }

  listAll(): Chunk[] {
    const rows = this.database
      .statement(
        `SELECT ${COLUMNS} FROM chunks WHERE deck_id = ? ORDER BY created_at ASC, id ASC`
      )
      .all(this.deckId);
    return rows.map(parseRow);
  }

  count(): number {
    const row = this.database
      .statement("SELECT COUNT(*) AS count FROM chunks WHERE deck_id = ?")
      .get(this.deckId);
    return readCount(row);
  }

  writeSchedule(
    id: string,
    schedule: Schedule & { last_reviewed_at: string | null; updated_at: string }
  ): void {
    const result = this.database
      .statement(
        `UPDATE chunks SET
           ease_factor = @ease_factor,
           interval_days = @interval_days,
           repetition_count = @repetition_count,
           due_at = @due_at,
           last_reviewed_at = @last_reviewed_at,
           updated_at = @updated_at
         WHERE deck_id = @deck_id AND id = @id`
      )
      .run({
        deck_id: this.deckId,
        id,
        ease_factor: schedule.ease_factor,
        interval_days: schedule.interval_days,
        repetition_count: schedule.repetition_count,
        due_at: schedule.due_at,
        last_reviewed_at: schedule.last_reviewed_at,
        updated_at: schedule.updated_at,
      });
    if (result.changes === 0) {
      throw new NotFoundError(`Chunk not found: ${id}`);
    }
  }

  delete(ids: readonly string[]): number {
    const stmt = this.database.statement("DELETE FROM chunks WHERE deck_id = ? AND id = ?");
    let deleted = 0;
    for (const id of ids) {
      deleted += stmt.run(this.deckId, id).changes;
    }
    return deleted;
  }

  deleteAll(): number {
    return this.database.statement("DELETE FROM chunks WHERE deck_id = ?").run(this.deckId)
      .changes;
  }
}

// =============================================================================
// Row Parsing
// =============================================================================

/**
 * Validate a stored row. A row that violates the invariants is corruption:
 * it is reported, never coerced back to defaults.
 */
function parseRow(row: unknown): Chunk {
  const result = ChunkSchema.safeParse(row);
  if (!result.success) {
    const id = readId(row);
    throw new DataCorruptionError(
      `Stored chunk ${id} is corrupted (${formatValidationError(result.error)}); ` +
        `recompute it from its review history`
    );
  }
  return result.data;
}

function readId(row: unknown): string {
  if (typeof row === "object" && row !== null && "id" in row && typeof row.id === "string") {
    return row.id;
  }
  return "(unknown)";
}

export function readCount(row: unknown): number {
  if (typeof row === "object" && row !== null && "count" in row && typeof row.count === "number") {
    return row.count;
  }
  return 0;
}
