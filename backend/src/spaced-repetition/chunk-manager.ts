/**
 * Chunk Manager
 *
 * High-level operations on one deck. Coordinates chunk-store, review-history,
 * sm2-algorithm and due-selector, and owns the transaction boundary: every
 * mutation runs as one IMMEDIATE transaction, so the chunk update and the
 * paired history append are committed together or not at all.
 */

import { randomUUID } from "node:crypto";
import type {
  ChunkEdit,
  ChunkProgress,
  DeleteResult,
  ExportDocument,
  ImportRecord,
  ImportResult,
  ProgressSummary,
  RecomputeResponse,
  ReviewQuality,
} from "@chunk-recall/shared";
import { InvalidInputError, NotFoundError } from "../errors.js";
import { createLogger } from "../logger.js";
import {
  createNewChunk,
  normalizeTimestamp,
  toTimestamp,
  type Chunk,
  type ChunkContent,
  type ReviewEvent,
} from "./chunk-schema.js";
import { SqliteChunkStore, type ChunkStore } from "./chunk-store.js";
import type { ScheduleDatabase } from "./database.js";
import { selectTodayBatch } from "./due-selector.js";
import { easeFactorSeries, summarizeProgress } from "./progress.js";
import { SqliteReviewHistory, type ReviewHistoryLog } from "./review-history.js";
import { calculateSM2, isValidQuality, verifyHistory } from "./sm2-algorithm.js";

const log = createLogger("ChunkManager");

// =============================================================================
// Types
// =============================================================================

/**
 * Transaction boundary the manager needs. ScheduleDatabase implements it.
 */
export interface TransactionRunner {
  transaction<T>(operation: string, work: () => T): T;
  read<T>(operation: string, work: () => T): T;
}

export interface ChunkManagerDeps {
  transactions: TransactionRunner;
  store: ChunkStore;
  history: ReviewHistoryLog;
  /** Id source for new chunks and events (defaults to UUID v4) */
  generateId?: () => string;
}

// =============================================================================
// ChunkManager Class
// =============================================================================

export class ChunkManager {
  private readonly transactions: TransactionRunner;
  private readonly store: ChunkStore;
  private readonly history: ReviewHistoryLog;
  private readonly generateId: () => string;

  constructor(deps: ChunkManagerDeps) {
    this.transactions = deps.transactions;
    this.store = deps.store;
    this.history = deps.history;
    this.generateId = deps.generateId ?? randomUUID;
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  /** @throws NotFoundError, DataCorruptionError */
  getChunk(id: string): Chunk {
    return this.transactions.read("get chunk", () => this.store.get(id));
  }

  listChunks(): Chunk[] {
    return this.transactions.read("list chunks", () => this.store.listAll());
  }

  /**
   * Up to five chunks due at `now`, oldest due first.
   */
  getTodayBatch(now: Date): Chunk[] {
    return this.transactions.read("select today batch", () => selectTodayBatch(this.store, now));
  }

  /**
   * Review events of one chunk, oldest first. Works on a chunk whose row is
   * corrupted, since the history is what repairs it.
   */
  getHistory(chunkId: string): ReviewEvent[] {
    return this.transactions.read("get history", () => {
      this.assertExists(chunkId);
      return this.history.listForChunk(chunkId);
    });
  }

  getProgress(now: Date): ProgressSummary {
    return this.transactions.read("get progress", () =>
      summarizeProgress(this.store.listAll(), this.history.listAll(), now)
    );
  }

  getChunkProgress(chunkId: string, now: Date): ChunkProgress {
    return this.transactions.read("get chunk progress", () => {
      const chunk = this.store.get(chunkId);
      const events = this.history.listForChunk(chunkId);
      return {
        summary: summarizeProgress([chunk], events, now),
        ease_factor_series: easeFactorSeries(events),
      };
    });
  }

  exportChunks(now: Date): ExportDocument {
    const chunks = this.transactions.read("export", () => this.store.listAll());
    log.info(`Exported ${chunks.length} chunks`);
    return { version: 1, exported_at: toTimestamp(now), chunks };
  }

  // ---------------------------------------------------------------------------
  // Review
  // ---------------------------------------------------------------------------

  /**
   * Grade a chunk: read its state, apply SM-2, write the new state and append
   * the review event, all in one transaction.
   *
   * @throws InvalidInputError for an unknown grade, an invalid time, or a
   *   time earlier than the chunk's last review
   * @throws NotFoundError if the chunk does not exist
   * @throws DataCorruptionError if the stored state violates its invariants
   */
  submitReview(chunkId: string, quality: ReviewQuality, at: Date): Chunk {
    if (!isValidQuality(quality)) {
      throw new InvalidInputError(`Unknown review quality: ${String(quality)}`);
    }
    const reviewedAt = toTimestamp(at);

    return this.transactions.transaction("submit review", () => {
      const chunk = this.store.get(chunkId);
      const latest = this.history.latestForChunk(chunkId);
      // The history is ordered by reviewed_at; the new event must sort last
      const lastReviewedAt = latestTimestamp(chunk.last_reviewed_at, latest?.reviewed_at ?? null);
      if (lastReviewedAt !== null && reviewedAt < lastReviewedAt) {
        throw new InvalidInputError(
          `Review time ${reviewedAt} is earlier than the last review of ${chunkId} (${lastReviewedAt})`
        );
      }
      const result = calculateSM2(chunk, quality, at);

      const updated = this.store.upsert({
        ...chunk,
        ease_factor: result.ease_factor,
        interval_days: result.interval_days,
        repetition_count: result.repetition_count,
        due_at: result.due_at,
        last_reviewed_at: reviewedAt,
        updated_at: reviewedAt,
      });

      this.history.append({
        id: this.generateId(),
        chunk_id: chunkId,
        reviewed_at: reviewedAt,
        quality,
        ease_factor_after: result.ease_factor,
        interval_days_after: result.interval_days,
        repetition_count_after: result.repetition_count,
        due_at_after: result.due_at,
        after_schedule_edit: latest !== null && !matchesSnapshot(chunk, latest),
      });

      log.debug(
        `Reviewed ${chunkId}: quality=${quality}, interval=${result.interval_days}, ` +
          `ef=${result.ease_factor}`
      );
      return updated;
    });
  }

  // ---------------------------------------------------------------------------
  // Content
  // ---------------------------------------------------------------------------

  /**
   * Manual entry of one chunk with the default schedule (due immediately).
   */
  addChunk(content: ChunkContent, now: Date): Chunk {
    const chunk = createNewChunk(this.generateId(), content, now);
    const stored = this.transactions.transaction("add chunk", () => this.store.upsert(chunk));
    log.info(`Added chunk ${stored.id}`);
    return stored;
  }

  /**
   * Import records in one transaction.
   *
   * - A record with an id overwrites the chunk with that id, so importing the
   *   same export twice leaves the schedule unchanged.
   * - Scheduling fields present on the record are restored; missing ones keep
   *   the existing chunk's value, or the new-chunk default.
   */
  importChunks(records: readonly ImportRecord[], now: Date): ImportResult {
    const updatedAt = toTimestamp(now);

    const result = this.transactions.transaction("import", () => {
      let created = 0;
      let updated = 0;

      for (const record of records) {
        const id = record.id ?? this.generateId();
        const existing = this.store.exists(id) ? this.store.get(id) : null;
        const base = existing ?? createNewChunk(id, record, now);

        this.store.upsert({
          ...base,
          prompt: record.prompt,
          answer: record.answer,
          ease_factor: record.ease_factor ?? base.ease_factor,
          interval_days: record.interval_days ?? base.interval_days,
          repetition_count: record.repetition_count ?? base.repetition_count,
          due_at: record.due_at !== undefined ? normalizeTimestamp(record.due_at) : base.due_at,
          created_at:
            record.created_at !== undefined
              ? normalizeTimestamp(record.created_at)
              : base.created_at,
          last_reviewed_at:
            record.last_reviewed_at === undefined
              ? base.last_reviewed_at
              : record.last_reviewed_at === null
                ? null
                : normalizeTimestamp(record.last_reviewed_at),
          updated_at: updatedAt,
        });

        if (existing) {
          updated++;
        } else {
          created++;
        }
      }

      return { imported: records.length, created, updated };
    });

    log.info(`Imported ${result.imported} chunks (${result.created} new, ${result.updated} updated)`);
    return result;
  }

  /**
   * Change prompt and/or answer of existing chunks. Scheduling state is
   * untouched. All edits apply or none do.
   */
  updateChunks(edits: readonly ChunkEdit[], now: Date): Chunk[] {
    const updatedAt = toTimestamp(now);
    return this.transactions.transaction("update chunks", () =>
      edits.map((edit) => {
        const chunk = this.store.get(edit.id);
        return this.store.upsert({
          ...chunk,
          prompt: edit.prompt ?? chunk.prompt,
          answer: edit.answer ?? chunk.answer,
          updated_at: updatedAt,
        });
      })
    );
  }

  /**
   * Delete chunks and their review events.
   * @throws NotFoundError if any id is unknown (nothing is deleted)
   */
  deleteChunks(ids: readonly string[]): DeleteResult {
    const result = this.transactions.transaction("delete chunks", () => {
      for (const id of ids) {
        this.assertExists(id);
      }
      const eventsDeleted = this.history.deleteForChunks(ids);
      return { chunks_deleted: this.store.delete(ids), events_deleted: eventsDeleted };
    });
    log.info(`Deleted ${result.chunks_deleted} chunks and ${result.events_deleted} events`);
    return result;
  }

  /**
   * Send chunks back to the start of the learning sequence: interval 0,
   * no repetitions, due now. The ease factor and the history are kept.
   */
  resetSchedules(ids: readonly string[], now: Date): Chunk[] {
    const timestamp = toTimestamp(now);
    return this.transactions.transaction("reset schedules", () =>
      ids.map((id) => {
        const chunk = this.store.get(id);
        return this.store.upsert({
          ...chunk,
          interval_days: 0,
          repetition_count: 0,
          due_at: timestamp,
          updated_at: timestamp,
        });
      })
    );
  }

  // ---------------------------------------------------------------------------
  // Repair and reset
  // ---------------------------------------------------------------------------

  /**
   * Repair a chunk's schedule from its review history. The latest event's
   * snapshot becomes the chunk's state; the stored row is overwritten
   * without being read, so this works on a row that fails validation.
   *
   * @throws NotFoundError if the chunk does not exist
   * @throws InvalidInputError if the chunk has never been reviewed
   */
  recomputeFromHistory(chunkId: string, now: Date): RecomputeResponse {
    const updatedAt = toTimestamp(now);

    const response = this.transactions.transaction("recompute", () => {
      this.assertExists(chunkId);
      const events = this.history.listForChunk(chunkId);
      const latest = events.at(-1);
      if (!latest) {
        throw new InvalidInputError(
          `Chunk ${chunkId} has no review history to recompute from`
        );
      }

      this.store.writeSchedule(chunkId, {
        ease_factor: latest.ease_factor_after,
        interval_days: latest.interval_days_after,
        repetition_count: latest.repetition_count_after,
        due_at: latest.due_at_after,
        last_reviewed_at: latest.reviewed_at,
        updated_at: updatedAt,
      });

      return {
        chunk: this.store.get(chunkId),
        events_replayed: events.length,
        inconsistent_event_ids: verifyHistory(events),
      };
    });

    if (response.inconsistent_event_ids.length > 0) {
      log.warn(
        `Recomputed ${chunkId}; ${response.inconsistent_event_ids.length} events disagree with a replay`
      );
    } else {
      log.info(`Recomputed ${chunkId} from ${response.events_replayed} events`);
    }
    return response;
  }

  /**
   * Delete every chunk and review event of the deck. Irreversible; the
   * caller is responsible for confirming.
   */
  wipeAll(): DeleteResult {
    const result = this.transactions.transaction("wipe deck", () => {
      const eventsDeleted = this.history.deleteAll();
      return { chunks_deleted: this.store.deleteAll(), events_deleted: eventsDeleted };
    });
    log.warn(`Wiped deck: ${result.chunks_deleted} chunks, ${result.events_deleted} events`);
    return result;
  }

  private assertExists(chunkId: string): void {
    if (!this.store.exists(chunkId)) {
      throw new NotFoundError(`Chunk not found: ${chunkId}`);
    }
  }
}

function latestTimestamp(a: string | null, b: string | null): string | null {
  if (a === null) return b;
  if (b === null) return a;
  return a > b ? a : b;
}

/**
 * Whether the chunk still holds the schedule an event produced.
 */
function matchesSnapshot(chunk: Chunk, event: ReviewEvent): boolean {
  return (
    chunk.ease_factor === event.ease_factor_after &&
    chunk.interval_days === event.interval_days_after &&
    chunk.repetition_count === event.repetition_count_after &&
    chunk.due_at === event.due_at_after
  );
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Create a manager for one deck on a shared database.
 */
export function createChunkManager(
  database: ScheduleDatabase,
  deckId: string,
  generateId?: () => string
): ChunkManager {
  return new ChunkManager({
    transactions: database,
    store: new SqliteChunkStore(database, deckId),
    history: new SqliteReviewHistory(database, deckId),
    generateId,
  });
}
