/**
 * Schedule Database
 *
 * SQLite connection shared by the chunk store and the review history log,
 * and the transaction boundary for every scheduling mutation.
 *
 * - WAL mode with synchronous=NORMAL for crash resilience
 * - busy_timeout so a second process waits for the write lock
 * - Integrity check on open; a corrupted file is reported, never rebuilt,
 *   since rebuilding would discard learning progress
 */

import Database from "better-sqlite3";
import { mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import {
  ChunkRecallError,
  DataCorruptionError,
  StorageFailureError,
} from "../errors.js";
import { createLogger } from "../logger.js";

const log = createLogger("ScheduleDatabase");

export const IN_MEMORY = ":memory:";

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS chunks (
    deck_id TEXT NOT NULL,
    id TEXT NOT NULL,
    prompt TEXT NOT NULL,
    answer TEXT NOT NULL,
    ease_factor REAL NOT NULL,
    interval_days INTEGER NOT NULL,
    repetition_count INTEGER NOT NULL,
    due_at TEXT NOT NULL,
    created_at TEXT NOT NULL,
    last_reviewed_at TEXT,
    updated_at TEXT NOT NULL,
    PRIMARY KEY (deck_id, id)
  );

  CREATE INDEX IF NOT EXISTS idx_chunks_due
    ON chunks(deck_id, due_at, id);

  CREATE TABLE IF NOT EXISTS review_events (
    seq INTEGER PRIMARY KEY AUTOINCREMENT,
    id TEXT NOT NULL UNIQUE,
    deck_id TEXT NOT NULL,
    chunk_id TEXT NOT NULL,
    reviewed_at TEXT NOT NULL,
    quality TEXT NOT NULL,
    ease_factor_after REAL NOT NULL,
    interval_days_after INTEGER NOT NULL,
    repetition_count_after INTEGER NOT NULL,
    due_at_after TEXT NOT NULL,
    after_schedule_edit INTEGER NOT NULL DEFAULT 0
  );

  CREATE INDEX IF NOT EXISTS idx_review_events_chunk
    ON review_events(deck_id, chunk_id, reviewed_at, seq);
`;

const CORRUPTION_CODES = new Set(["SQLITE_CORRUPT", "SQLITE_CORRUPT_VTAB", "SQLITE_NOTADB"]);

/**
 * Convert a driver error into the domain taxonomy.
 * Domain errors thrown inside a transaction pass through unchanged.
 */
export function toStorageError(operation: string, error: unknown): unknown {
  if (error instanceof ChunkRecallError) {
    return error;
  }
  if (error instanceof Database.SqliteError) {
    if (CORRUPTION_CODES.has(error.code)) {
      return new DataCorruptionError(`Database file is corrupted (${operation})`, error);
    }
    return new StorageFailureError(`${operation} failed: ${error.message}`, error);
  }
  return error;
}

// =============================================================================
// ScheduleDatabase Class
// =============================================================================

/**
 * Owns the better-sqlite3 connection and a cache of prepared statements.
 *
 * Usage:
 * ```typescript
 * const database = await openScheduleDatabase("/path/to/chunks.db");
 * const updated = database.transaction("submit review", () => {
 *   // read, compute, write
 * });
 * database.close();
 * ```
 */
export class ScheduleDatabase {
  private readonly statements = new Map<string, Database.Statement>();

  constructor(
    private readonly db: Database.Database,
    readonly path: string
  ) {}

  /**
   * Prepare (or reuse) a statement.
   */
  statement(sql: string): Database.Statement {
    let stmt = this.statements.get(sql);
    if (!stmt) {
      stmt = this.db.prepare(sql);
      this.statements.set(sql, stmt);
    }
    return stmt;
  }

  /**
   * Run `work` inside BEGIN IMMEDIATE ... COMMIT. The write lock is taken up
   * front, so two read-modify-write cycles never interleave. Any throw rolls
   * the whole transaction back. Nested calls become savepoints.
   *
   * @throws StorageFailureError on driver failures (safe to retry)
   * @throws DataCorruptionError if SQLite reports a corrupted file
   */
  transaction<T>(operation: string, work: () => T): T {
    this.assertOpen(operation);
    try {
      return this.db.transaction(work).immediate();
    } catch (error) {
      const mapped = toStorageError(operation, error);
      if (mapped instanceof StorageFailureError) {
        log.warn(`${operation} rolled back: ${mapped.message}`);
      }
      throw mapped;
    }
  }

  /**
   * Run read-only `work` in a deferred transaction, so multi-statement reads
   * see one consistent snapshot.
   */
  read<T>(operation: string, work: () => T): T {
    this.assertOpen(operation);
    try {
      return this.db.transaction(work).deferred();
    } catch (error) {
      throw toStorageError(operation, error);
    }
  }

  isOpen(): boolean {
    return this.db.open;
  }

  close(): void {
    if (!this.db.open) return;
    this.statements.clear();
    this.db.close();
    log.info(`Closed database at ${this.path}`);
  }

  private assertOpen(operation: string): void {
    if (!this.db.open) {
      throw new StorageFailureError(`${operation} failed: database is closed`);
    }
  }
}

// =============================================================================
// Opening
// =============================================================================

/** How long a writer waits for another connection's write lock */
export const DEFAULT_BUSY_TIMEOUT_MS = 5000;

export interface OpenOptions {
  busyTimeoutMs?: number;
}

/**
 * Open (creating if needed) the schedule database and ensure the schema.
 *
 * @param path - SQLite file path, or ":memory:" for tests
 * @param options - busyTimeoutMs overrides the lock wait (tests shorten it)
 * @throws DataCorruptionError if the file is not a database or fails the integrity check
 * @throws StorageFailureError if the file cannot be opened
 */
export async function openScheduleDatabase(
  path: string,
  options: OpenOptions = {}
): Promise<ScheduleDatabase> {
  const busyTimeoutMs = options.busyTimeoutMs ?? DEFAULT_BUSY_TIMEOUT_MS;

  if (path !== IN_MEMORY) {
    try {
      await mkdir(dirname(path), { recursive: true });
    } catch (error) {
      throw new StorageFailureError(`Cannot create directory for ${path}`, error);
    }
  }

  let db: Database.Database;
  try {
    db = new Database(path, { timeout: busyTimeoutMs });
  } catch (error) {
    throw wrapOpenError(path, error);
  }

  try {
    if (path !== IN_MEMORY) {
      db.pragma("journal_mode = WAL");
    }
    db.pragma("synchronous = NORMAL");
    db.pragma(`busy_timeout = ${busyTimeoutMs}`);

    const integrity = db.pragma("integrity_check", { simple: true });
    if (integrity !== "ok") {
      throw new DataCorruptionError(
        `Database integrity check failed for ${path}: ${String(integrity)}`
      );
    }

    db.exec(SCHEMA);
  } catch (error) {
    db.close();
    throw wrapOpenError(path, error);
  }

  log.info(`Opened schedule database at ${path}`);
  return new ScheduleDatabase(db, path);
}

function wrapOpenError(path: string, error: unknown): unknown {
  const mapped = toStorageError(`open ${path}`, error);
  if (mapped instanceof ChunkRecallError) {
    return mapped;
  }
  return new StorageFailureError(`Cannot open database at ${path}`, error);
}
