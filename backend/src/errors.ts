/**
 * Domain Errors
 *
 * Every error the scheduling core raises on purpose extends ChunkRecallError
 * and carries an ErrorCode, which the REST error handler maps to a status.
 */

import type { ErrorCode } from "@chunk-recall/shared";

export class ChunkRecallError extends Error {
  readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ChunkRecallError";
    this.code = code;
  }
}

/**
 * Malformed grade or request, or scheduling state outside its invariants.
 * Caller error; never retried.
 */
export class InvalidInputError extends ChunkRecallError {
  constructor(message: string) {
    super(message, "INVALID_INPUT");
    this.name = "InvalidInputError";
  }
}

/**
 * Operation on a chunk id that does not exist in the deck.
 */
export class NotFoundError extends ChunkRecallError {
  constructor(message: string) {
    super(message, "NOT_FOUND");
    this.name = "NotFoundError";
  }
}

/**
 * I/O or transaction failure. The transaction was rolled back, so the
 * operation is safe to retry.
 */
export class StorageFailureError extends ChunkRecallError {
  constructor(message: string, cause?: unknown) {
    super(message, "STORAGE_FAILURE", { cause });
    this.name = "StorageFailureError";
  }
}

/**
 * Persisted state violates invariants. Not recoverable locally; the only
 * repair path is recomputation from the review history.
 */
export class DataCorruptionError extends ChunkRecallError {
  constructor(message: string, cause?: unknown) {
    super(message, "DATA_CORRUPTION", { cause });
    this.name = "DataCorruptionError";
  }
}

/**
 * Determines if an error is a ChunkRecallError.
 *
 * Checks for a known `code` property as well, since instanceof checks can
 * fail across module boundaries.
 */
export function isChunkRecallError(error: unknown): error is ChunkRecallError {
  if (error instanceof ChunkRecallError) {
    return true;
  }

  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    const knownCodes: readonly string[] = [
      "INVALID_INPUT",
      "NOT_FOUND",
      "STORAGE_FAILURE",
      "DATA_CORRUPTION",
    ];
    return knownCodes.includes(error.code);
  }

  return false;
}
