/**
 * Chunk Recall Shared Types
 *
 * Core type definitions shared by the backend and any UI collaborator.
 */

/**
 * Grade the learner gives a chunk after trying to recall it.
 *
 * The three buttons are mapped onto the SM-2 0-5 quality scale by the
 * scheduler; "hard" counts as a failed recall.
 */
export type ReviewQuality = "hard" | "good" | "easy";

/**
 * Error codes returned in REST error bodies.
 *
 * - INVALID_INPUT: malformed request or out-of-invariant scheduling state
 * - NOT_FOUND: operation on a chunk id that does not exist in the deck
 * - STORAGE_FAILURE: I/O or transaction failure, safe to retry
 * - DATA_CORRUPTION: persisted state violates invariants, repair via recompute
 * - INTERNAL_ERROR: anything else
 */
export type ErrorCode =
  | "INVALID_INPUT"
  | "NOT_FOUND"
  | "STORAGE_FAILURE"
  | "DATA_CORRUPTION"
  | "INTERNAL_ERROR";
