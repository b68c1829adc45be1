/**
 * Chunk Recall REST Protocol
 *
 * Zod schemas for validating request and response bodies exchanged between
 * the backend and its UI collaborators.
 */

import { z } from "zod";

// =============================================================================
// Primitives
// =============================================================================

/**
 * ISO 8601 timestamp. Offsets other than Z are accepted and normalized to UTC
 * by the backend before they are stored.
 */
export const TimestampSchema = z.string().datetime({ offset: true });

/**
 * Chunk identifier. Generated ids are UUIDs; imported ids may be any
 * URL-safe token.
 */
export const ChunkIdSchema = z
  .string()
  .regex(
    /^[A-Za-z0-9][A-Za-z0-9_-]{0,127}$/,
    "Chunk ID must be alphanumeric with hyphens or underscores (max 128 chars)"
  );

/**
 * Deck identifier (opaque learner/deck namespace).
 */
export const DeckIdSchema = z
  .string()
  .regex(
    /^[a-zA-Z0-9][a-zA-Z0-9_-]{0,99}$/,
    "Deck ID must be alphanumeric with hyphens or underscores"
  );

/**
 * Schema for ReviewQuality values
 */
export const ReviewQualitySchema = z.enum(["hard", "good", "easy"]);

/**
 * Schema for ErrorCode enum values
 */
export const ErrorCodeSchema = z.enum([
  "INVALID_INPUT",
  "NOT_FOUND",
  "STORAGE_FAILURE",
  "DATA_CORRUPTION",
  "INTERNAL_ERROR",
]);

const PromptSchema = z.string().trim().min(1, "Prompt is required");
const AnswerSchema = z.string().trim().min(1, "Answer is required");
const EaseFactorSchema = z.number().finite().min(1.3, "Ease factor must be at least 1.3");
const IntervalDaysSchema = z.number().int().min(0);
const RepetitionCountSchema = z.number().int().min(0);

// =============================================================================
// Records
// =============================================================================

/**
 * A chunk with its content and full scheduling state.
 */
export const ChunkRecordSchema = z.object({
  id: ChunkIdSchema,
  prompt: PromptSchema,
  answer: AnswerSchema,
  ease_factor: EaseFactorSchema,
  interval_days: IntervalDaysSchema,
  repetition_count: RepetitionCountSchema,
  due_at: TimestampSchema,
  created_at: TimestampSchema,
  last_reviewed_at: TimestampSchema.nullable(),
  updated_at: TimestampSchema,
});

/**
 * One entry of a chunk's review history.
 */
export const ReviewEventRecordSchema = z.object({
  id: z.string().min(1),
  chunk_id: ChunkIdSchema,
  reviewed_at: TimestampSchema,
  quality: ReviewQualitySchema,
  ease_factor_after: EaseFactorSchema,
  interval_days_after: IntervalDaysSchema,
  repetition_count_after: RepetitionCountSchema,
  due_at_after: TimestampSchema,
  /**
   * The chunk's schedule was written outside a review (reset, import) since
   * the previous event, so this event does not follow from that snapshot.
   */
  after_schedule_edit: z.boolean(),
});

// =============================================================================
// Requests
// =============================================================================

/**
 * POST /chunks - manual entry of a single chunk
 */
export const NewChunkRequestSchema = z.object({
  prompt: PromptSchema,
  answer: AnswerSchema,
});

/**
 * POST /chunks/:chunkId/review
 */
export const ReviewRequestSchema = z.object({
  quality: ReviewQualitySchema,
  /** Defaults to the server clock when omitted */
  reviewed_at: TimestampSchema.optional(),
});

/**
 * A single record accepted by import. Scheduling fields are optional;
 * missing ones take the defaults of a new chunk.
 */
export const ImportRecordSchema = z.object({
  id: ChunkIdSchema.optional(),
  prompt: PromptSchema,
  answer: AnswerSchema,
  ease_factor: EaseFactorSchema.optional(),
  interval_days: IntervalDaysSchema.optional(),
  repetition_count: RepetitionCountSchema.optional(),
  due_at: TimestampSchema.optional(),
  created_at: TimestampSchema.optional(),
  last_reviewed_at: TimestampSchema.nullable().optional(),
});

/**
 * POST /import
 */
export const ImportRequestSchema = z.object({
  chunks: z.array(ImportRecordSchema),
});

/**
 * One content edit in a bulk edit request.
 */
export const ChunkEditSchema = z
  .object({
    id: ChunkIdSchema,
    prompt: PromptSchema.optional(),
    answer: AnswerSchema.optional(),
  })
  .refine((edit) => edit.prompt !== undefined || edit.answer !== undefined, {
    message: "Edit must change prompt or answer",
  });

/**
 * PATCH /chunks
 */
export const BulkEditRequestSchema = z.object({
  edits: z.array(ChunkEditSchema).min(1, "At least one edit is required"),
});

/**
 * DELETE /chunks and POST /chunks/reset-schedule
 */
export const ChunkIdsRequestSchema = z.object({
  ids: z.array(ChunkIdSchema).min(1, "At least one chunk ID is required"),
});

/**
 * POST /reset - the caller must confirm the wipe explicitly
 */
export const WipeRequestSchema = z.object({
  confirm: z.literal(true),
});

// =============================================================================
// Responses
// =============================================================================

/**
 * GET /export, also accepted as-is by POST /import
 */
export const ExportDocumentSchema = z.object({
  version: z.literal(1),
  exported_at: TimestampSchema,
  chunks: z.array(ChunkRecordSchema),
});

export const ImportResultSchema = z.object({
  imported: z.number().int().min(0),
  created: z.number().int().min(0),
  updated: z.number().int().min(0),
});

export const TodayBatchResponseSchema = z.object({
  chunks: z.array(ChunkRecordSchema).max(5),
  count: z.number().int().min(0).max(5),
});

export const RecomputeResponseSchema = z.object({
  chunk: ChunkRecordSchema,
  events_replayed: z.number().int().min(0),
  inconsistent_event_ids: z.array(z.string()),
});

export const StreaksSchema = z.object({
  current: z.number().int().min(0),
  longest: z.number().int().min(0),
});

export const ProgressSummarySchema = z.object({
  total_chunks: z.number().int().min(0),
  due_now: z.number().int().min(0),
  new_chunks: z.number().int().min(0),
  total_reviews: z.number().int().min(0),
  pass_rate: z.number().min(0).max(1).nullable(),
  average_ease_factor: z.number().nullable(),
  streaks: StreaksSchema,
});

export const EaseFactorPointSchema = z.object({
  reviewed_at: TimestampSchema,
  ease_factor: EaseFactorSchema,
  interval_days: IntervalDaysSchema,
});

/**
 * GET /chunks/:chunkId/progress
 */
export const ChunkProgressSchema = z.object({
  summary: ProgressSummarySchema,
  ease_factor_series: z.array(EaseFactorPointSchema),
});

export const DeleteResultSchema = z.object({
  chunks_deleted: z.number().int().min(0),
  events_deleted: z.number().int().min(0),
});

/**
 * Error body returned by every REST endpoint on failure
 */
export const ErrorResponseSchema = z.object({
  error: z.object({
    code: ErrorCodeSchema,
    message: z.string().min(1, "Error message is required"),
  }),
});

// =============================================================================
// TypeScript Types (inferred from schemas)
// =============================================================================

export type ChunkRecord = z.infer<typeof ChunkRecordSchema>;
export type ReviewEventRecord = z.infer<typeof ReviewEventRecordSchema>;
export type NewChunkRequest = z.infer<typeof NewChunkRequestSchema>;
export type ReviewRequest = z.infer<typeof ReviewRequestSchema>;
export type ImportRecord = z.infer<typeof ImportRecordSchema>;
export type ImportRequest = z.infer<typeof ImportRequestSchema>;
export type ChunkEdit = z.infer<typeof ChunkEditSchema>;
export type BulkEditRequest = z.infer<typeof BulkEditRequestSchema>;
export type ChunkIdsRequest = z.infer<typeof ChunkIdsRequestSchema>;
export type ExportDocument = z.infer<typeof ExportDocumentSchema>;
export type ImportResult = z.infer<typeof ImportResultSchema>;
export type TodayBatchResponse = z.infer<typeof TodayBatchResponseSchema>;
export type RecomputeResponse = z.infer<typeof RecomputeResponseSchema>;
export type Streaks = z.infer<typeof StreaksSchema>;
export type ProgressSummary = z.infer<typeof ProgressSummarySchema>;
export type EaseFactorPoint = z.infer<typeof EaseFactorPointSchema>;
export type ChunkProgress = z.infer<typeof ChunkProgressSchema>;
export type DeleteResult = z.infer<typeof DeleteResultSchema>;
export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;

// =============================================================================
// Utilities
// =============================================================================

/**
 * Format a Zod validation error into a single human-readable line.
 */
export function formatValidationError(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${path}: ${issue.message}`;
    })
    .join("; ");
}
