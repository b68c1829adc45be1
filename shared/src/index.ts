/**
 * Chunk Recall Shared Types and Protocols
 *
 * This package contains:
 * - Zod schemas for REST request/response validation
 * - TypeScript types for chunk records and review events
 */

// Core types
export type { ReviewQuality, ErrorCode } from "./types.js";

// Protocol schemas
export {
  // Primitives
  TimestampSchema,
  ChunkIdSchema,
  DeckIdSchema,
  ReviewQualitySchema,
  ErrorCodeSchema,
  // Records
  ChunkRecordSchema,
  ReviewEventRecordSchema,
  // Requests
  NewChunkRequestSchema,
  ReviewRequestSchema,
  ImportRecordSchema,
  ImportRequestSchema,
  ChunkEditSchema,
  BulkEditRequestSchema,
  ChunkIdsRequestSchema,
  WipeRequestSchema,
  // Responses
  ExportDocumentSchema,
  ImportResultSchema,
  TodayBatchResponseSchema,
  RecomputeResponseSchema,
  StreaksSchema,
  ProgressSummarySchema,
  EaseFactorPointSchema,
  ChunkProgressSchema,
  DeleteResultSchema,
  ErrorResponseSchema,
  // Utilities
  formatValidationError,
} from "./protocol.js";

// Protocol types
export type {
  ChunkRecord,
  ReviewEventRecord,
  NewChunkRequest,
  ReviewRequest,
  ImportRecord,
  ImportRequest,
  ChunkEdit,
  BulkEditRequest,
  ChunkIdsRequest,
  ExportDocument,
  ImportResult,
  TodayBatchResponse,
  RecomputeResponse,
  Streaks,
  ProgressSummary,
  EaseFactorPoint,
  ChunkProgress,
  DeleteResult,
  ErrorResponse,
} from "./protocol.js";
