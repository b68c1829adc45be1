/**
 * Error Handling Middleware
 *
 * Hono error handler that maps domain exceptions to HTTP status codes
 * with JSON error bodies of the form { error: { code, message } }.
 */

import type { Context, ErrorHandler } from "hono";
import type { ErrorCode } from "@chunk-recall/shared";
import { isChunkRecallError } from "../errors";
import { createLogger } from "../logger";
import { type ErrorStatus, type RestErrorResponse, jsonError } from "./deck-resolution";

const log = createLogger("ErrorHandler");

/**
 * Maps error codes to HTTP status codes.
 *
 * - INVALID_INPUT: 400 Bad Request (caller error, never retried)
 * - NOT_FOUND: 404 Not Found
 * - STORAGE_FAILURE: 503 Service Unavailable (rolled back, safe to retry)
 * - DATA_CORRUPTION: 500 (repair via the recompute endpoint)
 * - INTERNAL_ERROR and unknown: 500 Internal Server Error
 */
export function mapErrorCodeToStatus(code: ErrorCode): ErrorStatus {
  switch (code) {
    case "INVALID_INPUT":
      return 400;
    case "NOT_FOUND":
      return 404;
    case "STORAGE_FAILURE":
      return 503;
    case "DATA_CORRUPTION":
    case "INTERNAL_ERROR":
    default:
      return 500;
  }
}

/**
 * Logs error details server-side with context.
 *
 * Stack traces are logged but never exposed in responses.
 */
function logError(c: Context, error: unknown): void {
  const method = c.req.method;
  const path = c.req.path;

  if (isChunkRecallError(error)) {
    if (error.code === "DATA_CORRUPTION") {
      log.error(`${method} ${path} - ${error.code}: ${error.message}`);
    } else {
      log.warn(`${method} ${path} - ${error.code}: ${error.message}`);
    }
  } else if (error instanceof Error) {
    log.error(`${method} ${path} - Unexpected error: ${error.message}`, {
      stack: error.stack,
    });
  } else {
    log.error(`${method} ${path} - Unknown error type`, { error });
  }
}

/**
 * Hono error handler for REST API routes.
 *
 * Usage:
 * ```typescript
 * app.onError(restErrorHandler);
 * ```
 */
export const restErrorHandler: ErrorHandler = (err, c) => {
  logError(c, err);

  if (isChunkRecallError(err)) {
    return jsonError(c, mapErrorCodeToStatus(err.code), err.code, err.message);
  }

  // Safe message only; no internal details or stack traces
  return jsonError(
    c,
    500,
    "INTERNAL_ERROR",
    "An unexpected error occurred. Please try again later."
  );
};

export type { RestErrorResponse };
