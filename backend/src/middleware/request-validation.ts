/**
 * Request Validation
 *
 * Parses JSON bodies and path parameters against the shared zod schemas.
 * Failures throw InvalidInputError, which the REST error handler turns into
 * a 400 response.
 */

import type { Context } from "hono";
import type { z } from "zod";
import { ChunkIdSchema, TimestampSchema, formatValidationError } from "@chunk-recall/shared";
import { InvalidInputError } from "../errors";

/**
 * Read and validate a JSON request body.
 */
export async function readJsonBody<T>(
  c: Context,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<T> {
  let body: unknown;
  try {
    body = await c.req.json<unknown>();
  } catch {
    throw new InvalidInputError("Invalid JSON body");
  }

  const result = schema.safeParse(body);
  if (!result.success) {
    throw new InvalidInputError(formatValidationError(result.error));
  }
  return result.data;
}

/**
 * Read and validate the :chunkId path parameter.
 */
export function readChunkId(c: Context): string {
  const chunkId = c.req.param("chunkId") ?? "";
  const result = ChunkIdSchema.safeParse(chunkId);
  if (!result.success) {
    throw new InvalidInputError(
      "Invalid chunk ID format. Must be alphanumeric with hyphens or underscores."
    );
  }
  return result.data;
}

/**
 * Parse an optional ISO 8601 timestamp, falling back to `now`.
 */
export function parseTimestampOr(value: string | undefined, now: Date): Date {
  if (value === undefined) {
    return now;
  }
  if (!TimestampSchema.safeParse(value).success) {
    throw new InvalidInputError(`Invalid timestamp: ${value}`);
  }
  return new Date(value);
}
