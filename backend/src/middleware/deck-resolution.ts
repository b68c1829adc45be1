/**
 * Deck Resolution Middleware
 *
 * Hono middleware that resolves the :deckId path parameter to a ChunkManager
 * bound to that deck's namespace. Rejects malformed deck ids before any
 * storage access.
 */

import type { Context, MiddlewareHandler } from "hono";
import { DeckIdSchema, type ErrorCode } from "@chunk-recall/shared";
import {
  createChunkManager,
  type ChunkManager,
  type ScheduleDatabase,
} from "../spaced-repetition";

/**
 * Error response format for REST endpoints.
 */
export interface RestErrorResponse {
  error: {
    code: ErrorCode;
    message: string;
  };
}

/** Status codes the REST layer answers errors with */
export type ErrorStatus = 400 | 404 | 500 | 503;

/**
 * Hono environment shared by the app and every route module.
 *
 * - database and clock are set once per request by createApp
 * - deck is set by deckResolution for routes under /api/decks/:deckId
 */
export interface AppEnv {
  Variables: {
    database: ScheduleDatabase;
    clock: () => Date;
    deck: ChunkManager;
  };
}

/**
 * Validates deck id format.
 */
export function isValidDeckId(deckId: string): boolean {
  return DeckIdSchema.safeParse(deckId).success;
}

/**
 * Creates a JSON error response with the proper format.
 */
export function jsonError(c: Context, status: ErrorStatus, code: ErrorCode, message: string) {
  const body: RestErrorResponse = {
    error: {
      code,
      message,
    },
  };
  return c.json(body, status);
}

/**
 * Middleware that binds a ChunkManager for :deckId.
 * Sets it in context for downstream handlers via c.set("deck", manager).
 */
export function deckResolution(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const deckId = c.req.param("deckId");

    if (!deckId || !isValidDeckId(deckId)) {
      return jsonError(
        c,
        400,
        "INVALID_INPUT",
        "Invalid deck ID format. Must be alphanumeric with hyphens or underscores."
      );
    }

    c.set("deck", createChunkManager(c.get("database"), deckId));
    await next();
  };
}

/**
 * Helper to get the deck's manager in route handlers after the middleware runs.
 */
export function getDeckFromContext(c: Context<AppEnv>): ChunkManager {
  return c.get("deck");
}

/**
 * Current time from the injected clock.
 */
export function getNow(c: Context<AppEnv>): Date {
  return c.get("clock")();
}
