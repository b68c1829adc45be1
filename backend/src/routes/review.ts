/**
 * Review Routes
 *
 * REST endpoints for the daily review session:
 * - GET /review/today - Up to five due chunks, oldest due first
 * - POST /chunks/:chunkId/review - Submit a grade (hard, good, easy)
 *
 * All routes are under /api/decks/:deckId/ (deck middleware applied).
 */

import { Hono } from "hono";
import { ReviewRequestSchema } from "@chunk-recall/shared";
import { type AppEnv, getDeckFromContext, getNow } from "../middleware/deck-resolution";
import { parseTimestampOr, readChunkId, readJsonBody } from "../middleware/request-validation";
import { createLogger } from "../logger";

const log = createLogger("ReviewRoutes");

const reviewRoutes = new Hono<AppEnv>();

/**
 * GET /review/today
 *
 * Never backfills: fewer than five due means a shorter batch.
 */
reviewRoutes.get("/review/today", (c) => {
  const chunks = getDeckFromContext(c).getTodayBatch(getNow(c));
  log.info(`Found ${chunks.length} due chunks`);
  return c.json({ chunks, count: chunks.length });
});

/**
 * POST /chunks/:chunkId/review
 *
 * reviewed_at defaults to the server clock.
 */
reviewRoutes.post("/chunks/:chunkId/review", async (c) => {
  const chunkId = readChunkId(c);
  const body = await readJsonBody(c, ReviewRequestSchema);
  const reviewedAt = parseTimestampOr(body.reviewed_at, getNow(c));

  log.info(`Submitting review for chunk ${chunkId}: quality=${body.quality}`);
  const chunk = getDeckFromContext(c).submitReview(chunkId, body.quality, reviewedAt);
  log.info(
    `Chunk ${chunkId} reviewed: due_at=${chunk.due_at}, interval=${chunk.interval_days}`
  );

  return c.json(chunk);
});

export { reviewRoutes };
