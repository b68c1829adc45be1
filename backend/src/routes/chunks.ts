/**
 * Chunk Routes
 *
 * REST endpoints for chunk content and per-chunk schedule operations:
 * - GET /chunks - List every chunk in the deck
 * - POST /chunks - Add a chunk by hand
 * - PATCH /chunks - Edit prompt/answer of several chunks
 * - DELETE /chunks - Delete chunks and their review history
 * - POST /chunks/reset-schedule - Send chunks back to the start
 * - GET /chunks/:chunkId - Get one chunk
 * - GET /chunks/:chunkId/history - Review events of one chunk
 * - GET /chunks/:chunkId/progress - Ease factor series and totals of one chunk
 * - POST /chunks/:chunkId/recompute - Repair a chunk's schedule from its history
 *
 * All routes are under /api/decks/:deckId/ (deck middleware applied).
 */

import { Hono } from "hono";
import {
  BulkEditRequestSchema,
  ChunkIdsRequestSchema,
  NewChunkRequestSchema,
} from "@chunk-recall/shared";
import { type AppEnv, getDeckFromContext, getNow } from "../middleware/deck-resolution";
import { readChunkId, readJsonBody } from "../middleware/request-validation";
import { createLogger } from "../logger";

const log = createLogger("ChunkRoutes");

const chunkRoutes = new Hono<AppEnv>();

/**
 * GET /chunks
 */
chunkRoutes.get("/", (c) => {
  const chunks = getDeckFromContext(c).listChunks();
  return c.json({ chunks, count: chunks.length });
});

/**
 * POST /chunks
 *
 * Manual entry. The new chunk is due immediately.
 */
chunkRoutes.post("/", async (c) => {
  const body = await readJsonBody(c, NewChunkRequestSchema);
  const chunk = getDeckFromContext(c).addChunk(body, getNow(c));
  return c.json(chunk, 201);
});

/**
 * PATCH /chunks
 *
 * Content edits only; scheduling state is untouched. All or nothing.
 */
chunkRoutes.patch("/", async (c) => {
  const { edits } = await readJsonBody(c, BulkEditRequestSchema);
  log.info(`Editing ${edits.length} chunks`);
  const chunks = getDeckFromContext(c).updateChunks(edits, getNow(c));
  return c.json({ chunks, count: chunks.length });
});

/**
 * DELETE /chunks
 */
chunkRoutes.delete("/", async (c) => {
  const { ids } = await readJsonBody(c, ChunkIdsRequestSchema);
  log.info(`Deleting ${ids.length} chunks`);
  return c.json(getDeckFromContext(c).deleteChunks(ids));
});

/**
 * POST /chunks/reset-schedule
 */
chunkRoutes.post("/reset-schedule", async (c) => {
  const { ids } = await readJsonBody(c, ChunkIdsRequestSchema);
  log.info(`Resetting schedules of ${ids.length} chunks`);
  const chunks = getDeckFromContext(c).resetSchedules(ids, getNow(c));
  return c.json({ chunks, count: chunks.length });
});

/**
 * GET /chunks/:chunkId
 */
chunkRoutes.get("/:chunkId", (c) => {
  const chunkId = readChunkId(c);
  return c.json(getDeckFromContext(c).getChunk(chunkId));
});

/**
 * GET /chunks/:chunkId/history
 */
chunkRoutes.get("/:chunkId/history", (c) => {
  const chunkId = readChunkId(c);
  const events = getDeckFromContext(c).getHistory(chunkId);
  return c.json({ chunk_id: chunkId, events, count: events.length });
});

/**
 * GET /chunks/:chunkId/progress
 */
chunkRoutes.get("/:chunkId/progress", (c) => {
  const chunkId = readChunkId(c);
  return c.json(getDeckFromContext(c).getChunkProgress(chunkId, getNow(c)));
});

/**
 * POST /chunks/:chunkId/recompute
 *
 * The repair path for DATA_CORRUPTION responses.
 */
chunkRoutes.post("/:chunkId/recompute", (c) => {
  const chunkId = readChunkId(c);
  log.info(`Recomputing chunk ${chunkId} from history`);
  return c.json(getDeckFromContext(c).recomputeFromHistory(chunkId, getNow(c)));
});

export { chunkRoutes };
