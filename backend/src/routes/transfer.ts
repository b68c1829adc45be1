/**
 * Transfer Routes
 *
 * Bulk data tools for a deck:
 * - POST /import - Import chunks, restoring scheduling state when present
 * - GET /export - Every chunk with its full scheduling state
 * - POST /reset - Delete every chunk and review event (requires { confirm: true })
 *
 * An export document is accepted as-is by import, and importing it back
 * leaves every schedule unchanged.
 *
 * All routes are under /api/decks/:deckId/ (deck middleware applied).
 */

import { Hono } from "hono";
import { ImportRequestSchema, WipeRequestSchema } from "@chunk-recall/shared";
import { type AppEnv, getDeckFromContext, getNow } from "../middleware/deck-resolution";
import { readJsonBody } from "../middleware/request-validation";
import { createLogger } from "../logger";

const log = createLogger("TransferRoutes");

const transferRoutes = new Hono<AppEnv>();

/**
 * POST /import
 */
transferRoutes.post("/import", async (c) => {
  const { chunks } = await readJsonBody(c, ImportRequestSchema);
  log.info(`Importing ${chunks.length} chunks`);
  return c.json(getDeckFromContext(c).importChunks(chunks, getNow(c)));
});

/**
 * GET /export
 */
transferRoutes.get("/export", (c) => {
  return c.json(getDeckFromContext(c).exportChunks(getNow(c)));
});

/**
 * POST /reset
 *
 * Irreversible. The body must be exactly { "confirm": true }.
 */
transferRoutes.post("/reset", async (c) => {
  await readJsonBody(c, WipeRequestSchema);
  return c.json(getDeckFromContext(c).wipeAll());
});

export { transferRoutes };
