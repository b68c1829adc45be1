/**
 * Progress Routes
 *
 * - GET /progress - Deck totals and review streaks
 *
 * All routes are under /api/decks/:deckId/ (deck middleware applied).
 */

import { Hono } from "hono";
import { type AppEnv, getDeckFromContext, getNow } from "../middleware/deck-resolution";

const progressRoutes = new Hono<AppEnv>();

progressRoutes.get("/progress", (c) => {
  return c.json(getDeckFromContext(c).getProgress(getNow(c)));
});

export { progressRoutes };
