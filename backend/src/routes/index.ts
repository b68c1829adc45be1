/**
 * Route Index
 *
 * Registers all REST routes under `/api/decks/:deckId/*` with deck middleware.
 */

import { Hono } from "hono";
import { type AppEnv, deckResolution } from "../middleware/deck-resolution";

// Domain route modules
import { chunkRoutes } from "./chunks";
import { reviewRoutes } from "./review";
import { transferRoutes } from "./transfer";
import { progressRoutes } from "./progress";

/**
 * Hono router for deck-scoped REST API routes.
 *
 * The deck resolution middleware validates :deckId and binds a
 * ChunkManager for that deck in context.
 *
 * Usage in server.ts:
 * ```typescript
 * import { deckRoutes } from "./routes";
 * app.route("/api/decks/:deckId", deckRoutes);
 * ```
 */
const deckRoutes = new Hono<AppEnv>();

deckRoutes.use("/*", deckResolution());

deckRoutes.route("/chunks", chunkRoutes);
deckRoutes.route("/", reviewRoutes);
deckRoutes.route("/", transferRoutes);
deckRoutes.route("/", progressRoutes);

export { deckRoutes };
