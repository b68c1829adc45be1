/**
 * Hono server configuration for Chunk Recall
 *
 * Provides:
 * - Health check endpoint at /api/health
 * - Deck-scoped REST API at /api/decks/:deckId/*
 * - CORS headers for local development
 * - JSON error bodies for every failure
 */

import { Hono } from "hono";
import { cors } from "hono/cors";
import { type AppEnv, jsonError } from "./middleware/deck-resolution";
import { restErrorHandler } from "./middleware/error-handler";
import { deckRoutes } from "./routes";
import type { ScheduleDatabase } from "./spaced-repetition";

export const DEFAULT_CORS_ORIGINS = ["http://localhost:5173", "http://localhost:3000"];

export interface AppOptions {
  database: ScheduleDatabase;
  /** Source of "now" for review and due queries (tests pin it) */
  clock?: () => Date;
  corsOrigins?: string[];
}

/**
 * Create and configure the Hono application
 */
export const createApp = (options: AppOptions) => {
  const app = new Hono<AppEnv>();
  const clock = options.clock ?? (() => new Date());

  app.use(
    "/api/*",
    cors({
      origin: options.corsOrigins ?? DEFAULT_CORS_ORIGINS,
      allowMethods: ["GET", "POST", "PATCH", "DELETE", "OPTIONS"],
      allowHeaders: ["Content-Type", "Authorization"],
      credentials: true,
    })
  );

  app.use("/api/*", async (c, next) => {
    c.set("database", options.database);
    c.set("clock", clock);
    await next();
  });

  // Health check endpoint
  app.get("/api/health", (c) => {
    return c.text("Chunk Recall Backend");
  });

  app.route("/api/decks/:deckId", deckRoutes);

  app.notFound((c) => jsonError(c, 404, "NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`));
  app.onError(restErrorHandler);

  return app;
};
