/**
 * Chunk Recall Backend
 *
 * Entry point for the Hono/Node server: loads the configuration, opens the
 * schedule database and serves the REST API.
 */

import { serve } from "@hono/node-server";
import { loadConfig } from "./config";
import { serverLog as log, setLogLevel } from "./logger";
import { createApp } from "./server";
import { openScheduleDatabase } from "./spaced-repetition";

async function main(): Promise<void> {
  const config = await loadConfig();
  setLogLevel(config.logLevel);

  const database = await openScheduleDatabase(config.databasePath);
  const app = createApp({ database, corsOrigins: config.corsOrigins });

  const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
    const displayHost = config.host === "0.0.0.0" ? "localhost" : config.host;
    log.info(`Chunk Recall Backend running at http://${displayHost}:${info.port}`);
    log.info(`Health check at http://${displayHost}:${info.port}/api/health`);
    if (config.host === "0.0.0.0") {
      log.info(`Server bound to all interfaces (0.0.0.0) - accessible remotely`);
    }
  });

  const shutdown = (signal: string) => {
    log.info(`Received ${signal}, shutting down`);
    server.close(() => {
      database.close();
      process.exit(0);
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error: unknown) => {
  log.error("Failed to start server", error);
  process.exit(1);
});
