/**
 * Wayfarer Server
 *
 * Entry point: validates configuration, opens the database, imports the
 * signing key once and serves the API on Node's HTTP server.
 */

import { serve } from "@hono/node-server";
import { loadConfig, getConfigSummary } from "./config";
import { logger, setLogLevel } from "./logging";
import { openDatabase } from "./storage/db";
import { SqliteUserDirectory } from "./storage/users";
import { TripStorage } from "./storage/trips";
import { CredentialStore, TokenCodec } from "./auth";
import { createApp } from "./web-server";
import { createShutdownController, installShutdownHandlers } from "./api/shutdown";

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logging.level);

  const db = openDatabase(config.database.path);
  const codec = await TokenCodec.fromSecret(config.security.jwtSecret, {
    ttlSeconds: config.security.tokenTtlSeconds,
  });

  const shutdown = createShutdownController({ timeoutMs: config.server.shutdownTimeoutMs });

  const app = createApp({
    config,
    db,
    users: new SqliteUserDirectory(db),
    trips: new TripStorage(db),
    credentials: new CredentialStore(config.security.bcryptRounds),
    codec,
    shutdown,
  });

  const server = serve({ fetch: app.fetch, port: config.server.port }, (info) => {
    logger.info("Server started", { port: info.port, api: `http://localhost:${info.port}/api` });
  });

  shutdown.onShutdown("http-server", () => {
    return new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  });
  shutdown.onShutdown("database", () => {
    db.close();
  });

  installShutdownHandlers(shutdown);
  logger.debug("Configuration loaded", getConfigSummary(config));
}

main().catch((err: unknown) => {
  logger.error("Failed to start server", { error: err });
  process.exit(1);
});
