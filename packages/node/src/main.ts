/**
 * @tokenledger/node - Entry point.
 */

import { serve } from "@hono/node-server";
import { pino } from "pino";
import { buildAuthConfig, createSnapshotStore, loadConfig } from "./config.js";
import { createApp } from "./app.js";
import { requestLogger } from "./middleware/logger.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development" ? { transport: { target: "pino-pretty" } } : {}),
  });

  const auth = buildAuthConfig(config);
  if (auth === undefined) {
    logger.warn("No API keys or JWT secret configured; running in unsecured mode");
  } else {
    logger.info(
      { apiKeyCount: auth.apiKeys.size, jwtEnabled: auth.jwtSecret !== undefined },
      "Auth configured",
    );
  }

  if (config.DATA_DIR === undefined) {
    logger.warn("DATA_DIR not set; ledger state lives in memory only");
  } else {
    logger.info({ dataDir: config.DATA_DIR }, "Persisting ledger snapshots to disk");
  }

  const { app } = createApp({
    snapshotStore: createSnapshotStore(config),
    logger,
    logFn: requestLogger(logger.child({ component: "http" })),
    idempotencyTtlMs: config.IDEMPOTENCY_TTL_MS,
    auth,
  });

  const server = serve({ fetch: app.fetch, port: config.PORT, hostname: config.HOST });
  logger.info({ port: config.PORT, host: config.HOST }, "Ledger node started");

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close((err) => {
      if (err !== undefined) {
        logger.error({ err }, "Error while closing server");
        process.exit(1);
      }
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.once("SIGTERM", shutdown);
  process.once("SIGINT", shutdown);
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
