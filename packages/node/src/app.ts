/**
 * Builds the ledger node's Hono app. main.ts serves it; tests call
 * `app.request()` on it directly.
 */

import { Hono } from "hono";
import type { Logger } from "pino";
import { InMemorySnapshotStore } from "@tokenledger/event-store";
import type { EventStore, SnapshotStore } from "@tokenledger/event-store";
import type { AppEnv } from "./types/api-contract.js";
import { LedgerRegistry } from "./services/ledger-registry.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogFn } from "./middleware/logger.js";
import {
  idempotencyMiddleware,
  InMemoryIdempotencyStore,
} from "./middleware/idempotency.js";
import { authMiddleware, unsecuredAuthMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { createHealthRoutes } from "./routes/health.js";
import { createLedgerRoutes } from "./routes/ledgers.js";
import { createEventRoutes } from "./routes/events.js";
import { createErrorEnvelope } from "./types/error.js";

const DEFAULT_IDEMPOTENCY_TTL_MS = 24 * 60 * 60 * 1000;

export interface CreateAppOptions {
  /** Defaults to an InMemorySnapshotStore. */
  readonly snapshotStore?: SnapshotStore | undefined;
  /** Defaults to a fresh InMemoryEventStore shared by every ledger. */
  readonly eventStore?: EventStore | undefined;
  /** Each ledger logs through a child of this logger. */
  readonly logger?: Logger | undefined;
  /** Request logging is off unless given. */
  readonly logFn?: RequestLogFn | undefined;
  readonly idempotencyTtlMs?: number | undefined;
  /** Unsecured mode when absent. */
  readonly auth?: AuthConfig | undefined;
}

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly registry: LedgerRegistry;
  readonly idempotencyStore: InMemoryIdempotencyStore;
}

/**
 * Middleware order: request id, request log, then `/health` and `/ready`
 * outside auth, then auth and idempotency in front of `/api/v1`.
 */
export function createApp(options: CreateAppOptions = {}): AppInstance {
  const registry = new LedgerRegistry({
    snapshotStore: options.snapshotStore ?? new InMemorySnapshotStore(),
    eventStore: options.eventStore,
    logger: options.logger,
  });
  const idempotencyStore = new InMemoryIdempotencyStore(
    options.idempotencyTtlMs ?? DEFAULT_IDEMPOTENCY_TTL_MS,
  );

  const app = new Hono<AppEnv>();
  app.use("*", requestIdMiddleware());
  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }
  app.onError(handleError);
  app.notFound((c) => c.json(createErrorEnvelope("NOT_FOUND", "Route not found"), 404));

  app.route("/", createHealthRoutes(registry));

  app.use(
    "/api/*",
    options.auth === undefined ? unsecuredAuthMiddleware() : authMiddleware(options.auth),
  );
  app.use("/api/*", idempotencyMiddleware(idempotencyStore));
  app.route("/api/v1/ledgers", createLedgerRoutes(registry));
  app.route("/api/v1/ledgers", createEventRoutes(registry));

  return { app, registry, idempotencyStore };
}
