/**
 * Health check routes.
 *
 * GET /health - Liveness probe (always 200 if server is running)
 * GET /ready  - Readiness probe (transfer-notification chain integrity)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { LedgerRegistry } from "../services/ledger-registry.js";

export function createHealthRoutes(registry: LedgerRegistry): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const integrity = registry.verifyIntegrity();
    const ready = integrity.valid;

    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        ledgers: registry.loadedIds().length,
        eventStore: ready
          ? { status: "ok" }
          : {
              status: "down",
              detail: `chainValid=false, errors=${integrity.errors.length}, lastVerifiedPosition=${integrity.lastVerifiedPosition}`,
            },
        timestamp: new Date().toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}
