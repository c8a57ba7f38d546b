/**
 * Transfer notification routes.
 *
 * GET /api/v1/ledgers/:ledgerId/events - Transfer events for one ledger,
 * in stream order. `afterVersion` resumes after a previously seen event.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ListLedgerEventsQuerySchema } from "../types/dto.js";
import { validateQuery } from "../middleware/validate.js";
import { requirePermission } from "../middleware/auth.js";
import type { LedgerRegistry } from "../services/ledger-registry.js";

export function createEventRoutes(registry: LedgerRegistry): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get(
    "/:ledgerId/events",
    requirePermission("read"),
    validateQuery(ListLedgerEventsQuerySchema),
    (c) => {
      const service = registry.get(c.req.param("ledgerId"));
      const { events, hasMore } = service.readEvents(c.get("validatedQuery"));
      const last = events.at(-1);

      return c.json({
        data: events,
        pagination: {
          nextAfterVersion: last !== undefined ? last.version : null,
          hasMore,
        },
      });
    },
  );

  return routes;
}
