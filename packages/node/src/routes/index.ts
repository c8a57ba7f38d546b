/**
 * Route barrel - re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createLedgerRoutes } from "./ledgers.js";
export { createEventRoutes } from "./events.js";
