/**
 * @tokenledger/node - HTTP host for token ledgers.
 *
 * Package public API. The server itself starts from main.ts.
 */

export { LedgerService } from "./services/ledger-service.js";
export type {
  LedgerServiceConfig,
  LedgerSummary,
  ReadLedgerEventsOptions,
  LedgerEventsPage,
} from "./services/ledger-service.js";
export { LedgerRegistry, RegistryError } from "./services/ledger-registry.js";
export type { LedgerRegistryConfig, RegistryErrorCode } from "./services/ledger-registry.js";
export { EventStoreSink } from "./services/event-sink.js";
export {
  loadConfig,
  parseApiKeys,
  buildAuthConfig,
  createSnapshotStore,
  ConfigSchema,
} from "./config.js";
export type { AppConfig, ParsedApiKey } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
