/**
 * @tokenledger/event-store - Where ledger output goes: the hash-chained log
 * of `token.transfer` notifications and the snapshot stores that let a
 * ledger survive a restart.
 *
 * @packageDocumentation
 */

export { EventStoreError, isHashedEvent } from "./types.js";
export type {
  AppendOptions,
  AppendResult,
  EventHandler,
  EventStore,
  EventStoreErrorCode,
  EventStoreIntegrityResult,
  ExpectedVersion,
  HashedStoredEvent,
  IntegrityError,
  ReadAllOptions,
  ReadDirection,
  ReadOptions,
  ReadWindow,
  StoredEvent,
  Subscription,
} from "./types.js";

export { GENESIS_HASH, computeEventHash, verifyHashChain } from "./hash-chain.js";
export { InMemoryEventStore } from "./in-memory-store.js";

export { LEDGER_EVENTS, createTransferEvent, isTransferEventPayload } from "./ledger-events.js";
export type {
  CreateTransferEventOptions,
  LedgerEventType,
  TransferEventPayload,
} from "./ledger-events.js";

export {
  FileSnapshotStore,
  InMemorySnapshotStore,
  computeSnapshotHash,
  isStoredSnapshot,
  verifySnapshotIntegrity,
} from "./snapshot-store.js";
export type {
  SaveSnapshotOptions,
  SnapshotStore,
  SnapshotStoreOptions,
  StoredSnapshot,
} from "./snapshot-store.js";
