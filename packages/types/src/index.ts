/**
 * @tokenledger/types - Account identities, balances and events shared by
 * the ledger, the event store and the node. Everything here is readonly
 * and dependency-free.
 */

// Token types
export type {
  AccountId,
  Balance,
  TransferNotification,
} from "./token.js";
export {
  ACCOUNT_ID_BYTES,
  MAX_BALANCE,
  accountIdFromBytes,
  accountIdFromByte,
} from "./token.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
} from "./event.js";

// Runtime type guards
export {
  isAccountId,
  isBalance,
  isTransferNotification,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
